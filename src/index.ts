/**
 * argbind
 *
 * Command-line argument binding: describe a command tree with options,
 * positional parameters and subcommands, then bind raw tokens to it.
 *
 * Usage:
 *   const spec = defineCommand({ name: 'app', options: [{ names: ['-v', '--verbose'] }] });
 *   const result = new Parser(spec).parse(process.argv.slice(2));
 */

// ─────────────────────────────────────────────────────────────
// Model
// ─────────────────────────────────────────────────────────────

export { Range } from './model/range.js';
export { ArgSpec, ArgSpecBuilder } from './model/arg-spec.js';
export type { ArgSettings } from './model/arg-spec.js';
export { OptionSpec, OptionSpecBuilder } from './model/option-spec.js';
export { PositionalParamSpec, PositionalParamSpecBuilder, compareArgSpecs } from './model/positional-param-spec.js';
export { ParserSpec, DEFAULT_SEPARATOR } from './model/parser-spec.js';
export type { ParserSettings, OptionResemblance } from './model/parser-spec.js';
export {
  CommandSpec,
  DEFAULT_COMMAND_NAME,
  STANDARD_HELP_MIXIN,
  defaultResemblesOption,
  negativeNumbersAsValues,
} from './model/command-spec.js';
export type { CommandSpecInit } from './model/command-spec.js';
export { ParseResult, ParseResultBuilder } from './model/parse-result.js';
export type { PendingInteractiveValue } from './model/parse-result.js';
export { ObjectBinding, UnmatchedArgsList, propertyBinding, unmatchedArgsSetter } from './model/bindings.js';
export type { UnmatchedArgsBinding } from './model/bindings.js';

// ─────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────

export { TypeConverterRegistry, getConverterExcludesFromEnv } from './convert/registry.js';
export { BUILT_IN_CONVERTERS } from './convert/builtins.js';
export { enumType, isEnumType, typeName, createEnumConverter } from './convert/enums.js';

// ─────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────

export { Parser, parseArgs } from './parser/index.js';
export type { ParserOptions } from './parser/index.js';
export { Interpreter, describeArg } from './parser/interpreter.js';
export type { InterpretationContext } from './parser/interpreter.js';
export { CollectErrorsStrategy, FailFastStrategy, createErrorStrategy } from './parser/error-strategy.js';
export type { ErrorStrategy } from './parser/error-strategy.js';
export { expandArgumentFiles, tokenizeArgumentFile } from './parser/argument-files.js';
export { compileSplitRegex, splitByRegex, splitValue } from './parser/split.js';

// ─────────────────────────────────────────────────────────────
// Definitions, Prompts, Errors
// ─────────────────────────────────────────────────────────────

export { defineCommand } from './definition/build.js';
export type {
  ArgDefinition,
  CommandDefinition,
  OptionDefinition,
  PositionalDefinition,
  SubcommandDefinition,
} from './definition/types.js';
export { promptForInteractiveValues, loadInquirer, isExitError } from './prompts.js';
export type { AskFunction, PromptOptions } from './prompts.js';
export * from './errors/index.js';
export { logger, setLogLevel, getLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export { stripPrefix, camelCase } from './utils.js';
export type {
  Binding,
  ContainerKind,
  DefaultValueProvider,
  EnumType,
  InteractiveReader,
  LookBehind,
  TypeConverter,
  TypeRef,
} from './types/index.js';
