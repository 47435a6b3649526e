/**
 * Error Taxonomy
 *
 * InitializationError: the command model itself is invalid.
 * ParameterError: the command line does not satisfy the command model.
 * Every ParameterError carries the CommandSpec of the level it occurred at.
 */

import { mostSimilar } from './similarity.js';
import { listToString, stripPrefix } from '../utils.js';
import type { ArgSpec } from '../model/arg-spec.js';
import type { CommandSpec } from '../model/command-spec.js';
import type { ParseResult } from '../model/parse-result.js';

export { mostSimilar, similarity } from './similarity.js';

/**
 * Base class of all errors raised by argbind
 */
export class ArgBindError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArgBindError';
  }
}

// ─────────────────────────────────────────────────────────────
// Model Errors
// ─────────────────────────────────────────────────────────────

export class InitializationError extends ArgBindError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InitializationError';
  }
}

/** Two options of one command share a name */
export class DuplicateOptionError extends InitializationError {
  constructor(name: string, existing: ArgSpec, added: ArgSpec) {
    super(`Option name '${name}' is used by both ${existing.toString()} and ${added.toString()}`);
    this.name = 'DuplicateOptionError';
  }
}

/** Sorted positional parameters leave an index uncovered */
export class ParameterIndexGapError extends InitializationError {
  constructor(message: string) {
    super(message);
    this.name = 'ParameterIndexGapError';
  }
}

// ─────────────────────────────────────────────────────────────
// Conversion Errors
// ─────────────────────────────────────────────────────────────

/**
 * Thrown by type converters. The parser wraps it in a ParameterError
 * naming the argument the value was meant for.
 */
export class TypeConversionError extends ArgBindError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TypeConversionError';
  }
}

// ─────────────────────────────────────────────────────────────
// Parameter Errors
// ─────────────────────────────────────────────────────────────

export interface ParameterErrorDetails {
  /** The argument being processed, if any */
  argSpec?: ArgSpec;
  /** The raw value being processed, if any */
  value?: string;
  cause?: unknown;
}

/**
 * The command line could not be bound to the command model
 */
export class ParameterError extends ArgBindError {
  /** Command level the problem was found at */
  readonly commandSpec: CommandSpec;
  readonly argSpec: ArgSpec | undefined;
  readonly value: string | undefined;

  constructor(commandSpec: CommandSpec, message: string, details: ParameterErrorDetails = {}) {
    super(message, 'cause' in details ? { cause: details.cause } : undefined);
    this.name = 'ParameterError';
    this.commandSpec = commandSpec;
    this.argSpec = details.argSpec;
    this.value = details.value;
  }

  /**
   * Wrap an unexpected error raised while processing `arg`
   */
  static create(
    commandSpec: CommandSpec,
    error: unknown,
    arg: string,
    index: number,
    args: readonly string[]
  ): ParameterError {
    const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return new ParameterError(
      commandSpec,
      `${reason} while processing argument at or before arg[${index}] '${arg}' in ${listToString(args)}`,
      { value: arg, cause: error }
    );
  }
}

export class MissingParameterError extends ParameterError {
  readonly missing: readonly ArgSpec[];

  constructor(commandSpec: CommandSpec, missing: readonly ArgSpec[], message: string) {
    super(commandSpec, message, { argSpec: missing[0] });
    this.name = 'MissingParameterError';
    this.missing = [...missing];
  }

  /**
   * Error for required arguments with no value on the command line
   */
  static create(commandSpec: CommandSpec, missing: readonly ArgSpec[], separator: string): MissingParameterError {
    if (missing.length === 1) {
      return new MissingParameterError(
        commandSpec,
        missing,
        `Missing required option '${describeMissing(missing[0], separator)}'`
      );
    }
    const names = missing.map((argSpec) => describeMissing(argSpec, separator));
    return new MissingParameterError(commandSpec, missing, `Missing required options ${listToString(names)}`);
  }
}

function describeMissing(argSpec: ArgSpec, separator: string): string {
  const prefix = argSpec.isOption()
    ? argSpec.longestName() + separator
    : `params[${argSpec.isPositional() ? argSpec.index.toString() : ''}]${separator}`;
  return prefix + argSpec.paramLabel;
}

export class MaxValuesExceededError extends ParameterError {
  constructor(commandSpec: CommandSpec, message: string, details: ParameterErrorDetails = {}) {
    super(commandSpec, message, details);
    this.name = 'MaxValuesExceededError';
  }
}

export class OverwrittenOptionError extends ParameterError {
  readonly overwritten: ArgSpec;

  constructor(commandSpec: CommandSpec, overwritten: ArgSpec, message: string) {
    super(commandSpec, message, { argSpec: overwritten });
    this.name = 'OverwrittenOptionError';
    this.overwritten = overwritten;
  }
}

export class MissingTypeConverterError extends ParameterError {
  constructor(commandSpec: CommandSpec, message: string, details: ParameterErrorDetails = {}) {
    super(commandSpec, message, details);
    this.name = 'MissingTypeConverterError';
  }
}

/**
 * Tokens matched no option, positional parameter or subcommand
 */
export class UnmatchedArgumentError extends ParameterError {
  readonly unmatched: readonly string[];

  constructor(commandSpec: CommandSpec, unmatched: readonly string[]) {
    const label = isUnknownOption(commandSpec, unmatched) ? 'Unknown option' : 'Unmatched argument';
    super(commandSpec, `${label}${unmatched.length === 1 ? ': ' : 's: '}${unmatched.join(', ')}`, {
      value: unmatched[0],
    });
    this.name = 'UnmatchedArgumentError';
    this.unmatched = [...unmatched];
  }

  /** True if the first unmatched token looks like an option */
  get isUnknownOption(): boolean {
    return isUnknownOption(this.commandSpec, this.unmatched);
  }

  /**
   * Likely intended names: options sharing the first two characters of an
   * option-like token, else the three closest subcommand names.
   */
  get suggestions(): string[] {
    const arg = this.unmatched[0];
    if (arg === undefined) {
      return [];
    }
    const spec = this.commandSpec;
    if (spec.resemblesOption(arg)) {
      const stripped = stripPrefix(arg);
      return spec.findOptionNamesWithPrefix(stripped.slice(0, Math.min(2, stripped.length)));
    }
    if (spec.subcommands.size > 0) {
      return mostSimilar(arg, spec.subcommands.keys()).slice(0, 3);
    }
    return [];
  }

  /**
   * One-line hint built from the suggestions, or undefined if there are none
   */
  formatSuggestions(): string | undefined {
    const suggestions = this.suggestions;
    if (suggestions.length === 0) {
      return undefined;
    }
    return this.isUnknownOption
      ? `Possible solutions: ${suggestions.join(', ')}`
      : `Did you mean: ${suggestions.join(' or ')}?`;
  }
}

function isUnknownOption(commandSpec: CommandSpec, unmatched: readonly string[]): boolean {
  const first = unmatched[0];
  return first !== undefined && commandSpec.resemblesOption(first);
}

/**
 * All problems found by a parse in collect-errors mode
 */
export class ParameterErrors extends ParameterError {
  readonly errors: readonly ParameterError[];
  /** Result of the parse that produced the errors */
  readonly parseResult: ParseResult;

  constructor(parseResult: ParseResult, errors: readonly ParameterError[]) {
    const first = errors[0];
    super(first?.commandSpec ?? parseResult.commandSpec, errors.map((e) => e.message).join('\n'), {
      argSpec: first?.argSpec,
      value: first?.value,
    });
    this.name = 'ParameterErrors';
    this.errors = [...errors];
    this.parseResult = parseResult;
  }
}
