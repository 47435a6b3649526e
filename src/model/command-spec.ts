/**
 * Command Specification
 *
 * The grammar of one command level: options, positional parameters,
 * subcommands, mixins and parser configuration.
 */

import { OptionSpec } from './option-spec.js';
import { PositionalParamSpec, compareArgSpecs } from './positional-param-spec.js';
import { ParserSpec } from './parser-spec.js';
import type { ParserSettings } from './parser-spec.js';
import type { ArgSpec } from './arg-spec.js';
import type { UnmatchedArgsBinding } from './bindings.js';
import { TypeConverterRegistry } from '../convert/registry.js';
import { DuplicateOptionError, InitializationError, ParameterIndexGapError } from '../errors/index.js';
import { logger } from '../logger.js';
import { listToString, removeItem, stripPrefix } from '../utils.js';
import type { DefaultValueProvider, TypeConverter, TypeRef } from '../types/index.js';

export const DEFAULT_COMMAND_NAME = '<main command>';

/** Mixin key of the standard help options */
export const STANDARD_HELP_MIXIN = 'mixinStandardHelpOptions';

export interface CommandSpecInit {
  name?: string;
  /** Converter registry owned by the command; built-ins by default */
  converters?: TypeConverterRegistry;
  parser?: Partial<ParserSettings>;
}

// ─────────────────────────────────────────────────────────────
// Option Resemblance
// ─────────────────────────────────────────────────────────────

/**
 * Approximate check whether `arg` looks like an option of `commandSpec`:
 * the prefix characters it shares with the option names must add up to
 * at least 90% of the number of names.
 */
export function defaultResemblesOption(arg: string, commandSpec: CommandSpec): boolean {
  const names = [...commandSpec.optionsByName.keys()];
  if (names.length === 0) {
    return arg.startsWith('-');
  }
  let count = 0;
  for (const name of names) {
    for (let i = 0; i < arg.length; i++) {
      if (name.length > i && arg.charAt(i) === name.charAt(i)) {
        count++;
      } else {
        break;
      }
    }
  }
  return count > 0 && count * 10 >= names.length * 9;
}

const NUMBER_PATTERN = /^-(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Stricter resemblance: negative numbers never look like options, unless
 * the command declares an option with that exact name
 */
export function negativeNumbersAsValues(arg: string, commandSpec: CommandSpec): boolean {
  if (NUMBER_PATTERN.test(arg) && !commandSpec.optionsByName.has(arg)) {
    return false;
  }
  return defaultResemblesOption(arg, commandSpec);
}

// ─────────────────────────────────────────────────────────────
// CommandSpec
// ─────────────────────────────────────────────────────────────

export class CommandSpec {
  private explicitName: string | undefined;
  aliases: string[] = [];
  version: string[] = [];
  helpCommand = false;
  defaultValueProvider: DefaultValueProvider | undefined;
  parent: CommandSpec | undefined;
  readonly parser: ParserSpec;
  readonly converters: TypeConverterRegistry;

  readonly options: OptionSpec[] = [];
  readonly positionalParameters: PositionalParamSpec[] = [];
  readonly args: ArgSpec[] = [];
  readonly requiredArgs: ArgSpec[] = [];
  readonly optionsByName = new Map<string, OptionSpec>();
  /** Single-character key -> option, for names like `-v` */
  readonly posixOptionsByKey = new Map<string, OptionSpec>();
  /** Name and alias -> subcommand */
  readonly subcommands = new Map<string, CommandSpec>();
  readonly mixins = new Map<string, CommandSpec>();
  readonly unmatchedArgsBindings: UnmatchedArgsBinding[] = [];
  private label: string | undefined;

  constructor(init: CommandSpecInit = {}) {
    this.explicitName = init.name;
    this.converters = init.converters ?? TypeConverterRegistry.withBuiltIns();
    this.parser = new ParserSpec(init.parser);
  }

  static create(name?: string): CommandSpec {
    return new CommandSpec({ name });
  }

  get name(): string {
    return this.explicitName ?? DEFAULT_COMMAND_NAME;
  }

  set name(name: string) {
    this.explicitName = name;
  }

  /** Names of this command and its ancestors, outermost first */
  qualifiedName(separator = ' '): string {
    return this.parent ? this.parent.qualifiedName(separator) + separator + this.name : this.name;
  }

  withAliases(...aliases: string[]): CommandSpec {
    this.aliases = aliases;
    return this;
  }

  withVersion(...version: string[]): CommandSpec {
    this.version = version;
    return this;
  }

  withHelpCommand(helpCommand = true): CommandSpec {
    this.helpCommand = helpCommand;
    return this;
  }

  withDefaultValueProvider(provider: DefaultValueProvider | undefined): CommandSpec {
    this.defaultValueProvider = provider;
    return this;
  }

  withToString(text: string): CommandSpec {
    this.label = text;
    return this;
  }

  // ───────────────────────────────────────────
  // Arguments
  // ───────────────────────────────────────────

  add(arg: ArgSpec): CommandSpec {
    if (arg.isOption()) {
      return this.addOption(arg);
    }
    if (arg.isPositional()) {
      return this.addPositional(arg);
    }
    throw new InitializationError(`Unsupported argument: ${arg.toString()}`);
  }

  /**
   * @throws {DuplicateOptionError} If a name is already used by another option
   */
  addOption(option: OptionSpec): CommandSpec {
    for (const name of option.names) {
      const existing = this.optionsByName.get(name);
      if (existing && existing !== option) {
        throw new DuplicateOptionError(name, existing, option);
      }
    }
    this.args.push(option);
    this.options.push(option);
    for (const name of option.names) {
      this.optionsByName.set(name, option);
      if (name.length === 2 && name.startsWith('-')) {
        this.posixOptionsByKey.set(name.charAt(1), option);
      }
    }
    if (option.required) {
      this.requiredArgs.push(option);
    }
    option.commandSpec = this;
    return this;
  }

  addPositional(positional: PositionalParamSpec): CommandSpec {
    this.args.push(positional);
    this.positionalParameters.push(positional);
    if (positional.required) {
      this.requiredArgs.push(positional);
    }
    positional.commandSpec = this;
    return this;
  }

  /**
   * Receive unmatched tokens; also allows unmatched arguments
   */
  addUnmatchedArgsBinding(binding: UnmatchedArgsBinding): CommandSpec {
    this.unmatchedArgsBindings.push(binding);
    this.parser.unmatchedArgumentsAllowed = true;
    return this;
  }

  // ───────────────────────────────────────────
  // Subcommands and Mixins
  // ───────────────────────────────────────────

  /**
   * Register a subcommand under `name` and its aliases
   *
   * @throws {InitializationError} If the name or an alias is taken
   */
  addSubcommand(name: string, subcommand: CommandSpec): CommandSpec {
    const previous = this.subcommands.get(name);
    if (previous && previous !== subcommand) {
      throw new InitializationError(`Another subcommand named '${name}' already exists for command '${this.name}'`);
    }
    for (const alias of subcommand.aliases) {
      const taken = this.subcommands.get(alias);
      if (taken && taken !== subcommand) {
        throw new InitializationError(
          `Alias '${alias}' for subcommand '${name}' is already used by another subcommand of '${this.name}'`
        );
      }
    }
    this.subcommands.set(name, subcommand);
    if (subcommand.explicitName === undefined) {
      subcommand.name = name;
    }
    subcommand.parent = this;
    for (const alias of subcommand.aliases) {
      this.subcommands.set(alias, subcommand);
    }
    return this;
  }

  /**
   * Create and register a subcommand that starts from a copy of this
   * command's converter registry and parser settings
   */
  createSubcommand(name: string): CommandSpec {
    const subcommand = new CommandSpec({ name, converters: this.converters.clone() });
    subcommand.parser.initFrom(this.parser);
    this.addSubcommand(name, subcommand);
    return subcommand;
  }

  /**
   * Merge a partial command into this one. Its options, positionals and
   * subcommands are added; separator, name, version and help-command flag
   * are taken only where this command has none yet.
   */
  addMixin(name: string, mixin: CommandSpec): CommandSpec {
    this.mixins.set(name, mixin);

    this.parser.initSeparator(mixin.parser.hasExplicitSeparator() ? mixin.parser.separator : undefined);
    if (this.explicitName === undefined && mixin.explicitName !== undefined) {
      this.explicitName = mixin.explicitName;
    }
    if (this.version.length === 0 && mixin.version.length > 0) {
      this.version = [...mixin.version];
    }
    if (!this.helpCommand && mixin.helpCommand) {
      this.helpCommand = true;
    }
    if (this.defaultValueProvider === undefined) {
      this.defaultValueProvider = mixin.defaultValueProvider;
    }

    // first key is the registration name, later keys of the same instance are its aliases
    const merged = new Set<CommandSpec>();
    for (const [subName, subcommand] of mixin.subcommands) {
      if (!merged.has(subcommand)) {
        merged.add(subcommand);
        this.addSubcommand(subName, subcommand);
      }
    }
    for (const option of mixin.options) {
      this.addOption(option.toBuilder().build());
    }
    for (const positional of mixin.positionalParameters) {
      this.addPositional(positional.toBuilder().build());
    }
    return this;
  }

  /**
   * Add (or remove) `-h, --help` and `-V, --version`
   */
  mixinStandardHelpOptions(enable = true): CommandSpec {
    if (enable) {
      if (!this.mixins.has(STANDARD_HELP_MIXIN)) {
        const mixin = CommandSpec.create()
          .addOption(
            OptionSpec.builder('-h', '--help')
              .usageHelp()
              .description('Show this help message and exit.')
              .build()
          )
          .addOption(
            OptionSpec.builder('-V', '--version')
              .versionHelp()
              .description('Print version information and exit.')
              .build()
          );
        this.addMixin(STANDARD_HELP_MIXIN, mixin);
      }
      return this;
    }

    const mixin = this.mixins.get(STANDARD_HELP_MIXIN);
    if (mixin) {
      this.mixins.delete(STANDARD_HELP_MIXIN);
      for (const option of mixin.options) {
        for (const name of option.names) {
          const added = this.optionsByName.get(name);
          if (!added) {
            continue;
          }
          removeItem(this.options, added);
          removeItem(this.args, added);
          this.optionsByName.delete(name);
          if (name.length === 2 && name.startsWith('-')) {
            this.posixOptionsByKey.delete(name.charAt(1));
          }
        }
      }
    }
    return this;
  }

  // ───────────────────────────────────────────
  // Tree-wide Configuration
  // ───────────────────────────────────────────

  /**
   * Apply parser settings to this command and every subcommand attached
   * at this moment
   */
  configureParser(settings: Partial<ParserSettings>): CommandSpec {
    for (const spec of this.commandTree()) {
      spec.parser.apply(settings);
    }
    return this;
  }

  /**
   * Register a converter with this command and every subcommand attached
   * at this moment
   */
  registerConverter<T>(type: TypeRef, converter: TypeConverter<T>): CommandSpec {
    for (const spec of this.commandTree()) {
      spec.converters.register(type, converter);
    }
    return this;
  }

  /** This command and all distinct subcommands below it */
  commandTree(): CommandSpec[] {
    const visited = new Set<CommandSpec>();
    const visit = (spec: CommandSpec): void => {
      if (visited.has(spec)) {
        return;
      }
      visited.add(spec);
      for (const subcommand of spec.subcommands.values()) {
        visit(subcommand);
      }
    };
    visit(this);
    return [...visited];
  }

  // ───────────────────────────────────────────
  // Validation
  // ───────────────────────────────────────────

  /**
   * Sort positional parameters and validate the command model
   *
   * @throws {ParameterIndexGapError} If positional indices leave a gap
   * @throws {InitializationError} If a help option is not boolean
   */
  validate(): void {
    this.positionalParameters.sort(compareArgSpecs);
    validatePositionalParameters(this.positionalParameters);

    const usageHelp = this.options.filter((option) => option.usageHelp);
    const versionHelp = this.options.filter((option) => option.versionHelp);
    checkHelpOptions(usageHelp, 'usageHelp', '--help', 'usage help message');
    checkHelpOptions(versionHelp, 'versionHelp', '--version', 'version information');
  }

  /** Validate this command and every subcommand */
  validateTree(): void {
    for (const spec of this.commandTree()) {
      spec.validate();
    }
  }

  // ───────────────────────────────────────────
  // Lookup
  // ───────────────────────────────────────────

  /**
   * Find an option by name, with or without its prefix, or by its
   * single-character key
   */
  findOption(name: string): OptionSpec | undefined {
    if (name.length === 1) {
      const byKey = this.options.find((option) =>
        option.names.some((n) => (n.length === 2 && n.charAt(0) === '-' && n.charAt(1) === name) || n === name)
      );
      if (byKey) {
        return byKey;
      }
    }
    return this.options.find((option) => option.names.some((n) => n === name || stripPrefix(n) === name));
  }

  /** Names of all options whose unprefixed name starts with `prefix` */
  findOptionNamesWithPrefix(prefix: string): string[] {
    const result: string[] = [];
    for (const option of this.options) {
      for (const name of option.names) {
        if (stripPrefix(name).startsWith(prefix)) {
          result.push(name);
        }
      }
    }
    return result;
  }

  /**
   * Whether an unmatched token should be treated as an unknown option
   * rather than a positional value
   */
  resemblesOption(arg: string): boolean {
    if (this.parser.unmatchedOptionsArePositionalParams) {
      logger.debug(`Parser is configured to treat all unmatched options as positional parameters: ${arg}`);
      return false;
    }
    const resembles = (this.parser.resemblesOption ?? defaultResemblesOption)(arg, this);
    if (logger.isDebugEnabled()) {
      logger.debug(`${arg} ${resembles ? 'resembles' : "doesn't resemble"} an option of '${this.name}'`);
    }
    return resembles;
  }

  toString(): string {
    return this.label ?? `command '${this.qualifiedName()}'`;
  }
}

function validatePositionalParameters(positionals: readonly PositionalParamSpec[]): void {
  let min = 0;
  for (const positional of positionals) {
    const index = positional.index;
    if (index.min > min) {
      throw new ParameterIndexGapError(
        `Command definition should have a positional parameter with index=${min}. ` +
          `Nearest positional parameter '${positional.paramLabel}' has index=${index.min}`
      );
    }
    min = Math.max(min, index.max);
    min = min === Infinity ? min : min + 1;
  }
}

function checkHelpOptions(options: readonly OptionSpec[], attribute: string, flag: string, purpose: string): void {
  const names = options.map((option) => option.longestName());
  const wrongType = options.filter((option) => !option.isBoolean()).map((option) => option.longestName());
  if (wrongType.length > 0) {
    throw new InitializationError(
      `Non-boolean options like ${listToString(wrongType)} should not be marked as '${attribute}=true'. ` +
        `Usually a command has one ${flag} boolean flag that triggers display of the ${purpose}.`
    );
  }
  if (names.length > 1) {
    logger.warn(
      `Multiple options ${listToString(names)} are marked as '${attribute}=true'. ` +
        `Usually a command has only one ${flag} option that triggers display of the ${purpose}.`
    );
  }
}
