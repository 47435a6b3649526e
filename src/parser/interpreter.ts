/**
 * Interpreter
 *
 * Binds the tokens of one command level to its CommandSpec. A matched
 * subcommand gets an interpreter of its own that takes over the rest of
 * the tokens.
 *
 * Tokens are held on a stack whose top is the last array element, so the
 * next token to process is `args[args.length - 1]`.
 */

import { createEnumConverter, isEnumType, typeName } from '../convert/enums.js';
import {
  ArgBindError,
  MaxValuesExceededError,
  MissingParameterError,
  MissingTypeConverterError,
  OverwrittenOptionError,
  ParameterError,
  TypeConversionError,
  UnmatchedArgumentError,
} from '../errors/index.js';
import { logger } from '../logger.js';
import { ParseResultBuilder } from '../model/parse-result.js';
import type { ParseResult } from '../model/parse-result.js';
import { compareArgSpecs } from '../model/positional-param-spec.js';
import type { ArgSpec } from '../model/arg-spec.js';
import type { CommandSpec } from '../model/command-spec.js';
import type { Range } from '../model/range.js';
import { createErrorStrategy } from './error-strategy.js';
import type { ErrorStrategy } from './error-strategy.js';
import { isBlank, listToString, removeItem } from '../utils.js';
import type { InteractiveReader, LookBehind, TypeConverter, TypeRef } from '../types/index.js';

/**
 * State shared by the interpreters of one parse
 */
export interface InterpretationContext {
  /** All tokens of the parse, after @-file expansion */
  readonly originalArgs: readonly string[];
  readonly readInteractive?: InteractiveReader;
  /** Set when help was requested at any level of the chain */
  readonly chain: { helpRequested: boolean };
}

function peek(args: readonly string[]): string | undefined {
  return args[args.length - 1];
}

/** Remaining stack in command-line order */
function remainder(args: readonly string[]): string {
  return listToString([...args].reverse());
}

/**
 * Describe an argument for error messages. Options include the value
 * label when `index` is not negative.
 */
export function describeArg(argSpec: ArgSpec, index: number): string {
  if (argSpec.isOption()) {
    let desc = `option '${argSpec.longestName()}'`;
    if (index >= 0) {
      if (argSpec.arity.max > 1) {
        desc += ` at index ${index}`;
      }
      desc += ` (${argSpec.paramLabel})`;
    }
    return desc;
  }
  if (argSpec.isPositional()) {
    return `positional parameter at index ${argSpec.index.toString()} (${argSpec.paramLabel})`;
  }
  return argSpec.toString();
}

export class Interpreter {
  private readonly spec: CommandSpec;
  private readonly context: InterpretationContext;
  private readonly result: ParseResultBuilder;
  private readonly strategy: ErrorStrategy;
  private readonly required: ArgSpec[];
  /** Arguments that received a value on the command line */
  private readonly initialized = new Set<ArgSpec>();
  private position = 0;
  private endOfOptions = false;
  /** Multi-value option that took its maximum number of values from the previous tokens */
  private saturatedOption: ArgSpec | undefined;

  constructor(spec: CommandSpec, context: InterpretationContext) {
    this.spec = spec;
    this.context = context;
    this.result = new ParseResultBuilder(spec, context.originalArgs);
    this.strategy = createErrorStrategy(spec.parser.collectErrors, this.result);
    this.required = [...spec.requiredArgs].sort(compareArgSpecs);
  }

  /**
   * Consume tokens from `args` (top of stack first) and return the result
   * of this level, with the results of any subcommands attached.
   */
  interpret(args: string[]): ParseResult {
    this.reset();
    if (logger.isDebugEnabled()) {
      logger.debug(
        `Initializing ${this.spec.toString()}: ${this.spec.options.length} options, ` +
          `${this.spec.positionalParameters.length} positional parameters, ` +
          `${this.required.length} required, ${new Set(this.spec.subcommands.values()).size} subcommands`
      );
    }

    this.guard(args, () => this.applyDefaultValues());
    do {
      const stackSize = args.length;
      this.guard(args, () => this.processArguments(args));
      if (this.strategy.continueOnError && stackSize === args.length && stackSize > 0) {
        const skipped = args.pop();
        if (skipped !== undefined) {
          this.result.addUnmatched(skipped);
        }
      }
    } while (args.length > 0 && this.strategy.continueOnError);

    this.checkRequired(args);
    this.checkUnmatched();
    return this.result.build();
  }

  /**
   * Run a step, reporting any error through the strategy. Errors other
   * than ParameterError are wrapped with the token being processed.
   */
  private guard(args: readonly string[], step: () => void): void {
    try {
      step();
    } catch (error) {
      if (error instanceof ParameterError) {
        this.strategy.report(error);
        return;
      }
      const originalArgs = this.context.originalArgs;
      const index = originalArgs.length - args.length - 1;
      const arg = index >= 0 && index < originalArgs.length ? originalArgs[index] : '?';
      this.strategy.report(ParameterError.create(this.spec, error, arg, index, originalArgs));
    }
  }

  private reset(): void {
    for (const arg of this.spec.args) {
      arg.resetValues();
      if (!arg.hasInitialValue) {
        logger.debug(`Initial value not available for ${arg.toString()}`);
        continue;
      }
      try {
        arg.setValue(arg.initialValue);
      } catch (error) {
        logger.warn(
          `Could not set initial value for ${arg.toString()} to ${String(arg.initialValue)}: ${String(error)}`
        );
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Defaults
  // ─────────────────────────────────────────────────────────────

  private applyDefaultValues(): void {
    this.result.isInitializingDefaultValues = true;
    try {
      for (const option of this.spec.options) {
        this.applyDefault(option);
      }
      for (const positional of this.spec.positionalParameters) {
        this.applyDefault(positional);
      }
    } finally {
      this.result.isInitializingDefaultValues = false;
    }
  }

  private applyDefault(arg: ArgSpec): void {
    const fromProvider = this.spec.defaultValueProvider?.(arg);
    const defaultValue = fromProvider ?? arg.defaultValue;
    if (defaultValue === undefined) {
      return;
    }
    logger.debug(`Applying default value (${defaultValue}) to ${arg.toString()}`);
    const arity = arg.arity.withMin(Math.max(1, arg.arity.min));
    this.applyOption(arg, 'separate', arity, [defaultValue], new Set(), arg.toString());
    removeItem(this.required, arg);
  }

  // ─────────────────────────────────────────────────────────────
  // Token Classification
  // ─────────────────────────────────────────────────────────────

  private processArguments(args: string[]): void {
    const parser = this.spec.parser;
    const separator = parser.separator;

    while (args.length > 0) {
      if (this.endOfOptions) {
        this.processRemainderAsPositionalParameters(args);
        return;
      }
      const saturated = this.saturatedOption;
      this.saturatedOption = undefined;

      let arg = args.pop();
      if (arg === undefined) {
        return;
      }
      if (logger.isDebugEnabled()) {
        logger.debug(`Processing argument '${arg}'. Remainder=${remainder(args)}`);
      }

      if (arg === parser.endOfOptionsDelimiter) {
        logger.info(`Found end-of-options delimiter '${arg}'. Treating remainder as positional parameters.`);
        this.endOfOptions = true;
        this.processRemainderAsPositionalParameters(args);
        return;
      }

      const subcommand = this.spec.subcommands.get(arg);
      if (subcommand) {
        this.processSubcommand(arg, subcommand, args);
        return;
      }

      let paramAttachedToOption = false;
      const separatorIndex = arg.indexOf(separator);
      if (separatorIndex > 0) {
        const key = arg.slice(0, separatorIndex);
        // Greedy: an option named like the whole token wins over key=value
        if (this.spec.optionsByName.has(key) && !this.spec.optionsByName.has(arg)) {
          paramAttachedToOption = true;
          const optionParam = arg.slice(separatorIndex + separator.length);
          args.push(optionParam);
          arg = key;
          logger.debug(`Separated '${key}' option from '${optionParam}' option parameter`);
        } else {
          logger.debug(`'${arg}' contains separator '${separator}' but '${key}' is not a known option`);
        }
      }

      if (this.spec.optionsByName.has(arg)) {
        this.processStandaloneOption(arg, args, paramAttachedToOption);
      } else if (parser.posixClusteredShortOptionsAllowed && arg.length > 2 && arg.startsWith('-')) {
        logger.debug(`Trying to process '${arg}' as clustered short options`);
        this.processClusteredShortOptions(arg, args);
      } else {
        args.push(arg);
        logger.debug(`Could not find option '${arg}', deciding whether to treat as unmatched option or positional parameter`);
        if (this.spec.resemblesOption(arg)) {
          this.handleUnmatchedArgument(args);
          continue;
        }
        this.processPositionalParameter(args, saturated);
      }
    }
  }

  private processSubcommand(name: string, subcommand: CommandSpec, args: string[]): void {
    if (subcommand.helpCommand) {
      this.context.chain.helpRequested = true;
    }
    logger.debug(`Found subcommand '${name}' (${subcommand.toString()})`);
    const interpreter = new Interpreter(subcommand, this.context);
    this.result.subcommandResult = interpreter.interpret(args);
  }

  private handleUnmatchedArgument(args: string[]): void {
    const arg = args.pop();
    if (arg !== undefined) {
      this.result.addUnmatched(arg);
    }
    if (this.spec.parser.stopAtUnmatched) {
      this.result.addUnmatchedStack(args);
    }
  }

  private processRemainderAsPositionalParameters(args: string[]): void {
    while (args.length > 0) {
      const before = args.length;
      this.processPositionalParameter(args);
      if (args.length === before) {
        return;
      }
    }
  }

  private processPositionalParameter(args: string[], saturated?: ArgSpec): void {
    if (logger.isDebugEnabled()) {
      logger.debug(`Processing next arg as a positional parameter at index=${this.position}. Remainder=${remainder(args)}`);
    }
    if (this.spec.parser.stopAtPositional) {
      if (!this.endOfOptions) {
        logger.debug('Parser is configured with stopAtPositional, treating remaining arguments as positional parameters');
      }
      this.endOfOptions = true;
    }

    let argsConsumed = 0;
    let interactiveConsumed = 0;
    for (const positional of this.spec.positionalParameters) {
      if (!positional.index.contains(this.position) || positional.typedValueAtPosition.has(this.position)) {
        continue;
      }
      // Every positional at this position sees the same tokens
      const argsCopy = [...args];
      const arity = positional.arity;
      logger.debug(
        `Position ${this.position} is in index range ${positional.index.toString()}. ` +
          `Trying to assign args to ${positional.toString()}, arity=${arity.toString()}`
      );
      if (!this.assertNoMissingParameters(positional, arity, argsCopy)) {
        break;
      }
      const originalSize = argsCopy.length;
      const actuallyConsumed = this.applyOption(
        positional,
        'separate',
        arity,
        argsCopy,
        this.initialized,
        `args[${positional.index.toString()}] at position ${this.position}`
      );
      const count = originalSize - argsCopy.length;
      if (count > 0 || actuallyConsumed > 0) {
        removeItem(this.required, positional);
        if (positional.interactive) {
          interactiveConsumed++;
        }
      }
      argsConsumed = Math.max(argsConsumed, count);
    }

    args.splice(args.length - argsConsumed, argsConsumed);
    const from = this.position;
    this.position += argsConsumed + interactiveConsumed;
    if (argsConsumed > 1 && args.length > 0) {
      this.realignPosition(from);
    }
    logger.debug(
      `Consumed ${argsConsumed} arguments and ${interactiveConsumed} interactive values, moving position to index ${this.position}`
    );

    if (argsConsumed === 0 && interactiveConsumed === 0 && args.length > 0) {
      if (saturated && !this.spec.parser.unmatchedArgumentsAllowed) {
        const extra = args.pop();
        throw new MaxValuesExceededError(
          this.spec,
          `${describeArg(saturated, -1)} accepts at most ${saturated.arity.max} values, but found extra value '${String(extra)}'`,
          { argSpec: saturated, value: extra }
        );
      }
      this.handleUnmatchedArgument(args);
    }
  }

  /**
   * A positional that took several tokens may have moved the position past
   * the index of a later positional that is still unbound; resume there
   */
  private realignPosition(from: number): void {
    const positionals = this.spec.positionalParameters;
    if (positionals.some((positional) => positional.index.contains(this.position))) {
      return;
    }
    const skipped = positionals.find(
      (positional) =>
        positional.index.min > from && positional.index.min < this.position && positional.typedValueAtPosition.size === 0
    );
    if (skipped) {
      logger.debug(`Moving position back to index ${skipped.index.min} for ${skipped.toString()}`);
      this.position = skipped.index.min;
    }
  }

  private processStandaloneOption(arg: string, args: string[], paramAttachedToKey: boolean): void {
    const option = this.spec.optionsByName.get(arg);
    if (!option) {
      return;
    }
    removeItem(this.required, option);
    let arity = option.arity;
    if (paramAttachedToKey) {
      // key=value: at least one value
      arity = arity.withMin(Math.max(1, arity.min));
    }
    const lookBehind: LookBehind = paramAttachedToKey ? 'attached-with-separator' : 'separate';
    logger.debug(`Found option named '${arg}': ${option.toString()}, arity=${arity.toString()}`);
    this.applyOption(option, lookBehind, arity, args, this.initialized, `option ${arg}`);
  }

  private processClusteredShortOptions(arg: string, args: string[]): void {
    const prefix = arg.charAt(0);
    const separator = this.spec.parser.separator;
    let cluster = arg.slice(1);
    let paramAttachedToOption = true;

    for (;;) {
      const option = cluster.length > 0 ? this.spec.posixOptionsByKey.get(cluster.charAt(0)) : undefined;
      if (!option) {
        if (cluster.length === 0) {
          return;
        }
        // The rest is neither an option nor a value the previous option accepted
        if (arg.endsWith(cluster)) {
          args.push(paramAttachedToOption ? prefix + cluster : cluster);
          if (peek(args) === arg) {
            logger.debug(`Could not match any short options in ${arg}`);
            if (this.spec.resemblesOption(arg)) {
              this.handleUnmatchedArgument(args);
              return;
            }
            this.processPositionalParameter(args);
            return;
          }
          logger.debug(`No option found for ${cluster} in ${arg}`);
          this.handleUnmatchedArgument(args);
        } else {
          args.push(cluster);
          logger.debug(`${cluster} is not an option parameter for ${arg}`);
          this.processPositionalParameter(args);
        }
        return;
      }

      let arity = option.arity;
      const description = `option ${prefix}${cluster.charAt(0)}`;
      logger.debug(`Found option '${prefix}${cluster.charAt(0)}' in ${arg}: ${option.toString()}, arity=${arity.toString()}`);
      removeItem(this.required, option);
      cluster = cluster.slice(1);
      paramAttachedToOption = cluster.length > 0;
      let lookBehind: LookBehind = paramAttachedToOption ? 'attached' : 'separate';
      if (cluster.startsWith(separator)) {
        lookBehind = 'attached-with-separator';
        cluster = cluster.slice(separator.length);
        arity = arity.withMin(Math.max(1, arity.min));
      }
      if (!isBlank(cluster)) {
        args.push(cluster);
      }
      const argCount = args.length;
      this.applyOption(option, lookBehind, arity, args, this.initialized, description);
      if (isBlank(cluster) || args.length === 0 || args.length < argCount) {
        return;
      }
      const next = args.pop();
      if (next === undefined) {
        return;
      }
      cluster = next;
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Value Application
  // ─────────────────────────────────────────────────────────────

  /**
   * Consume values for `argSpec` from the stack and store them.
   * Returns the number of values applied.
   */
  private applyOption(
    argSpec: ArgSpec,
    lookBehind: LookBehind,
    arity: Range,
    args: string[],
    initialized: Set<ArgSpec>,
    description: string
  ): number {
    this.updateHelpRequested(argSpec);
    const consumeOnlyOne = this.spec.parser.aritySatisfiedByAttachedOptionParam && lookBehind !== 'separate';
    let workingStack = args;
    if (consumeOnlyOne) {
      const attached = args.pop();
      workingStack = attached === undefined ? args : [attached];
    } else if (!this.assertNoMissingParameters(argSpec, arity, args)) {
      return 0;
    }

    if (argSpec.interactive && !this.result.isInitializingDefaultValues) {
      const name = argSpec.isOption() ? argSpec.longestName() : `position ${this.position}`;
      const prompt = `Enter value for ${name} (${argSpec.description[0] ?? ''}): `;
      const read = this.context.readInteractive;
      if (!read) {
        return this.deferInteractiveValue(argSpec, prompt);
      }
      logger.debug(`Reading value for ${name} from the interactive reader`);
      workingStack.push(read(prompt));
    }

    const applied = this.applyValues(argSpec, lookBehind, arity, workingStack, initialized, description);

    if (workingStack !== args && workingStack.length > 0) {
      const leftover = workingStack.pop();
      if (leftover !== undefined) {
        args.push(leftover);
      }
      if (workingStack.length > 0) {
        throw new ArgBindError(`Working stack should be empty but was ${listToString(workingStack)}`);
      }
    }
    return applied;
  }

  private applyValues(
    argSpec: ArgSpec,
    lookBehind: LookBehind,
    arity: Range,
    args: string[],
    initialized: Set<ArgSpec>,
    description: string
  ): number {
    switch (argSpec.container) {
      case 'array':
      case 'set':
        return this.applyValuesToCollection(argSpec, arity, args, initialized, description);
      case 'map':
        return this.applyValuesToMap(argSpec, arity, args, initialized, description);
      default:
        return this.applyValueToSingleValuedField(argSpec, lookBehind, arity, args, initialized, description);
    }
  }

  /**
   * Record an interactive argument for which no reader is available. The
   * argument counts as matched; the value is applied later.
   */
  private deferInteractiveValue(argSpec: ArgSpec, prompt: string): number {
    const position = this.position;
    this.result.pendingInteractive.push({
      argSpec,
      commandSpec: this.spec,
      prompt,
      apply: (value: string) => {
        this.position = position;
        this.applyValues(argSpec, 'separate', argSpec.arity, [value], this.initialized, `interactive ${argSpec.toString()}`);
      },
    });
    this.result.add(argSpec, position);
    logger.debug(`No interactive reader: value for ${argSpec.toString()} is pending`);
    return 1;
  }

  private applyValueToSingleValuedField(
    argSpec: ArgSpec,
    lookBehind: LookBehind,
    derivedArity: Range,
    args: string[],
    initialized: Set<ArgSpec>,
    description: string
  ): number {
    const popped = args.pop();
    let value = popped === undefined ? undefined : this.unquote(popped);
    const arity =
      argSpec.arity.isUnspecified || this.result.isInitializingDefaultValues ? derivedArity : argSpec.arity;
    if (arity.max === 0 && !arity.isUnspecified && lookBehind === 'attached-with-separator') {
      throw new MaxValuesExceededError(
        this.spec,
        `${describeArg(argSpec, -1)} should be specified without '${String(value)}' parameter`,
        { argSpec, value }
      );
    }
    let consumed = arity.min;
    const type = argSpec.type;

    if (arity.min <= 0) {
      if (type === 'boolean') {
        const lower = value?.toLowerCase();
        if (arity.max > 0 && (lower === 'true' || lower === 'false')) {
          consumed = 1;
        } else if (lookBehind !== 'attached-with-separator') {
          // not attached: the token is not ours
          if (value !== undefined) {
            args.push(value);
          }
          value = this.spec.parser.toggleBooleanFlags ? String(argSpec.getValue() !== true) : 'true';
        }
      } else if (value === undefined || this.isOption(value)) {
        // optional value absent
        if (value !== undefined) {
          args.push(value);
        }
        value = '';
      }
    }
    if (value === undefined) {
      return 0;
    }

    const converter = this.getTypeConverter(type, argSpec, 0);
    const newValue = this.tryConvert(argSpec, -1, converter, value, type);
    const oldValue = argSpec.getValue();
    if (initialized.has(argSpec)) {
      if (!this.spec.parser.overwrittenOptionsAllowed) {
        throw new OverwrittenOptionError(this.spec, argSpec, `${describeArg(argSpec, 0)} should be specified only once`);
      }
      logger.info(
        `Overwriting ${argSpec.toString()} value '${String(oldValue)}' with '${String(newValue)}' for ${description}`
      );
    } else {
      logger.debug(`Setting ${argSpec.toString()} to '${String(newValue)}' (was '${String(oldValue)}') for ${description}`);
    }
    initialized.add(argSpec);

    argSpec.setValue(newValue);
    this.result.addOriginalStringValue(argSpec, value);
    this.result.addStringValue(argSpec, value);
    this.result.addTypedValue(argSpec, newValue);
    this.result.addTypedValueAtPosition(argSpec, this.position, newValue);
    this.result.add(argSpec, this.position);
    return consumed;
  }

  private applyValuesToCollection(
    argSpec: ArgSpec,
    arity: Range,
    args: string[],
    initialized: Set<ArgSpec>,
    description: string
  ): number {
    const existing = argSpec.getValue();
    const before = args.length;
    const converted = this.consumeArguments(argSpec, arity, args, description);
    // Values present before the first match are initial or default values and are replaced
    const keep = initialized.has(argSpec);
    initialized.add(argSpec);

    if (argSpec.container === 'set') {
      const set = new Set<unknown>(keep && existing instanceof Set ? existing : []);
      for (const value of converted) {
        set.add(value);
      }
      argSpec.setValue(set);
    } else {
      const values: unknown[] = keep && Array.isArray(existing) ? [...existing] : [];
      values.push(...converted);
      argSpec.setValue(values);
    }
    this.result.add(argSpec, this.position);
    this.noteSaturation(argSpec, before - args.length);
    return converted.length;
  }

  private applyValuesToMap(
    argSpec: ArgSpec,
    arity: Range,
    args: string[],
    initialized: Set<ArgSpec>,
    description: string
  ): number {
    const keyConverter = this.getTypeConverter(argSpec.auxiliaryTypes[0], argSpec, 0);
    const valueConverter = this.getTypeConverter(argSpec.auxiliaryTypes[1], argSpec, 1);
    const existing = argSpec.getValue();
    const map = new Map<unknown, unknown>(initialized.has(argSpec) && existing instanceof Map ? existing : []);
    initialized.add(argSpec);

    const originalSize = map.size;
    const before = args.length;
    this.consumeMapArguments(argSpec, arity, args, keyConverter, valueConverter, map, description);
    this.result.add(argSpec, this.position);
    argSpec.setValue(map);
    this.noteSaturation(argSpec, before - args.length);
    return map.size - originalSize;
  }

  /**
   * Remember an option whose declared maximum was reached, so that a
   * following stray token is reported as one value too many
   */
  private noteSaturation(argSpec: ArgSpec, tokens: number): void {
    const arity = argSpec.arity;
    if (
      argSpec.isOption() &&
      !this.result.isInitializingDefaultValues &&
      !arity.isUnspecified &&
      !arity.isVariable &&
      tokens >= arity.max
    ) {
      this.saturatedOption = argSpec;
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Multi-value Consumption
  // ─────────────────────────────────────────────────────────────

  private consumeArguments(argSpec: ArgSpec, arity: Range, args: string[], description: string): unknown[] {
    const type = argSpec.type;
    const result: unknown[] = [];
    // The same position may be consumed by several positionals
    let currentPosition = this.position;
    const initialSize = argSpec.stringValues.length;

    let consumed = this.consumedCount(0, initialSize, argSpec, 1);
    for (let i = 0; consumed < arity.min && args.length > 0; i++) {
      const atPosition: unknown[] = [];
      this.result.addTypedValueAtPosition(argSpec, currentPosition++, atPosition);
      this.assertNoMissingMandatoryParameter(argSpec, args, i, arity);
      const arg = args.pop();
      if (arg === undefined) {
        break;
      }
      this.consumeOneArgument(argSpec, arity, consumed, arg, type, atPosition, i, description);
      result.push(...atPosition);
      consumed = this.consumedCount(i + 1, initialSize, argSpec, 1);
    }

    const budget = this.varargBudget(argSpec, args);
    for (let i = consumed, taken = 0; consumed < arity.max && args.length > 0 && taken < budget; i++, taken++) {
      const next = peek(args);
      if (next === undefined || !this.varargCanConsumeNextValue(argSpec, next)) {
        break;
      }
      const atPosition: unknown[] = [];
      this.result.addTypedValueAtPosition(argSpec, currentPosition++, atPosition);
      if (!this.canConsumeOneArgument(argSpec, arity, consumed, next, type, description)) {
        // the empty entry keeps this position from being retried
        break;
      }
      args.pop();
      this.consumeOneArgument(argSpec, arity, consumed, next, type, atPosition, i, description);
      result.push(...atPosition);
      consumed = this.consumedCount(i + 1, initialSize, argSpec, 1);
    }
    return result;
  }

  /**
   * How many tokens past its minimum a positional may still take: the run
   * of value tokens on top of the stack, less what positionals with a later,
   * non-overlapping index need
   */
  private varargBudget(argSpec: ArgSpec, args: readonly string[]): number {
    if (!argSpec.isPositional()) {
      return Infinity;
    }
    let reserved = 0;
    for (const later of this.spec.positionalParameters) {
      if (later.index.min > argSpec.index.max) {
        reserved += later.arity.min;
      }
    }
    if (reserved === 0) {
      return Infinity;
    }
    let available = 0;
    for (let i = args.length - 1; i >= 0 && this.varargCanConsumeNextValue(argSpec, args[i]); i--) {
      available++;
    }
    return available - reserved;
  }

  /**
   * Values consumed so far: tokens, or split parts when splitting happens
   * before the arity check
   */
  private consumedCount(i: number, initialSize: number, argSpec: ArgSpec, stringsPerValue: number): number {
    return this.spec.parser.splitFirst ? (argSpec.stringValues.length - initialSize) / stringsPerValue : i;
  }

  private consumeOneArgument(
    argSpec: ArgSpec,
    arity: Range,
    consumed: number,
    arg: string,
    type: TypeRef,
    result: unknown[],
    index: number,
    description: string
  ): void {
    const raw = this.unquote(arg);
    const values = argSpec.splitValue(raw, this.spec.parser, arity, consumed);
    const converter = this.getTypeConverter(type, argSpec, 0);
    for (const value of values) {
      const typed = this.tryConvert(argSpec, index, converter, value, type);
      result.push(typed);
      this.result.addTypedValue(argSpec, typed);
      logger.debug(`Adding [${String(typed)}] to ${argSpec.toString()} for ${description}`);
      this.result.addStringValue(argSpec, value);
    }
    this.result.addOriginalStringValue(argSpec, raw);
  }

  private canConsumeOneArgument(
    argSpec: ArgSpec,
    arity: Range,
    consumed: number,
    arg: string,
    type: TypeRef,
    description: string
  ): boolean {
    const converter = this.getTypeConverter(type, argSpec, 0);
    try {
      for (const value of argSpec.splitValue(this.unquote(arg), this.spec.parser, arity, consumed)) {
        this.tryConvert(argSpec, -1, converter, value, type);
      }
      return true;
    } catch (error) {
      if (error instanceof ArgBindError) {
        logger.debug(`${arg} cannot be assigned to ${description}: type conversion fails: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  private consumeMapArguments(
    argSpec: ArgSpec,
    arity: Range,
    args: string[],
    keyConverter: TypeConverter,
    valueConverter: TypeConverter,
    map: Map<unknown, unknown>,
    description: string
  ): void {
    let currentPosition = this.position;
    const initialSize = argSpec.stringValues.length;

    let consumed = this.consumedCount(0, initialSize, argSpec, 2);
    for (let i = 0; consumed < arity.min && args.length > 0; i++) {
      const atPosition = new Map<unknown, unknown>();
      this.result.addTypedValueAtPosition(argSpec, currentPosition++, atPosition);
      this.assertNoMissingMandatoryParameter(argSpec, args, i, arity);
      const arg = args.pop();
      if (arg === undefined) {
        break;
      }
      this.consumeOneMapArgument(argSpec, arity, consumed, arg, keyConverter, valueConverter, atPosition, i, description);
      for (const [key, value] of atPosition) {
        map.set(key, value);
      }
      consumed = this.consumedCount(i + 1, initialSize, argSpec, 2);
    }

    const budget = this.varargBudget(argSpec, args);
    for (let i = consumed, taken = 0; consumed < arity.max && args.length > 0 && taken < budget; i++, taken++) {
      const next = peek(args);
      if (next === undefined || !this.varargCanConsumeNextValue(argSpec, next)) {
        break;
      }
      const atPosition = new Map<unknown, unknown>();
      this.result.addTypedValueAtPosition(argSpec, currentPosition++, atPosition);
      if (!this.canConsumeOneMapArgument(argSpec, arity, consumed, next, keyConverter, valueConverter, description)) {
        break;
      }
      args.pop();
      this.consumeOneMapArgument(argSpec, arity, consumed, next, keyConverter, valueConverter, atPosition, i, description);
      for (const [key, value] of atPosition) {
        map.set(key, value);
      }
      consumed = this.consumedCount(i + 1, initialSize, argSpec, 2);
    }
  }

  private consumeOneMapArgument(
    argSpec: ArgSpec,
    arity: Range,
    consumed: number,
    arg: string,
    keyConverter: TypeConverter,
    valueConverter: TypeConverter,
    result: Map<unknown, unknown>,
    index: number,
    description: string
  ): void {
    const [keyType, valueType] = argSpec.auxiliaryTypes;
    const raw = this.unquote(arg);
    for (const value of argSpec.splitValue(raw, this.spec.parser, arity, consumed)) {
      const [key, mapValue] = this.splitKeyValue(argSpec, value);
      const typedKey = this.tryConvert(argSpec, index, keyConverter, key, keyType);
      const typedValue = this.tryConvert(argSpec, index, valueConverter, mapValue, valueType);
      result.set(typedKey, typedValue);
      this.result.addTypedValue(argSpec, typedValue);
      logger.debug(`Putting [${String(typedKey)} : ${String(typedValue)}] in ${argSpec.toString()} for ${description}`);
      this.result.addStringValue(argSpec, key);
      this.result.addStringValue(argSpec, mapValue);
    }
    this.result.addOriginalStringValue(argSpec, raw);
  }

  private canConsumeOneMapArgument(
    argSpec: ArgSpec,
    arity: Range,
    consumed: number,
    raw: string,
    keyConverter: TypeConverter,
    valueConverter: TypeConverter,
    description: string
  ): boolean {
    const [keyType, valueType] = argSpec.auxiliaryTypes;
    try {
      for (const value of argSpec.splitValue(raw, this.spec.parser, arity, consumed)) {
        const [key, mapValue] = this.splitKeyValue(argSpec, value);
        this.tryConvert(argSpec, -1, keyConverter, key, keyType);
        this.tryConvert(argSpec, -1, valueConverter, mapValue, valueType);
      }
      return true;
    } catch (error) {
      if (error instanceof ArgBindError) {
        logger.debug(`${raw} cannot be assigned to ${description}: type conversion fails: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Split `KEY=VALUE` at the first `=` not escaped by a backslash
   */
  private splitKeyValue(argSpec: ArgSpec, value: string): [string, string] {
    const match = /(?<!\\)=/.exec(value);
    if (!match) {
      const format = argSpec.splitRegex.length === 0 ? 'KEY=VALUE' : `KEY=VALUE[${argSpec.splitRegex}KEY=VALUE]...`;
      throw new ParameterError(
        this.spec,
        `Value for ${describeArg(argSpec, 0)} should be in ${format} format but was ${value}`,
        { argSpec, value }
      );
    }
    return [value.slice(0, match.index).replace(/\\=/g, '='), value.slice(match.index + 1)];
  }

  // ─────────────────────────────────────────────────────────────
  // Checks
  // ─────────────────────────────────────────────────────────────

  /**
   * Whether a multi-value argument may take `next`: not an option, not a
   * subcommand. After the end-of-options delimiter positionals take anything.
   */
  private varargCanConsumeNextValue(argSpec: ArgSpec, next: string): boolean {
    if (this.endOfOptions && argSpec.isPositional()) {
      return true;
    }
    return !this.spec.subcommands.has(next) && !this.isOption(next);
  }

  /** Whether `arg` starts an option of this command, possibly with an attached value */
  private isOption(arg: string): boolean {
    if (arg === this.spec.parser.endOfOptionsDelimiter || this.spec.optionsByName.has(arg)) {
      return true;
    }
    const separatorIndex = arg.indexOf(this.spec.parser.separator);
    if (separatorIndex > 0 && this.spec.optionsByName.has(arg.slice(0, separatorIndex))) {
      return true;
    }
    return arg.length > 2 && arg.startsWith('-') && this.spec.posixOptionsByKey.has(arg.charAt(1));
  }

  private assertNoMissingMandatoryParameter(argSpec: ArgSpec, args: readonly string[], i: number, arity: Range): void {
    const next = peek(args);
    if (next !== undefined && !this.varargCanConsumeNextValue(argSpec, next)) {
      const desc = arity.min > 1 ? `${i + 1} (of ${arity.min} mandatory parameters) ` : '';
      throw new MissingParameterError(
        this.spec,
        [argSpec],
        `Expected parameter ${desc}for ${describeArg(argSpec, -1)} but found '${next}'`
      );
    }
  }

  /**
   * Report a MissingParameterError if fewer tokens remain than `arity`
   * requires. Returns false if one was reported.
   */
  private assertNoMissingParameters(argSpec: ArgSpec, arity: Range, args: readonly string[]): boolean {
    if (argSpec.interactive) {
      return true;
    }
    const parser = this.spec.parser;
    let available = args.length;
    const top = peek(args);
    if (top !== undefined && parser.splitFirst && argSpec.splitRegex.length > 0) {
      available += argSpec.splitValue(top, parser, arity, 0).length - 1;
    }
    if (arity.min <= available) {
      return true;
    }

    if (arity.min === 1) {
      if (argSpec.isOption()) {
        this.strategy.report(
          new MissingParameterError(this.spec, [argSpec], `Missing required parameter for ${describeArg(argSpec, 0)}`)
        );
        return false;
      }
      const positionals = this.spec.positionalParameters;
      const start = argSpec.isPositional() ? argSpec.index.min : 0;
      const names: string[] = [];
      for (let i = start; i < positionals.length; i++) {
        if (positionals[i].arity.min > 0) {
          names.push(positionals[i].paramLabel);
        }
      }
      const plural = names.length > 1 || arity.min - available > 1 ? 's' : '';
      this.strategy.report(
        new MissingParameterError(this.spec, [argSpec], `Missing required parameter${plural}: ${names.join(', ')}`)
      );
    } else if (args.length === 0) {
      this.strategy.report(
        new MissingParameterError(
          this.spec,
          [argSpec],
          `${describeArg(argSpec, 0)} requires at least ${arity.min} values, but none were specified.`
        )
      );
    } else {
      this.strategy.report(
        new MissingParameterError(
          this.spec,
          [argSpec],
          `${describeArg(argSpec, 0)} requires at least ${arity.min} values, but only ${available} were specified: ${remainder(args)}`
        )
      );
    }
    return false;
  }

  /**
   * Required arguments that received no value. Skipped when help was
   * requested anywhere in the chain.
   */
  private checkRequired(args: readonly string[]): void {
    if (this.isAnyHelpRequested() || this.required.length === 0) {
      return;
    }
    if (this.required.some((arg) => arg.isOption())) {
      this.strategy.report(MissingParameterError.create(this.spec, this.required, this.spec.parser.separator));
    }
    for (const missing of this.required) {
      if (missing.isPositional()) {
        this.assertNoMissingParameters(missing, missing.arity, args);
      }
    }
  }

  private checkUnmatched(): void {
    const unmatched = [...this.result.unmatched];
    if (unmatched.length === 0) {
      return;
    }
    for (const binding of this.spec.unmatchedArgsBindings) {
      binding.addAll([...unmatched]);
    }
    if (!this.spec.parser.unmatchedArgumentsAllowed) {
      this.strategy.report(new UnmatchedArgumentError(this.spec, unmatched));
      return;
    }
    logger.info(`Unmatched arguments: ${listToString(unmatched)}`);
  }

  private isAnyHelpRequested(): boolean {
    return this.context.chain.helpRequested || this.result.usageHelpRequested || this.result.versionHelpRequested;
  }

  private updateHelpRequested(argSpec: ArgSpec): void {
    if (this.result.isInitializingDefaultValues || !argSpec.isOption()) {
      return;
    }
    if (argSpec.usageHelp) {
      this.result.usageHelpRequested = true;
    }
    if (argSpec.versionHelp) {
      this.result.versionHelpRequested = true;
    }
    if (argSpec.help || argSpec.usageHelp || argSpec.versionHelp) {
      this.context.chain.helpRequested = true;
      logger.info(`${argSpec.toString()} requests help: not validating required arguments`);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Conversion
  // ─────────────────────────────────────────────────────────────

  /**
   * Converter for element `index` of `argSpec`: the argument's own, then
   * the command's registry, then an enum converter
   */
  private getTypeConverter(type: TypeRef, argSpec: ArgSpec, index: number): TypeConverter {
    if (argSpec.converters.length > index) {
      return argSpec.converters[index];
    }
    const registered = this.spec.converters.get(type);
    if (registered) {
      return registered;
    }
    if (isEnumType(type)) {
      return createEnumConverter(type, this.spec.parser.caseInsensitiveEnumValuesAllowed);
    }
    throw new MissingTypeConverterError(
      this.spec,
      `No TypeConverter registered for ${typeName(type)} of ${argSpec.toString()}`,
      { argSpec }
    );
  }

  private tryConvert(argSpec: ArgSpec, index: number, converter: TypeConverter, value: string, type: TypeRef): unknown {
    try {
      return converter(value);
    } catch (error) {
      const desc = describeArg(argSpec, index);
      if (error instanceof TypeConversionError) {
        throw new ParameterError(this.spec, `Invalid value for ${desc}: ${error.message}`, {
          argSpec,
          value,
          cause: error,
        });
      }
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new ParameterError(
        this.spec,
        `Invalid value for ${desc}: cannot convert '${value}' to ${typeName(type)} (${reason})`,
        { argSpec, value, cause: error }
      );
    }
  }

  private unquote(value: string): string {
    if (this.spec.parser.trimQuotes && value.length > 1 && value.startsWith('"') && value.endsWith('"')) {
      return value.slice(1, -1);
    }
    return value;
  }
}
