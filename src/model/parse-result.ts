/**
 * Parse Result
 *
 * What one command level matched during a parse. Results of nested
 * subcommands hang off `subcommand`.
 */

import type { ArgSpec } from './arg-spec.js';
import type { CommandSpec } from './command-spec.js';
import type { OptionSpec } from './option-spec.js';
import type { PositionalParamSpec } from './positional-param-spec.js';
import type { ParameterError } from '../errors/index.js';
import { camelCase, stripPrefix } from '../utils.js';

/**
 * Interactive argument matched without a reader; resolved after the parse
 */
export interface PendingInteractiveValue {
  readonly argSpec: ArgSpec;
  readonly commandSpec: CommandSpec;
  /** Prompt text for the value */
  readonly prompt: string;
  /** Convert and store an entered value */
  apply(value: string): void;
}

export class ParseResultBuilder {
  readonly commandSpec: CommandSpec;
  private readonly options = new Set<OptionSpec>();
  private readonly positionals = new Set<PositionalParamSpec>();
  private readonly positionalsAtPosition: PositionalParamSpec[][] = [];
  readonly unmatched: string[] = [];
  readonly originalArgs: string[] = [];
  readonly errors: ParameterError[] = [];
  readonly pendingInteractive: PendingInteractiveValue[] = [];
  subcommandResult: ParseResult | undefined;
  usageHelpRequested = false;
  versionHelpRequested = false;
  /** While true, nothing is recorded as matched */
  isInitializingDefaultValues = false;

  constructor(commandSpec: CommandSpec, originalArgs: readonly string[] = []) {
    this.commandSpec = commandSpec;
    this.originalArgs.push(...originalArgs);
  }

  add(arg: ArgSpec, position: number): ParseResultBuilder {
    if (this.isInitializingDefaultValues) {
      return this;
    }
    if (arg.isOption()) {
      this.options.add(arg);
    } else if (arg.isPositional()) {
      this.positionals.add(arg);
      while (this.positionalsAtPosition.length <= position) {
        this.positionalsAtPosition.push([]);
      }
      this.positionalsAtPosition[position].push(arg);
    }
    return this;
  }

  addUnmatched(arg: string): ParseResultBuilder {
    this.unmatched.push(arg);
    return this;
  }

  /** Move all remaining tokens of a stack (top first) to unmatched */
  addUnmatchedStack(args: string[]): ParseResultBuilder {
    while (args.length > 0) {
      const arg = args.pop();
      if (arg !== undefined) {
        this.unmatched.push(arg);
      }
    }
    return this;
  }

  addStringValue(argSpec: ArgSpec, value: string): void {
    if (!this.isInitializingDefaultValues) {
      argSpec.stringValues.push(value);
    }
  }

  addOriginalStringValue(argSpec: ArgSpec, value: string): void {
    if (!this.isInitializingDefaultValues) {
      argSpec.originalStringValues.push(value);
    }
  }

  addTypedValue(argSpec: ArgSpec, value: unknown): void {
    if (!this.isInitializingDefaultValues) {
      argSpec.typedValues.push(value);
    }
  }

  /** Record what was bound at a command-line position; collections record their per-position values */
  addTypedValueAtPosition(argSpec: ArgSpec, position: number, value: unknown): void {
    if (!this.isInitializingDefaultValues) {
      argSpec.typedValueAtPosition.set(position, value);
    }
  }

  addError(error: ParameterError): void {
    this.errors.push(error);
  }

  build(): ParseResult {
    return new ParseResult({
      commandSpec: this.commandSpec,
      matchedOptions: [...this.options],
      matchedPositionals: [...this.positionals],
      positionalsAtPosition: this.positionalsAtPosition.map((list) => [...list]),
      unmatched: [...this.unmatched],
      originalArgs: [...this.originalArgs],
      errors: [...this.errors],
      pendingInteractive: [...this.pendingInteractive],
      subcommand: this.subcommandResult,
      usageHelpRequested: this.usageHelpRequested,
      versionHelpRequested: this.versionHelpRequested,
    });
  }
}

interface ParseResultData {
  commandSpec: CommandSpec;
  matchedOptions: OptionSpec[];
  matchedPositionals: PositionalParamSpec[];
  positionalsAtPosition: PositionalParamSpec[][];
  unmatched: string[];
  originalArgs: string[];
  errors: ParameterError[];
  pendingInteractive: PendingInteractiveValue[];
  subcommand: ParseResult | undefined;
  usageHelpRequested: boolean;
  versionHelpRequested: boolean;
}

export class ParseResult {
  readonly commandSpec: CommandSpec;
  /** Options matched on the command line, in match order */
  readonly matchedOptions: readonly OptionSpec[];
  /** Positional parameters that received a value, without duplicates */
  readonly matchedPositionals: readonly PositionalParamSpec[];
  readonly unmatched: readonly string[];
  readonly originalArgs: readonly string[];
  /** Errors collected at this level in collect-errors mode */
  readonly errors: readonly ParameterError[];
  readonly pendingInteractive: readonly PendingInteractiveValue[];
  readonly subcommand: ParseResult | undefined;
  readonly isUsageHelpRequested: boolean;
  readonly isVersionHelpRequested: boolean;
  private readonly positionalsAtPosition: readonly (readonly PositionalParamSpec[])[];

  constructor(data: ParseResultData) {
    this.commandSpec = data.commandSpec;
    this.matchedOptions = data.matchedOptions;
    this.matchedPositionals = data.matchedPositionals;
    this.positionalsAtPosition = data.positionalsAtPosition;
    this.unmatched = data.unmatched;
    this.originalArgs = data.originalArgs;
    this.errors = data.errors;
    this.pendingInteractive = data.pendingInteractive;
    this.subcommand = data.subcommand;
    this.isUsageHelpRequested = data.usageHelpRequested;
    this.isVersionHelpRequested = data.versionHelpRequested;
  }

  /**
   * Matched option by name (with or without prefix) or single-character key
   */
  matchedOption(name: string): OptionSpec | undefined {
    if (name.length === 1) {
      const byKey = this.matchedOptions.find((option) =>
        option.names.some((n) => n === `-${name}` || n === name)
      );
      if (byKey) {
        return byKey;
      }
    }
    return this.matchedOptions.find((option) => option.names.some((n) => n === name || stripPrefix(n) === name));
  }

  hasMatchedOption(option: string | OptionSpec): boolean {
    return typeof option === 'string'
      ? this.matchedOption(option) !== undefined
      : this.matchedOptions.includes(option);
  }

  /** Value of a matched option, or `fallback` if it was not matched */
  matchedOptionValue(name: string, fallback?: unknown): unknown {
    const option = this.matchedOption(name);
    return option ? option.getValue() : fallback;
  }

  /** First positional parameter that took the token at `position` */
  matchedPositional(position: number): PositionalParamSpec | undefined {
    return this.positionalsAtPosition[position]?.[0];
  }

  /** All positional parameters that took the token at `position` */
  matchedPositionalsAt(position: number): readonly PositionalParamSpec[] {
    return this.positionalsAtPosition[position] ?? [];
  }

  hasMatchedPositional(positional: number | PositionalParamSpec): boolean {
    return typeof positional === 'number'
      ? this.matchedPositional(positional) !== undefined
      : this.matchedPositionals.includes(positional);
  }

  matchedPositionalValue(position: number, fallback?: unknown): unknown {
    const positional = this.matchedPositional(position);
    return positional ? positional.getValue() : fallback;
  }

  hasSubcommand(): boolean {
    return this.subcommand !== undefined;
  }

  /** This result followed by the results of the subcommand chain */
  asList(): ParseResult[] {
    const results: ParseResult[] = [];
    for (let result: ParseResult | undefined = this; result; result = result.subcommand) {
      results.push(result);
    }
    return results;
  }

  /** Command specs of the invoked chain, outermost first */
  asCommandList(): CommandSpec[] {
    return this.asList().map((result) => result.commandSpec);
  }

  /** Errors of this level and every subcommand level */
  allErrors(): ParameterError[] {
    return this.asList().flatMap((result) => [...result.errors]);
  }

  /** Pending interactive values of this level and every subcommand level */
  allPendingInteractive(): PendingInteractiveValue[] {
    return this.asList().flatMap((result) => [...result.pendingInteractive]);
  }

  /**
   * Bound values of this command level as a plain record. Options are
   * keyed by their longest name in camelCase, positionals by label.
   */
  values(): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const arg of this.commandSpec.args) {
      const key = arg.isOption()
        ? camelCase(stripPrefix(arg.longestName()))
        : camelCase(arg.paramLabel.toLowerCase());
      record[key] = arg.getValue();
    }
    return record;
  }
}
