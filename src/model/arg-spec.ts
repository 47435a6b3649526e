/**
 * Argument Specification
 *
 * Base of OptionSpec and PositionalParamSpec: arity, element types, split
 * policy, defaults, binding, and the values captured during a parse.
 */

import { Range } from './range.js';
import { ObjectBinding } from './bindings.js';
import { isEnumType, typeName } from '../convert/enums.js';
import { InitializationError } from '../errors/index.js';
import { compileSplitRegex, splitValue } from '../parser/split.js';
import { isBlank } from '../utils.js';
import type { Binding, ContainerKind, TypeConverter, TypeRef } from '../types/index.js';
import type { CommandSpec } from './command-spec.js';
import type { OptionSpec } from './option-spec.js';
import type { ParserSpec } from './parser-spec.js';
import type { PositionalParamSpec } from './positional-param-spec.js';

/**
 * Mutable state shared by the argument builders
 */
export interface ArgSettings {
  description: string[];
  paramLabel: string | undefined;
  hidden: boolean;
  interactive: boolean;
  required: boolean;
  splitRegex: string;
  container: ContainerKind | undefined;
  auxiliaryTypes: TypeRef[];
  converters: TypeConverter[];
  completionCandidates: string[] | undefined;
  defaultValue: string | undefined;
  initialValue: unknown;
  hasInitialValue: boolean;
  binding: Binding | undefined;
  arity: Range | undefined;
  toString: string | undefined;
}

function defaultSettings(): ArgSettings {
  return {
    description: [],
    paramLabel: undefined,
    hidden: false,
    interactive: false,
    required: false,
    splitRegex: '',
    container: undefined,
    auxiliaryTypes: [],
    converters: [],
    completionCandidates: undefined,
    defaultValue: undefined,
    initialValue: undefined,
    hasInitialValue: true,
    binding: undefined,
    arity: undefined,
    toString: undefined,
  };
}

function copySettings(settings: ArgSettings): ArgSettings {
  return {
    ...settings,
    description: [...settings.description],
    auxiliaryTypes: [...settings.auxiliaryTypes],
    converters: [...settings.converters],
    completionCandidates: settings.completionCandidates && [...settings.completionCandidates],
  };
}

// ─────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────

/**
 * Fluent builder shared by options and positional parameters
 */
export abstract class ArgSpecBuilder<B extends ArgSpecBuilder<B>> {
  readonly settings: ArgSettings;

  protected constructor(settings?: ArgSettings) {
    this.settings = settings ? copySettings(settings) : defaultSettings();
  }

  protected abstract self(): B;

  arity(range: Range | string): B {
    this.settings.arity = Range.from(range);
    return this.self();
  }

  /** Element type of the argument */
  type(type: TypeRef): B {
    this.settings.auxiliaryTypes = [type];
    return this.self();
  }

  /**
   * Container the values are collected in, with optional element types
   * (key and value type for maps)
   */
  container(kind: ContainerKind, ...auxiliaryTypes: TypeRef[]): B {
    this.settings.container = kind;
    if (auxiliaryTypes.length > 0) {
      this.settings.auxiliaryTypes = auxiliaryTypes;
    }
    return this.self();
  }

  auxiliaryTypes(...types: TypeRef[]): B {
    this.settings.auxiliaryTypes = types;
    return this.self();
  }

  required(required = true): B {
    this.settings.required = required;
    return this.self();
  }

  defaultValue(value: string | undefined): B {
    this.settings.defaultValue = value;
    return this.self();
  }

  initialValue(value: unknown): B {
    this.settings.initialValue = value;
    this.settings.hasInitialValue = true;
    return this.self();
  }

  /** Whether the binding is reset to the initial value before each parse */
  hasInitialValue(reset: boolean): B {
    this.settings.hasInitialValue = reset;
    return this.self();
  }

  splitRegex(regex: string): B {
    this.settings.splitRegex = regex;
    return this.self();
  }

  paramLabel(label: string): B {
    this.settings.paramLabel = label;
    return this.self();
  }

  description(...lines: string[]): B {
    this.settings.description = lines;
    return this.self();
  }

  hidden(hidden = true): B {
    this.settings.hidden = hidden;
    return this.self();
  }

  interactive(interactive = true): B {
    this.settings.interactive = interactive;
    return this.self();
  }

  /** Converters per element index, overriding the registry */
  converters(...converters: TypeConverter[]): B {
    this.settings.converters = converters;
    return this.self();
  }

  completionCandidates(candidates: Iterable<string>): B {
    this.settings.completionCandidates = [...candidates];
    return this.self();
  }

  binding(binding: Binding): B {
    this.settings.binding = binding;
    return this.self();
  }

  /** Text returned by toString() of the built spec */
  withToString(text: string): B {
    this.settings.toString = text;
    return this.self();
  }
}

// ─────────────────────────────────────────────────────────────
// ArgSpec
// ─────────────────────────────────────────────────────────────

export abstract class ArgSpec {
  readonly description: readonly string[];
  readonly paramLabel: string;
  readonly hidden: boolean;
  readonly interactive: boolean;
  /** False whenever a default value exists */
  readonly required: boolean;
  readonly splitRegex: string;
  readonly container: ContainerKind;
  readonly auxiliaryTypes: readonly TypeRef[];
  readonly converters: readonly TypeConverter[];
  readonly completionCandidates: readonly string[] | undefined;
  readonly defaultValue: string | undefined;
  readonly initialValue: unknown;
  readonly hasInitialValue: boolean;
  readonly binding: Binding;
  readonly arity: Range;
  protected readonly label: string | undefined;

  /** Owning command, set when the spec is added to one */
  commandSpec: CommandSpec | undefined;

  // Values captured by the current parse
  stringValues: string[] = [];
  originalStringValues: string[] = [];
  typedValues: unknown[] = [];
  typedValueAtPosition = new Map<number, unknown>();

  protected constructor(settings: ArgSettings, kind: 'option' | 'positional') {
    this.description = settings.description;
    this.splitRegex = settings.splitRegex;
    if (this.splitRegex !== '') {
      try {
        compileSplitRegex(this.splitRegex);
      } catch (error) {
        throw new InitializationError(
          `Invalid split regex '${this.splitRegex}' for ${settings.toString ?? kind}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          { cause: error }
        );
      }
    }
    this.paramLabel =
      settings.paramLabel === undefined || isBlank(settings.paramLabel) ? 'PARAM' : settings.paramLabel;
    this.converters = settings.converters;
    this.hidden = settings.hidden;
    this.interactive = settings.interactive;
    this.required = settings.required && settings.defaultValue === undefined;
    this.defaultValue = settings.defaultValue;
    this.initialValue = settings.initialValue;
    this.hasInitialValue = settings.hasInitialValue;
    this.label = settings.toString;
    this.binding = settings.binding ?? new ObjectBinding(settings.initialValue);

    const declaredTypes = settings.auxiliaryTypes;
    const untyped = settings.container === undefined && declaredTypes.length === 0;
    const singleBoolean = (settings.container ?? 'single') === 'single' && declaredTypes[0] === 'boolean';
    this.arity =
      settings.arity ??
      Range.valueOf(kind === 'option' && (untyped || singleBoolean) ? '0' : '1').withUnspecified(true);

    let container = settings.container;
    let auxiliaryTypes = declaredTypes;
    if (container === undefined) {
      if (declaredTypes.length > 0) {
        container = 'single';
      } else if (this.arity.isVariable || this.arity.max > 1) {
        container = 'array';
      } else {
        container = 'single';
        if (this.arity.max === 0 && kind === 'option') {
          auxiliaryTypes = ['boolean'];
        }
      }
    }
    if (auxiliaryTypes.length === 0) {
      auxiliaryTypes = container === 'map' ? ['string', 'string'] : ['string'];
    }
    if (container === 'map' && auxiliaryTypes.length !== 2) {
      throw new InitializationError(
        `Map-valued ${settings.toString ?? kind} needs a key type and a value type, not ${auxiliaryTypes.length} type(s)`
      );
    }
    this.container = container;
    this.auxiliaryTypes = auxiliaryTypes;

    const elementType = auxiliaryTypes[0];
    this.completionCandidates =
      settings.completionCandidates ?? (isEnumType(elementType) ? [...elementType.constants] : undefined);

    if (this.interactive && (this.arity.min !== 1 || this.arity.max !== 1)) {
      throw new InitializationError(
        `Interactive options and positional parameters are only supported for arity=1, not for arity=${this.arity.toString()}`
      );
    }
  }

  abstract isOption(): this is OptionSpec;

  abstract isPositional(): this is PositionalParamSpec;

  /** Element type (key type for maps) */
  get type(): TypeRef {
    return this.auxiliaryTypes[0];
  }

  get typeName(): string {
    return typeName(this.type);
  }

  isMultiValue(): boolean {
    return this.container !== 'single';
  }

  /** True for single-valued boolean arguments */
  isBoolean(): boolean {
    return this.container === 'single' && this.type === 'boolean';
  }

  getValue(): unknown {
    return this.binding.get();
  }

  setValue(value: unknown): void {
    this.binding.set(value);
  }

  /**
   * Split a raw value with this argument's split regex. Under the
   * limit-split policy the number of parts is capped to the arity that is
   * still available.
   */
  splitValue(value: string, parser: ParserSpec, arity: Range, consumed: number): string[] {
    const limit = parser.limitSplit ? Math.max(arity.max - consumed, 0) : 0;
    return splitValue(value, this.splitRegex, {
      limit,
      splitQuotedStrings: parser.splitQuotedStrings,
      trimQuotes: parser.trimQuotes,
      label: this.toString(),
    });
  }

  /** Clear the values captured by a previous parse */
  resetValues(): void {
    this.stringValues = [];
    this.originalStringValues = [];
    this.typedValues = [];
    this.typedValueAtPosition = new Map();
  }

  toString(): string {
    return this.label ?? this.describe();
  }

  /** Builder settings reproducing this spec; the binding is shared */
  protected toSettings(): ArgSettings {
    return {
      description: [...this.description],
      paramLabel: this.paramLabel,
      hidden: this.hidden,
      interactive: this.interactive,
      required: this.required,
      splitRegex: this.splitRegex,
      container: this.container,
      auxiliaryTypes: [...this.auxiliaryTypes],
      converters: [...this.converters],
      completionCandidates: this.completionCandidates && [...this.completionCandidates],
      defaultValue: this.defaultValue,
      initialValue: this.initialValue,
      hasInitialValue: this.hasInitialValue,
      binding: this.binding,
      arity: this.arity,
      toString: this.label,
    };
  }

  protected abstract describe(): string;
}
