/**
 * Positional Parameter Specification
 */

import { ArgSpec, ArgSpecBuilder } from './arg-spec.js';
import type { ArgSettings } from './arg-spec.js';
import { Range } from './range.js';
import type { OptionSpec } from './option-spec.js';

export class PositionalParamSpecBuilder extends ArgSpecBuilder<PositionalParamSpecBuilder> {
  indexRange: Range | undefined;

  constructor(settings?: ArgSettings, index?: Range) {
    super(settings);
    this.indexRange = index;
  }

  protected self(): PositionalParamSpecBuilder {
    return this;
  }

  /** Argument positions this parameter claims; defaults to all (`*`) */
  index(index: Range | string): PositionalParamSpecBuilder {
    this.indexRange = Range.from(index);
    return this;
  }

  build(): PositionalParamSpec {
    return new PositionalParamSpec(this);
  }
}

export class PositionalParamSpec extends ArgSpec {
  readonly index: Range;
  /** Number of tokens this parameter can take over its whole index range */
  readonly capacity: Range;

  constructor(builder: PositionalParamSpecBuilder) {
    super(builder.settings, 'positional');
    this.index = builder.indexRange ?? Range.valueOf('*');
    this.capacity = Range.parameterCapacity(this.arity, this.index);
  }

  static builder(): PositionalParamSpecBuilder {
    return new PositionalParamSpecBuilder();
  }

  toBuilder(): PositionalParamSpecBuilder {
    return new PositionalParamSpecBuilder(this.toSettings(), this.index);
  }

  isOption(): this is OptionSpec {
    return false;
  }

  isPositional(): this is PositionalParamSpec {
    return true;
  }

  protected describe(): string {
    return `positional parameter[${this.index.toString()}]`;
  }
}

/**
 * Order for positional parameters: by index, then by arity. Options sort
 * as if at index 0.
 */
export function compareArgSpecs(a: ArgSpec, b: ArgSpec): number {
  const OPTION_INDEX = Range.of(0);
  const indexA = a.isPositional() ? a.index : OPTION_INDEX;
  const indexB = b.isPositional() ? b.index : OPTION_INDEX;
  const byIndex = indexA.compareTo(indexB);
  return byIndex === 0 ? a.arity.compareTo(b.arity) : byIndex;
}
