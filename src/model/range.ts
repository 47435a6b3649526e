/**
 * Range
 *
 * Integer interval used for arity (how many tokens an argument consumes)
 * and positional index (which token positions a positional claims).
 * A range whose maximum is unbounded is "variable" and prints as `N..*`.
 */

import { InitializationError } from '../errors/index.js';

const RANGE_PATTERN = /^(\d+)(?:\.\.(\d+|\*))?$/;

export class Range {
  readonly min: number;
  /** Infinity when the range is variable */
  readonly max: number;
  readonly isVariable: boolean;
  /** True when the range was defaulted rather than declared */
  readonly isUnspecified: boolean;
  readonly originalValue: string;

  constructor(min: number, max: number, isUnspecified = false, originalValue?: string) {
    if (min < 0 || max < 0) {
      throw new InitializationError(`Invalid negative range (min=${min}, max=${max})`);
    }
    if (min > max) {
      throw new InitializationError(`Invalid range (min=${min}, max=${max})`);
    }
    this.min = min;
    this.max = max;
    this.isVariable = max === Infinity;
    this.isUnspecified = isUnspecified;
    this.originalValue = originalValue ?? this.toString();
  }

  /**
   * Parse `N`, `N..M`, `N..*` or `*`. An empty string gives an unspecified `0..*`.
   *
   * @throws {InitializationError} If the string is not a range
   */
  static valueOf(range: string): Range {
    const value = range.trim();
    if (value === '') {
      return new Range(0, Infinity, true, range);
    }
    if (value === '*') {
      return new Range(0, Infinity, false, range);
    }
    const match = RANGE_PATTERN.exec(value);
    if (!match) {
      throw new InitializationError(`Invalid range string '${range}'`);
    }
    const min = Number.parseInt(match[1], 10);
    const upper = match[2];
    if (upper === undefined) {
      return new Range(min, min, false, range);
    }
    return new Range(min, upper === '*' ? Infinity : Number.parseInt(upper, 10), false, range);
  }

  /** Accept either a Range or its string form */
  static from(range: Range | string): Range {
    return typeof range === 'string' ? Range.valueOf(range) : range;
  }

  static of(min: number, max: number = min): Range {
    return new Range(min, max);
  }

  /**
   * Total number of tokens a positional with this arity can consume over
   * its index range
   */
  static parameterCapacity(arity: Range, index: Range): Range {
    if (arity.max === 0) {
      return arity;
    }
    if (index.size() === 1) {
      return arity;
    }
    if (index.isVariable) {
      return Range.valueOf(`${arity.min}..*`);
    }
    if (arity.size() === 1) {
      return Range.of(arity.min * index.size());
    }
    if (arity.isVariable) {
      return Range.valueOf(`${arity.min * index.size()}..*`);
    }
    return Range.of(arity.min * index.size(), arity.max * index.size());
  }

  /** Copy with a new minimum; the maximum grows if needed */
  withMin(min: number): Range {
    return new Range(min, Math.max(this.max, min), this.isUnspecified);
  }

  /** Copy with a new maximum; the minimum shrinks if needed */
  withMax(max: number): Range {
    return new Range(Math.min(this.min, max), max, this.isUnspecified);
  }

  withUnspecified(isUnspecified: boolean): Range {
    return new Range(this.min, this.max, isUnspecified, this.originalValue);
  }

  contains(value: number): boolean {
    return this.min <= value && value <= this.max;
  }

  size(): number {
    return 1 + this.max - this.min;
  }

  equals(other: Range): boolean {
    return this.min === other.min && this.max === other.max && this.isVariable === other.isVariable;
  }

  compareTo(other: Range): number {
    const byMin = this.min - other.min;
    if (byMin !== 0) {
      return byMin;
    }
    if (this.max === other.max) {
      return 0;
    }
    return this.max < other.max ? -1 : 1;
  }

  toString(): string {
    return this.min === this.max ? String(this.min) : `${this.min}..${this.isVariable ? '*' : this.max}`;
  }
}
