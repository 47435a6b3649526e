/**
 * Built-in Type Converters
 *
 * Converters registered by default, keyed by type name.
 */

import path from 'node:path';
import { TypeConversionError } from '../errors/index.js';
import type { TypeConverter } from '../types/index.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)[fFdD]?$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function fail(value: string, type: string, article = 'a'): TypeConversionError {
  return new TypeConversionError(`'${value}' is not ${article} ${type}`);
}

/**
 * Integer converter accepting values within [min, max]
 */
function boundedInteger(type: string, min: number, max: number, article = 'a'): TypeConverter<number> {
  return (value: string) => {
    if (!INTEGER_PATTERN.test(value)) {
      throw fail(value, type, article);
    }
    const result = Number.parseInt(value, 10);
    if (result < min || result > max) {
      throw fail(value, type, article);
    }
    return result;
  };
}

function floatingPoint(type: string): TypeConverter<number> {
  return (value: string) => {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      throw fail(value, type);
    }
    return Number.parseFloat(trimmed.replace(/^\+/, '').replace(/[fFdD]$/, ''));
  };
}

function bigInteger(type: string, bits?: number): TypeConverter<bigint> {
  return (value: string) => {
    if (!INTEGER_PATTERN.test(value)) {
      throw fail(value, type);
    }
    const result = BigInt(value.startsWith('+') ? value.slice(1) : value);
    if (bits !== undefined && BigInt.asIntN(bits, result) !== result) {
      throw fail(value, type);
    }
    return result;
  };
}

function toBoolean(value: string): boolean {
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }
  throw fail(value, 'boolean');
}

function toChar(value: string): string {
  if ([...value].length !== 1) {
    throw new TypeConversionError(`'${value}' is not a single character`);
  }
  return value;
}

function toDate(value: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (match) {
    const [year, month, day] = [match[1], match[2], match[3]].map((part) => Number.parseInt(part, 10));
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day) {
      return date;
    }
  }
  throw new TypeConversionError(`'${value}' is not a yyyy-MM-dd date`);
}

function toDateTime(value: string): Date {
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new TypeConversionError(`'${value}' is not an ISO-8601 date-time`);
  }
  return new Date(millis);
}

function toUuid(value: string): string {
  if (!UUID_PATTERN.test(value)) {
    throw fail(value, 'uuid');
  }
  return value.toLowerCase();
}

function toCharset(value: string): BufferEncoding {
  if (!Buffer.isEncoding(value)) {
    throw fail(value, 'charset');
  }
  return value;
}

/**
 * Type name -> converter for every built-in type
 */
export const BUILT_IN_CONVERTERS: Readonly<Record<string, TypeConverter>> = {
  string: (value) => value,
  char: toChar,
  boolean: toBoolean,
  byte: boundedInteger('byte', -128, 127),
  short: boundedInteger('short', -32768, 32767),
  int: boundedInteger('int', -2147483648, 2147483647, 'an'),
  integer: boundedInteger('integer', Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER, 'an'),
  long: bigInteger('long', 64),
  bigint: bigInteger('bigint'),
  float: floatingPoint('float'),
  double: floatingPoint('double'),
  number: floatingPoint('number'),
  date: toDate,
  datetime: toDateTime,
  url: (value) => new URL(value),
  regexp: (value) => new RegExp(value),
  uuid: toUuid,
  charset: toCharset,
  path: (value) => path.normalize(value),
};
