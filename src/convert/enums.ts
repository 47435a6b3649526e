/**
 * Enumeration Types
 */

import { TypeConversionError } from '../errors/index.js';
import { listToString } from '../utils.js';
import type { EnumType, TypeConverter, TypeRef } from '../types/index.js';

/**
 * Create an enumeration type from a TypeScript enum object or a list of
 * constant names. Reverse-mapping keys of numeric enums are skipped.
 *
 * @example
 * enum Level { Low, High }
 * enumType('Level', Level)        // constants: ['Low', 'High']
 * enumType('Color', ['RED', 'GREEN'])
 */
export function enumType(name: string, source: Record<string, string | number> | readonly string[]): EnumType {
  const values = new Map<string, unknown>();
  if (isConstantList(source)) {
    for (const constant of source) {
      values.set(constant, constant);
    }
  } else {
    for (const [key, value] of Object.entries(source)) {
      if (Number.isNaN(Number(key))) {
        values.set(key, value);
      }
    }
  }
  return { kind: 'enum', name, constants: [...values.keys()], values };
}

function isConstantList(source: Record<string, string | number> | readonly string[]): source is readonly string[] {
  return Array.isArray(source);
}

export function isEnumType(type: TypeRef): type is EnumType {
  return typeof type !== 'string';
}

/** Display name of a type reference */
export function typeName(type: TypeRef): string {
  return typeof type === 'string' ? type : type.name;
}

/**
 * Converter matching a value against the constant names of `type`,
 * exactly or ignoring case
 */
export function createEnumConverter(type: EnumType, caseInsensitive: boolean): TypeConverter {
  return (value: string) => {
    if (type.values.has(value)) {
      return type.values.get(value);
    }
    if (caseInsensitive) {
      const upper = value.toUpperCase();
      const constant = type.constants.find((c) => c.toUpperCase() === upper);
      if (constant !== undefined) {
        return type.values.get(constant);
      }
    }
    throw new TypeConversionError(`expected one of ${listToString(type.constants)} but was '${value}'`);
  };
}
