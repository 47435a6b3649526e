/**
 * Tests for type converters
 * @module tests/converters.test
 */

import { describe, it, expect, afterEach } from 'vitest';
import { BUILT_IN_CONVERTERS } from '../src/convert/builtins.js';
import { TypeConverterRegistry, getConverterExcludesFromEnv } from '../src/convert/registry.js';
import { createEnumConverter, enumType, isEnumType, typeName } from '../src/convert/enums.js';
import { InitializationError, TypeConversionError } from '../src/errors/index.js';

enum Level {
  Low,
  High,
}

function convert(type: string, value: string): unknown {
  return BUILT_IN_CONVERTERS[type](value);
}

describe('built-in converters', () => {
  it('should convert integers within their bounds', () => {
    expect(convert('int', '42')).toBe(42);
    expect(convert('int', '+7')).toBe(7);
    expect(convert('byte', '-128')).toBe(-128);
    expect(convert('short', '32767')).toBe(32767);
  });

  it('should reject integers out of bounds or malformed', () => {
    expect(() => convert('int', 'x')).toThrow("'x' is not an int");
    expect(() => convert('int', '1.5')).toThrow("'1.5' is not an int");
    expect(() => convert('byte', '128')).toThrow("'128' is not a byte");
    expect(() => convert('int', '2147483648')).toThrow(TypeConversionError);
  });

  it('should convert 64-bit integers to bigint', () => {
    expect(convert('long', '9223372036854775807')).toBe(9223372036854775807n);
    expect(() => convert('long', '9223372036854775808')).toThrow("'9223372036854775808' is not a long");
    expect(convert('bigint', '+123456789012345678901234567890')).toBe(123456789012345678901234567890n);
  });

  it('should convert floating point values', () => {
    expect(convert('double', '1.5')).toBe(1.5);
    expect(convert('float', '2.5f')).toBe(2.5);
    expect(convert('number', '1e3')).toBe(1000);
    expect(convert('double', '-.5')).toBe(-0.5);
    expect(() => convert('double', 'abc')).toThrow("'abc' is not a double");
  });

  it('should convert booleans ignoring case', () => {
    expect(convert('boolean', 'TRUE')).toBe(true);
    expect(convert('boolean', 'false')).toBe(false);
    expect(() => convert('boolean', 'yes')).toThrow("'yes' is not a boolean");
  });

  it('should convert single characters', () => {
    expect(convert('char', 'a')).toBe('a');
    expect(() => convert('char', 'ab')).toThrow("'ab' is not a single character");
  });

  it('should convert calendar dates', () => {
    const date = convert('date', '2024-02-29');
    expect(date).toBeInstanceOf(Date);
    expect(date instanceof Date && date.getDate()).toBe(29);
    expect(() => convert('date', '2023-02-29')).toThrow("'2023-02-29' is not a yyyy-MM-dd date");
    expect(() => convert('date', '29.02.2024')).toThrow("'29.02.2024' is not a yyyy-MM-dd date");
  });

  it('should convert date-times', () => {
    const value = convert('datetime', '2024-01-02T03:04:05Z');
    expect(value instanceof Date && value.toISOString()).toBe('2024-01-02T03:04:05.000Z');
    expect(() => convert('datetime', 'later')).toThrow("'later' is not an ISO-8601 date-time");
  });

  it('should convert uuids to lower case', () => {
    expect(convert('uuid', '123E4567-E89B-12D3-A456-426614174000')).toBe('123e4567-e89b-12d3-a456-426614174000');
    expect(() => convert('uuid', '1234')).toThrow("'1234' is not a uuid");
  });

  it('should convert urls, patterns, charsets and paths', () => {
    const url = convert('url', 'https://example.com/docs');
    expect(url instanceof URL && url.pathname).toBe('/docs');
    const regexp = convert('regexp', '^a+$');
    expect(regexp instanceof RegExp && regexp.test('aaa')).toBe(true);
    expect(convert('charset', 'utf8')).toBe('utf8');
    expect(() => convert('charset', 'klingon')).toThrow("'klingon' is not a charset");
    expect(convert('path', 'a/../b')).toBe('b');
  });
});

describe('TypeConverterRegistry', () => {
  const saved = process.env.ARGBIND_CONVERTERS_EXCLUDES;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.ARGBIND_CONVERTERS_EXCLUDES;
    } else {
      process.env.ARGBIND_CONVERTERS_EXCLUDES = saved;
    }
  });

  it('should register every built-in converter', () => {
    const registry = TypeConverterRegistry.withBuiltIns([]);
    expect(registry.types()).toEqual(Object.keys(BUILT_IN_CONVERTERS));
    expect(registry.has('int')).toBe(true);
  });

  it('should leave out excluded built-ins', () => {
    const registry = TypeConverterRegistry.withBuiltIns([/^(?:int|long)$/]);
    expect(registry.has('int')).toBe(false);
    expect(registry.has('long')).toBe(false);
    expect(registry.has('integer')).toBe(true);
  });

  it('should read exclusions from the environment', () => {
    process.env.ARGBIND_CONVERTERS_EXCLUDES = 'int, date.*,';
    expect(getConverterExcludesFromEnv().map((pattern) => pattern.source)).toEqual(['^(?:int)$', '^(?:date.*)$']);
    const registry = TypeConverterRegistry.withBuiltIns();
    expect(registry.has('date')).toBe(false);
    expect(registry.has('datetime')).toBe(false);
    expect(registry.has('double')).toBe(true);
  });

  it('should return no exclusions when the variable is unset', () => {
    delete process.env.ARGBIND_CONVERTERS_EXCLUDES;
    expect(getConverterExcludesFromEnv()).toEqual([]);
  });

  it('should replace a converter on register', () => {
    const registry = TypeConverterRegistry.withBuiltIns([]);
    registry.register('int', (value) => value.length);
    expect(registry.get('int')?.('abc')).toBe(3);
  });

  it('should reject a registration without a type name', () => {
    const registry = new TypeConverterRegistry();
    expect(() => registry.register('', (value) => value)).toThrow(InitializationError);
    expect(() => registry.register('', (value) => value)).toThrow("Invalid converter for '': Missing type name");
    expect(registry.validate('x', 'not a function')).toBe('Converter must be a function');
  });

  it('should register enum types by name', () => {
    const registry = new TypeConverterRegistry();
    const color = enumType('Color', ['RED']);
    registry.register(color, () => 'custom');
    expect(registry.has('Color')).toBe(true);
    expect(registry.get(color)?.('x')).toBe('custom');
  });

  it('should clone into an independent registry', () => {
    const registry = new TypeConverterRegistry().registerAll({ point: (value) => value });
    const copy = registry.clone();
    copy.register('size', (value) => value.length);
    expect(copy.has('point')).toBe(true);
    expect(registry.has('size')).toBe(false);
  });
});

describe('enum types', () => {
  it('should take constants from a numeric enum without reverse keys', () => {
    const level = enumType('Level', Level);
    expect(level.constants).toEqual(['Low', 'High']);
    expect(level.values.get('High')).toBe(Level.High);
    expect(isEnumType(level)).toBe(true);
    expect(isEnumType('int')).toBe(false);
    expect(typeName(level)).toBe('Level');
  });

  it('should convert exact constant names', () => {
    const converter = createEnumConverter(enumType('Level', Level), false);
    expect(converter('Low')).toBe(Level.Low);
    expect(() => converter('low')).toThrow("expected one of [Low, High] but was 'low'");
  });

  it('should convert ignoring case when allowed', () => {
    const converter = createEnumConverter(enumType('Color', ['RED', 'GREEN']), true);
    expect(converter('green')).toBe('GREEN');
    expect(() => converter('blue')).toThrow(TypeConversionError);
  });
});
