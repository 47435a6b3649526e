/**
 * Tests for option and positional parameter specifications
 * @module tests/arg-spec.test
 */

import { describe, it, expect } from 'vitest';
import { OptionSpec } from '../src/model/option-spec.js';
import { PositionalParamSpec, compareArgSpecs } from '../src/model/positional-param-spec.js';
import { ObjectBinding } from '../src/model/bindings.js';
import { enumType } from '../src/convert/enums.js';
import { InitializationError } from '../src/errors/index.js';

describe('OptionSpec', () => {
  describe('defaults', () => {
    it('should make an untyped option a boolean flag', () => {
      const option = OptionSpec.builder('-v', '--verbose').build();
      expect(option.arity.toString()).toBe('0');
      expect(option.arity.isUnspecified).toBe(true);
      expect(option.container).toBe('single');
      expect(option.type).toBe('boolean');
      expect(option.isBoolean()).toBe(true);
      expect(option.paramLabel).toBe('PARAM');
    });

    it('should give a typed option arity 1', () => {
      const option = OptionSpec.builder('-c').type('int').build();
      expect(option.arity.toString()).toBe('1');
      expect(option.isBoolean()).toBe(false);
      expect(option.typeName).toBe('int');
    });

    it('should collect values in an array when arity allows several', () => {
      const option = OptionSpec.builder('-o').arity('1..*').build();
      expect(option.container).toBe('array');
      expect(option.auxiliaryTypes).toEqual(['string']);
      expect(option.isMultiValue()).toBe(true);
    });

    it('should default map types to string keys and values', () => {
      const option = OptionSpec.builder('-D').container('map').build();
      expect(option.auxiliaryTypes).toEqual(['string', 'string']);
      expect(option.arity.toString()).toBe('1');
    });

    it('should take completion candidates from an enum type', () => {
      const option = OptionSpec.builder('--color').type(enumType('Color', ['RED', 'GREEN'])).build();
      expect(option.completionCandidates).toEqual(['RED', 'GREEN']);
      expect(option.typeName).toBe('Color');
    });

    it('should use a blank label as PARAM', () => {
      expect(OptionSpec.builder('-f').paramLabel('  ').build().paramLabel).toBe('PARAM');
    });
  });

  describe('validation', () => {
    it('should reject an option without names', () => {
      expect(() => OptionSpec.builder().build()).toThrow('Invalid names: []');
      expect(() => OptionSpec.builder('-a', '').build()).toThrow(InitializationError);
    });

    it('should reject a map with one type', () => {
      expect(() => OptionSpec.builder('-D').container('map', 'int').build()).toThrow(
        'Map-valued option needs a key type and a value type, not 1 type(s)'
      );
    });

    it('should reject interactive arguments with arity other than 1', () => {
      expect(() => OptionSpec.builder('-p').arity('0..1').interactive().build()).toThrow(
        'Interactive options and positional parameters are only supported for arity=1, not for arity=0..1'
      );
    });

    it('should not be required when a default value exists', () => {
      const option = OptionSpec.builder('--port').type('int').required().defaultValue('80').build();
      expect(option.required).toBe(false);
    });
  });

  describe('names', () => {
    it('should pick the longest and shortest names', () => {
      const option = OptionSpec.builder('-v', '--verbose', '--vb').build();
      expect(option.longestName()).toBe('--verbose');
      expect(option.shortestName()).toBe('-v');
      expect(option.toString()).toBe('option --verbose');
    });

    it('should prefer a custom description', () => {
      expect(OptionSpec.builder('-v').withToString('the verbose flag').build().toString()).toBe('the verbose flag');
    });
  });

  describe('values', () => {
    it('should start from the initial value', () => {
      const option = OptionSpec.builder('-n').type('int').initialValue(5).build();
      expect(option.getValue()).toBe(5);
      option.setValue(6);
      expect(option.getValue()).toBe(6);
    });

    it('should clear captured values on reset', () => {
      const option = OptionSpec.builder('-n').type('int').build();
      option.stringValues.push('1');
      option.typedValueAtPosition.set(0, 1);
      option.resetValues();
      expect(option.stringValues).toEqual([]);
      expect(option.typedValueAtPosition.size).toBe(0);
    });

    it('should share the binding with a copy made by toBuilder', () => {
      const binding = new ObjectBinding('start');
      const option = OptionSpec.builder('-n', '--name').type('string').binding(binding).usageHelp(false).build();
      const copy = option.toBuilder().build();
      expect(copy).not.toBe(option);
      expect(copy.names).toEqual(['-n', '--name']);
      expect(copy.arity.equals(option.arity)).toBe(true);
      copy.setValue('changed');
      expect(option.getValue()).toBe('changed');
    });
  });
});

describe('PositionalParamSpec', () => {
  it('should default to arity 1 over every index', () => {
    const positional = PositionalParamSpec.builder().build();
    expect(positional.arity.toString()).toBe('1');
    expect(positional.index.toString()).toBe('0..*');
    expect(positional.capacity.toString()).toBe('1..*');
    expect(positional.type).toBe('string');
    expect(positional.toString()).toBe('positional parameter[0..*]');
  });

  it('should compute capacity from arity and index', () => {
    const positional = PositionalParamSpec.builder().index('0..1').arity('2').build();
    expect(positional.capacity.toString()).toBe('4');
  });

  it('should keep the index in a copy', () => {
    const positional = PositionalParamSpec.builder().index('2').paramLabel('DST').build();
    const copy = positional.toBuilder().build();
    expect(copy.index.toString()).toBe('2');
    expect(copy.paramLabel).toBe('DST');
  });

  it('should sort by index, then by arity', () => {
    const second = PositionalParamSpec.builder().index('1').build();
    const wide = PositionalParamSpec.builder().index('0').arity('2').build();
    const first = PositionalParamSpec.builder().index('0').build();
    expect([second, wide, first].sort(compareArgSpecs)).toEqual([first, wide, second]);
  });
});
