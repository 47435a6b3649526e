/**
 * Tests for parser policies and value handling
 * @module tests/parser-policies.test
 */

import { describe, it, expect } from 'vitest';
import { CommandSpec, negativeNumbersAsValues } from '../src/model/command-spec.js';
import { OptionSpec } from '../src/model/option-spec.js';
import { PositionalParamSpec } from '../src/model/positional-param-spec.js';
import { UnmatchedArgsList } from '../src/model/bindings.js';
import { enumType } from '../src/convert/enums.js';
import {
  InitializationError,
  MissingTypeConverterError,
  ParameterError,
  ParameterErrors,
  UnmatchedArgumentError,
} from '../src/errors/index.js';
import { catchError, parse } from './setup.js';

function errorMessage(error: unknown): string | undefined {
  return error instanceof Error ? error.message : undefined;
}

function createFilesCommand(): CommandSpec {
  return CommandSpec.create('app')
    .addOption(OptionSpec.builder('-v').build())
    .addPositional(PositionalParamSpec.builder().arity('1..*').paramLabel('FILES').build());
}

describe('parser policies', () => {
  describe('separator', () => {
    it('should split option and value at a custom separator', () => {
      const spec = new CommandSpec({ name: 'app', parser: { separator: ':' } }).addOption(
        OptionSpec.builder('--name').type('string').build()
      );
      parse(spec, ['--name:bob']);
      expect(spec.findOption('name')?.getValue()).toBe('bob');
    });

    it('should prefer an option named like the whole token', () => {
      const spec = CommandSpec.create('app')
        .addOption(OptionSpec.builder('-D').type('string').build())
        .addOption(OptionSpec.builder('-D=x').build());
      const result = parse(spec, ['-D=x']);
      expect(result.hasMatchedOption('-D=x')).toBe(true);
      expect(spec.optionsByName.get('-D')?.getValue()).toBeUndefined();
    });
  });

  describe('end of options', () => {
    it('should treat everything after -- as positional', () => {
      const spec = createFilesCommand();
      const result = parse(spec, ['--', '-v', 'a']);
      expect(result.hasMatchedOption('-v')).toBe(false);
      expect(result.matchedPositionalValue(0)).toEqual(['-v', 'a']);
    });

    it('should use a custom delimiter', () => {
      const spec = createFilesCommand();
      spec.parser.endOfOptionsDelimiter = ';;';
      const result = parse(spec, [';;', '-v']);
      expect(result.matchedPositionalValue(0)).toEqual(['-v']);
    });
  });

  describe('stopAtPositional', () => {
    it('should end option processing at the first positional', () => {
      const spec = createFilesCommand();
      spec.parser.stopAtPositional = true;
      const result = parse(spec, ['a', '-v']);
      expect(result.hasMatchedOption('-v')).toBe(false);
      expect(result.matchedPositionalValue(0)).toEqual(['a', '-v']);
    });

    it('should still match options before the first positional', () => {
      const spec = createFilesCommand();
      const result = parse(spec, ['a', '-v']);
      expect(result.hasMatchedOption('-v')).toBe(true);
      expect(result.matchedPositionalValue(0)).toEqual(['a']);
    });
  });

  describe('stopAtUnmatched', () => {
    it('should treat all tokens after an unmatched one as unmatched', () => {
      const spec = new CommandSpec({
        name: 'app',
        parser: { stopAtUnmatched: true, unmatchedArgumentsAllowed: true },
      }).addOption(OptionSpec.builder('-v').build());
      const result = parse(spec, ['-z', '-v']);
      expect(result.unmatched).toEqual(['-z', '-v']);
      expect(result.hasMatchedOption('-v')).toBe(false);
    });
  });

  describe('unmatched arguments', () => {
    it('should pass unmatched tokens to bindings', () => {
      const list = new UnmatchedArgsList();
      const spec = CommandSpec.create('app').addUnmatchedArgsBinding(list);
      expect(spec.parser.unmatchedArgumentsAllowed).toBe(true);
      const result = parse(spec, ['x', 'y']);
      expect(list.values).toEqual(['x', 'y']);
      expect(result.unmatched).toEqual(['x', 'y']);
    });

    it('should treat negative numbers as values with the stricter predicate', () => {
      const spec = CommandSpec.create('calc')
        .addOption(OptionSpec.builder('-n').type('int').build())
        .addPositional(PositionalParamSpec.builder().index('0').type('int').paramLabel('X').build());
      expect(catchError(() => parse(spec, ['-5']))).toBeInstanceOf(UnmatchedArgumentError);

      spec.parser.resemblesOption = negativeNumbersAsValues;
      const result = parse(spec, ['-5', '-n', '-3']);
      expect(result.matchedPositionalValue(0)).toBe(-5);
      expect(result.matchedOptionValue('n')).toBe(-3);
    });

    it('should take unmatched option-like tokens as positionals when configured', () => {
      const spec = createFilesCommand();
      spec.parser.unmatchedOptionsArePositionalParams = true;
      const result = parse(spec, ['-z']);
      expect(result.matchedPositionalValue(0)).toEqual(['-z']);
    });
  });

  describe('quotes', () => {
    it('should keep quotes by default', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('--name').type('string').build());
      parse(spec, ['--name', '"bob"']);
      expect(spec.findOption('name')?.getValue()).toBe('"bob"');
    });

    it('should trim surrounding quotes when configured', () => {
      const spec = new CommandSpec({ name: 'app', parser: { trimQuotes: true } }).addOption(
        OptionSpec.builder('--name').type('string').build()
      );
      parse(spec, ['--name', '"bob"']);
      expect(spec.findOption('name')?.getValue()).toBe('bob');
    });

    it('should not split inside quotes', () => {
      const spec = new CommandSpec({ name: 'app', parser: { trimQuotes: true } }).addOption(
        OptionSpec.builder('-x').arity('1').container('array').splitRegex(',').build()
      );
      parse(spec, ['-x', 'a,"b,c",d']);
      expect(spec.findOption('x')?.getValue()).toEqual(['a', 'b,c', 'd']);
    });
  });

  describe('limitSplit', () => {
    function createSplitCommand(limitSplit: boolean): CommandSpec {
      return new CommandSpec({ name: 'app', parser: { limitSplit } }).addOption(
        OptionSpec.builder('-p').arity('1..2').splitRegex(',').build()
      );
    }

    it('should split without limit by default', () => {
      const spec = createSplitCommand(false);
      parse(spec, ['-p', 'a,b,c']);
      expect(spec.findOption('p')?.getValue()).toEqual(['a', 'b', 'c']);
    });

    it('should cap the parts to the remaining arity', () => {
      const spec = createSplitCommand(true);
      parse(spec, ['-p', 'a,b,c']);
      expect(spec.findOption('p')?.getValue()).toEqual(['a', 'b,c']);
    });
  });

  describe('aritySatisfiedByAttachedOptionParam', () => {
    function createPairCommand(satisfied: boolean): CommandSpec {
      return new CommandSpec({
        name: 'app',
        parser: { aritySatisfiedByAttachedOptionParam: satisfied, unmatchedArgumentsAllowed: true },
      }).addOption(OptionSpec.builder('-p').arity('2').build());
    }

    it('should take further values after an attached one by default', () => {
      const spec = createPairCommand(false);
      const result = parse(spec, ['-p=a', 'b']);
      expect(spec.findOption('p')?.getValue()).toEqual(['a', 'b']);
      expect(result.unmatched).toEqual([]);
    });

    it('should stop at the attached value when configured', () => {
      const spec = createPairCommand(true);
      const result = parse(spec, ['-p=a', 'b']);
      expect(spec.findOption('p')?.getValue()).toEqual(['a']);
      expect(result.unmatched).toEqual(['b']);
    });
  });

  describe('collectErrors', () => {
    it('should report every problem at once', () => {
      const spec = new CommandSpec({ name: 'app', parser: { collectErrors: true } })
        .addOption(OptionSpec.builder('-n', '--name').type('string').required().build())
        .addOption(OptionSpec.builder('-c').type('int').build());
      const error = catchError(() => parse(spec, ['-c', 'x', '-z']));
      expect(error).toBeInstanceOf(ParameterErrors);
      if (!(error instanceof ParameterErrors)) {
        return;
      }
      expect(error.errors.map((e) => e.message)).toEqual([
        "Invalid value for option '-c': 'x' is not an int",
        "Missing required option '--name=PARAM'",
        'Unknown option: -z',
      ]);
      expect(error.parseResult.unmatched).toEqual(['-z']);
      expect(error.parseResult.errors).toHaveLength(3);
    });

    it('should record subcommand errors on the subcommand result', () => {
      const root = new CommandSpec({ name: 'root', parser: { collectErrors: true } });
      root.createSubcommand('sub').addOption(OptionSpec.builder('-c').type('int').build());
      const error = catchError(() => parse(root, ['sub', '-c', 'x']));
      expect(error instanceof ParameterErrors && error.parseResult.errors).toEqual([]);
      expect(error instanceof ParameterErrors && error.parseResult.subcommand?.errors.map((e) => e.message)).toEqual([
        "Invalid value for option '-c': 'x' is not an int",
      ]);
    });
  });

  describe('collections', () => {
    it('should collect unique values in a set', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('-t').container('set').build());
      parse(spec, ['-t', 'a', '-t', 'a', '-t', 'b']);
      expect(spec.findOption('t')?.getValue()).toEqual(new Set(['a', 'b']));
    });

    it('should replace the initial value instead of appending to it', () => {
      const initial = ['keep'];
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('-o').arity('1..*').initialValue(initial).build()
      );
      parse(spec, ['-o', 'x']);
      expect(spec.findOption('o')?.getValue()).toEqual(['x']);
      expect(initial).toEqual(['keep']);
    });
  });

  describe('maps', () => {
    it('should collect KEY=VALUE pairs', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('-D').container('map').build());
      parse(spec, ['-D', 'a=1', '-D', 'b\\=c=2=3']);
      expect(spec.findOption('D')?.getValue()).toEqual(
        new Map([
          ['a', '1'],
          ['b=c', '2=3'],
        ])
      );
    });

    it('should convert keys and values', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('-D').container('map', 'string', 'int').build()
      );
      parse(spec, ['-D', 'x=1']);
      expect(spec.findOption('D')?.getValue()).toEqual(new Map([['x', 1]]));
      expect(errorMessage(catchError(() => parse(spec, ['-D', 'x=oops'])))).toBe(
        "Invalid value for option '-D' (PARAM): 'oops' is not an int"
      );
    });

    it('should reject a value without a key', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('-D').container('map').build());
      expect(errorMessage(catchError(() => parse(spec, ['-D', 'novalue'])))).toBe(
        "Value for option '-D' (PARAM) should be in KEY=VALUE format but was novalue"
      );
    });

    it('should name the split format when a split regex is set', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('-D').container('map').splitRegex(',').build()
      );
      parse(spec, ['-D', 'a=1,b=2']);
      expect(spec.findOption('D')?.getValue()).toEqual(
        new Map([
          ['a', '1'],
          ['b', '2'],
        ])
      );
      expect(errorMessage(catchError(() => parse(spec, ['-D', 'a=1,b'])))).toBe(
        "Value for option '-D' (PARAM) should be in KEY=VALUE[,KEY=VALUE]... format but was b"
      );
    });
  });

  describe('enums', () => {
    const Color = enumType('Color', ['RED', 'GREEN']);

    it('should match constant names exactly by default', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('--color').type(Color).build());
      parse(spec, ['--color', 'GREEN']);
      expect(spec.findOption('color')?.getValue()).toBe('GREEN');
      expect(errorMessage(catchError(() => parse(spec, ['--color', 'red'])))).toBe(
        "Invalid value for option '--color': expected one of [RED, GREEN] but was 'red'"
      );
    });

    it('should ignore case when configured', () => {
      const spec = new CommandSpec({ name: 'app', parser: { caseInsensitiveEnumValuesAllowed: true } }).addOption(
        OptionSpec.builder('--color').type(Color).build()
      );
      parse(spec, ['--color', 'red']);
      expect(spec.findOption('color')?.getValue()).toBe('RED');
    });
  });

  describe('default values', () => {
    it('should apply defaults without recording a match', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('--count').type('int').defaultValue('3').build()
      );
      const result = parse(spec, []);
      const count = spec.findOption('count');
      expect(count?.getValue()).toBe(3);
      expect(result.hasMatchedOption('--count')).toBe(false);
      expect(count?.stringValues).toEqual([]);
    });

    it('should let the command line override a default', () => {
      const spec = CommandSpec.create('app')
        .addOption(OptionSpec.builder('--count').type('int').defaultValue('3').build())
        .addOption(OptionSpec.builder('-o').arity('1..*').defaultValue('x').build());
      parse(spec, ['--count', '5', '-o', 'y']);
      expect(spec.findOption('count')?.getValue()).toBe(5);
      expect(spec.findOption('o')?.getValue()).toEqual(['y']);
    });

    it('should satisfy a required option with a default', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('--port').type('int').required().defaultValue('80').build()
      );
      parse(spec, []);
      expect(spec.findOption('port')?.getValue()).toBe(80);
    });

    it('should ask the default value provider first', () => {
      const spec = CommandSpec.create('app')
        .addOption(OptionSpec.builder('--host').type('string').defaultValue('example.org').build())
        .addPositional(PositionalParamSpec.builder().index('0').type('int').build())
        .withDefaultValueProvider((arg) => (arg.isOption() ? 'localhost' : '7'));
      const result = parse(spec, []);
      expect(spec.findOption('host')?.getValue()).toBe('localhost');
      expect(spec.positionalParameters[0].getValue()).toBe(7);
      expect(result.matchedPositionals).toEqual([]);
    });
  });

  describe('converters', () => {
    it('should use a converter registered on the command', () => {
      const spec = CommandSpec.create('app')
        .addOption(OptionSpec.builder('--at').type('point').build())
        .registerConverter('point', (value) => {
          const [x, y] = value.split(',').map(Number);
          return { x, y };
        });
      parse(spec, ['--at', '1,2']);
      expect(spec.findOption('at')?.getValue()).toEqual({ x: 1, y: 2 });
    });

    it('should prefer a converter on the argument', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('--up')
          .type('string')
          .converters((value) => value.toUpperCase())
          .build()
      );
      parse(spec, ['--up', 'abc']);
      expect(spec.findOption('up')?.getValue()).toBe('ABC');
    });

    it('should report a type without converter', () => {
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('--at').type('point').build());
      const error = catchError(() => parse(spec, ['--at', '1,2']));
      expect(error).toBeInstanceOf(MissingTypeConverterError);
      expect(errorMessage(error)).toBe('No TypeConverter registered for point of option --at');
    });

    it('should wrap unexpected converter failures', () => {
      const spec = CommandSpec.create('app')
        .addOption(OptionSpec.builder('--at').type('point').build())
        .registerConverter('point', () => {
          throw new RangeError('bad point');
        });
      const error = catchError(() => parse(spec, ['--at', 'zz']));
      expect(error).toBeInstanceOf(ParameterError);
      expect(errorMessage(error)).toBe("Invalid value for option '--at': cannot convert 'zz' to point (RangeError: bad point)");
    });

    it('should wrap errors raised outside conversion with the token position', () => {
      const readOnly = {
        get: (): unknown => undefined,
        set: (value: unknown): void => {
          if (value !== undefined) {
            throw new TypeError('read-only');
          }
        },
      };
      const spec = CommandSpec.create('app').addOption(OptionSpec.builder('-x').type('string').binding(readOnly).build());
      const error = catchError(() => parse(spec, ['-x', 'a']));
      expect(error).toBeInstanceOf(ParameterError);
      expect(errorMessage(error)).toBe("TypeError: read-only while processing argument at or before arg[1] 'a' in [-x, a]");
    });

    it('should reject an invalid split regex when the argument is built', () => {
      expect(() => OptionSpec.builder('-x').arity('1').container('array').splitRegex('(').build()).toThrow(
        InitializationError
      );
      expect(() => OptionSpec.builder('-x').splitRegex('(').build()).toThrow(/^Invalid split regex '\(' for option: /);
    });

    it('should split on escaped characters', () => {
      const spec = CommandSpec.create('app').addOption(
        OptionSpec.builder('--range').arity('1').container('array').splitRegex('\\-').build()
      );
      parse(spec, ['--range', 'a-b']);
      expect(spec.findOption('range')?.getValue()).toEqual(['a', 'b']);
    });
  });

  describe('positional types', () => {
    it('should name the positional in conversion errors', () => {
      const spec = CommandSpec.create('app').addPositional(
        PositionalParamSpec.builder().index('0').type('int').paramLabel('N').build()
      );
      expect(errorMessage(catchError(() => parse(spec, ['x'])))).toBe(
        "Invalid value for positional parameter at index 0 (N): 'x' is not an int"
      );
    });
  });
});
