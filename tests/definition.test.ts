/**
 * Tests for declarative command definitions
 * @module tests/definition.test
 */

import { describe, it, expect } from 'vitest';
import { defineCommand } from '../src/definition/build.js';
import { InitializationError, MissingParameterError } from '../src/errors/index.js';
import { catchError, parse } from './setup.js';

describe('defineCommand', () => {
  it('should bind values into the target record', () => {
    const target: Record<string, unknown> = { verbose: false };
    const spec = defineCommand({
      name: 'app',
      target,
      options: [
        { names: ['-v', '--verbose'] },
        { names: ['-c', '--count'], type: 'int', defaultValue: '1' },
      ],
      positionals: [{ paramLabel: 'FILES', arity: '0..*' }],
      unmatched: 'rest',
    });

    parse(spec, ['-v', '-z', 'a.txt']);
    expect(target).toEqual({ verbose: true, count: 1, files: ['a.txt'], rest: ['-z'] });
  });

  it('should bind to an explicit property and keep its value as the initial value', () => {
    const target: Record<string, unknown> = { outputDir: 'build' };
    const spec = defineCommand({
      target,
      options: [{ names: ['-o'], type: 'string', property: 'outputDir' }],
    });
    expect(spec.findOption('o')?.initialValue).toBe('build');
    parse(spec, ['-o', 'dist']);
    expect(target.outputDir).toBe('dist');
    parse(spec, []);
    expect(target.outputDir).toBe('build');
  });

  it('should make positionals that need a value required unless stated otherwise', () => {
    const spec = defineCommand({
      name: 'cat',
      positionals: [
        { index: '0', paramLabel: 'FILE' },
        { index: '1', paramLabel: 'MORE', arity: '0..1' },
        { index: '2', paramLabel: 'LAST', required: false },
      ],
    });
    expect(spec.positionalParameters.map((positional) => positional.required)).toEqual([true, false, false]);

    const error = catchError(() => parse(spec, []));
    expect(error).toBeInstanceOf(MissingParameterError);
    expect(error instanceof MissingParameterError ? error.missing : []).toEqual([spec.positionalParameters[0]]);
    expect(() => parse(spec, ['a.txt'])).not.toThrow();
  });

  it('should fail to bind unmatched arguments without a target', () => {
    expect(() => defineCommand({ name: 'app', unmatched: 'rest' })).toThrow(InitializationError);
    expect(() => defineCommand({ name: 'app', unmatched: 'rest' })).toThrow(
      "Command 'app' binds unmatched arguments to 'rest' but has no target"
    );
  });

  it('should copy argument settings', () => {
    const spec = defineCommand({
      name: 'app',
      options: [
        {
          names: ['-D'],
          container: 'map',
          auxiliaryTypes: ['string', 'int'],
          split: ',',
          paramLabel: 'KEY=VALUE',
          description: ['Define a property.', 'May be repeated.'],
          hidden: true,
          completionCandidates: ['a=1'],
        },
      ],
      positionals: [{ index: '0', required: true, paramLabel: 'SRC' }],
    });
    const define = spec.findOption('D');
    expect(define?.container).toBe('map');
    expect(define?.auxiliaryTypes).toEqual(['string', 'int']);
    expect(define?.splitRegex).toBe(',');
    expect(define?.paramLabel).toBe('KEY=VALUE');
    expect(define?.description).toEqual(['Define a property.', 'May be repeated.']);
    expect(define?.hidden).toBe(true);
    expect(define?.completionCandidates).toEqual(['a=1']);
    expect(spec.positionalParameters[0].index.toString()).toBe('0');
    expect(spec.requiredArgs).toEqual([spec.positionalParameters[0]]);
  });

  it('should define subcommands that inherit parser settings and converters', () => {
    const spec = defineCommand({
      name: 'draw',
      parser: { separator: ':' },
      converters: { point: (value) => value.split(',').map(Number) },
      subcommands: [
        {
          name: 'line',
          aliases: ['ln'],
          options: [{ names: ['--from'], type: 'point' }],
        },
      ],
    });
    const line = spec.subcommands.get('line');
    expect(spec.subcommands.get('ln')).toBe(line);
    expect(line?.parser.separator).toBe(':');
    expect(line?.converters).not.toBe(spec.converters);

    const result = parse(spec, ['ln', '--from:1,2']);
    expect(result.subcommand?.commandSpec).toBe(line);
    expect(line?.findOption('from')?.getValue()).toEqual([1, 2]);
  });

  it('should apply subcommand parser settings over inherited ones', () => {
    const spec = defineCommand({
      name: 'root',
      parser: { trimQuotes: true, collectErrors: true },
      subcommands: [{ name: 'sub', parser: { collectErrors: false } }],
    });
    const sub = spec.subcommands.get('sub');
    expect(sub?.parser.trimQuotes).toBe(true);
    expect(sub?.parser.collectErrors).toBe(false);
  });

  it('should merge mixins and standard help options', () => {
    const spec = defineCommand({
      name: 'app',
      version: '1.2.3',
      mixinStandardHelpOptions: true,
      mixins: {
        logging: { options: [{ names: ['--debug'] }] },
      },
      options: [{ names: ['--name'], type: 'string', required: true }],
    });
    expect(spec.version).toEqual(['1.2.3']);
    expect(spec.mixins.has('logging')).toBe(true);
    expect(spec.findOption('debug')).toBeDefined();

    const result = parse(spec, ['--version']);
    expect(result.isVersionHelpRequested).toBe(true);
  });

  it('should mark help commands', () => {
    const spec = defineCommand({
      name: 'app',
      options: [{ names: ['--name'], type: 'string', required: true }],
      subcommands: [{ name: 'help', helpCommand: true }],
    });
    expect(parse(spec, ['help']).subcommand?.commandSpec.helpCommand).toBe(true);
  });

  it('should pass the default value provider through', () => {
    const spec = defineCommand({
      name: 'app',
      options: [{ names: ['--host'], type: 'string' }],
      defaultValueProvider: () => 'localhost',
    });
    parse(spec, []);
    expect(spec.findOption('host')?.getValue()).toBe('localhost');
  });
});
