/**
 * Parser
 *
 * Entry point of a parse: validates the command tree, expands @-files and
 * runs the interpreter of the root command.
 */

import { ParameterErrors } from '../errors/index.js';
import { logger } from '../logger.js';
import type { CommandSpec } from '../model/command-spec.js';
import type { ParseResult } from '../model/parse-result.js';
import type { InteractiveReader } from '../types/index.js';
import { expandArgumentFiles } from './argument-files.js';
import { Interpreter } from './interpreter.js';

export interface ParserOptions {
  /**
   * Reads values of interactive arguments during the parse. Without one,
   * interactive values are left pending on the result.
   */
  readInteractive?: InteractiveReader;
}

export class Parser {
  readonly spec: CommandSpec;
  private readonly options: ParserOptions;

  /**
   * @throws {InitializationError} If the command tree is invalid
   */
  constructor(spec: CommandSpec, options: ParserOptions = {}) {
    spec.validateTree();
    this.spec = spec;
    this.options = options;
  }

  /**
   * Bind `tokens` to the command tree.
   *
   * @throws {ParameterError} The first violation, in fail-fast mode
   * @throws {ParameterErrors} All violations, in collect-errors mode
   */
  parse(tokens: readonly string[]): ParseResult {
    const parser = this.spec.parser;
    const expanded = expandArgumentFiles(tokens, {
      expandAtFiles: parser.expandAtFiles,
      atFileCommentChar: parser.atFileCommentChar,
    });
    logger.debug(`Parsing ${expanded.length} command line args [${expanded.join(', ')}]`);

    const stack = [...expanded].reverse();
    const interpreter = new Interpreter(this.spec, {
      originalArgs: expanded,
      readInteractive: this.options.readInteractive,
      chain: { helpRequested: false },
    });
    const result = interpreter.interpret(stack);

    const errors = result.allErrors();
    if (errors.length > 0) {
      throw new ParameterErrors(result, errors);
    }
    return result;
  }
}

/**
 * Parse `tokens` against `spec` in one call
 */
export function parseArgs(spec: CommandSpec, tokens: readonly string[], options?: ParserOptions): ParseResult {
  return new Parser(spec, options).parse(tokens);
}
