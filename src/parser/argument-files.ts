/**
 * Argument Files
 *
 * Expands `@file` tokens into the tokens read from the file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { InitializationError } from '../errors/index.js';
import { logger } from '../logger.js';

export interface ExpandOptions {
  expandAtFiles: boolean;
  /** Starts a comment running to the end of the line; null for none */
  atFileCommentChar: string | null;
}

const ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

function isWhitespace(ch: string): boolean {
  return ch <= ' ';
}

/**
 * Split file content into tokens. Tokens are separated by whitespace;
 * text in single or double quotes forms one token (backslash escapes
 * apply, a line break ends an unterminated quote); the comment character
 * skips the rest of the line.
 */
export function tokenizeArgumentFile(content: string, commentChar: string | null): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < content.length) {
    const ch = content.charAt(i);
    if (isWhitespace(ch)) {
      i++;
    } else if (commentChar !== null && ch === commentChar) {
      while (i < content.length && content.charAt(i) !== '\n' && content.charAt(i) !== '\r') {
        i++;
      }
    } else if (ch === '"' || ch === "'") {
      const [token, next] = readQuoted(content, i + 1, ch);
      tokens.push(token);
      i = next;
    } else {
      let word = '';
      while (i < content.length) {
        const c = content.charAt(i);
        if (isWhitespace(c) || c === '"' || c === "'" || (commentChar !== null && c === commentChar)) {
          break;
        }
        word += c;
        i++;
      }
      tokens.push(word);
    }
  }
  return tokens;
}

function readQuoted(content: string, start: number, quote: string): [string, number] {
  let token = '';
  let i = start;
  while (i < content.length) {
    const ch = content.charAt(i);
    if (ch === quote) {
      return [token, i + 1];
    }
    if (ch === '\n' || ch === '\r') {
      return [token, i];
    }
    if (ch === '\\' && i + 1 < content.length) {
      const next = content.charAt(i + 1);
      const octal = /^[0-7]{1,3}/.exec(content.slice(i + 1, i + 4));
      if (octal) {
        token += String.fromCharCode(Number.parseInt(octal[0], 8));
        i += 1 + octal[0].length;
        continue;
      }
      token += ESCAPES[next] ?? next;
      i += 2;
      continue;
    }
    token += ch;
    i++;
  }
  return [token, i];
}

/**
 * Replace every `@file` token by the tokens of that file, recursively.
 * `@@x` stands for the literal `@x`; a lone `@`, and files that cannot be
 * read, are kept as they are. A file already expanded is skipped.
 */
export function expandArgumentFiles(args: readonly string[], options: ExpandOptions): string[] {
  const expanded: string[] = [];
  const visited = new Set<string>();
  for (const arg of args) {
    addOrExpand(arg, expanded, visited, options);
  }
  return expanded;
}

function addOrExpand(arg: string, result: string[], visited: Set<string>, options: ExpandOptions): void {
  if (options.expandAtFiles && arg !== '@' && arg.startsWith('@')) {
    const fileName = arg.slice(1);
    if (fileName.startsWith('@')) {
      logger.info(`Not expanding @-escaped argument ${fileName} (trimmed leading '@' char)`);
      result.push(fileName);
      return;
    }
    logger.info(`Expanding argument file @${fileName}`);
    expandArgumentFile(fileName, result, visited, options);
    return;
  }
  result.push(arg);
}

function isReadableFile(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.R_OK);
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

function expandArgumentFile(fileName: string, result: string[], visited: Set<string>, options: ExpandOptions): void {
  const absolutePath = path.resolve(fileName);
  if (!isReadableFile(absolutePath)) {
    logger.info(`File ${fileName} does not exist or cannot be read; treating argument literally`);
    result.push(`@${fileName}`);
    return;
  }
  if (visited.has(absolutePath)) {
    logger.info(`Already visited file ${absolutePath}; ignoring...`);
    return;
  }
  visited.add(absolutePath);

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf8');
  } catch (err) {
    throw new InitializationError(`Could not read argument file @${fileName}`, { cause: err });
  }

  const tokens: string[] = [];
  for (const token of tokenizeArgumentFile(content, options.atFileCommentChar)) {
    addOrExpand(token, tokens, visited, options);
  }
  logger.info(`Expanded file @${fileName} to arguments [${tokens.join(', ')}]`);
  result.push(...tokens);
}
