/**
 * Value Splitting
 *
 * Decomposes one token into several values using an argument's split
 * regex. Quoted substrings are not split unless splitQuotedStrings is set.
 */

import { logger } from '../logger.js';

export interface SplitOptions {
  /**
   * Maximum number of parts; the last part holds the remainder.
   * 0 means unlimited with trailing empty parts removed.
   */
  limit: number;
  /** Split inside quoted substrings too */
  splitQuotedStrings: boolean;
  /** Drop the quotes around restored quoted substrings */
  trimQuotes: boolean;
  /** Argument description for log messages */
  label?: string;
}

/** Compile a split regex; an invalid pattern throws a SyntaxError */
export function compileSplitRegex(regex: string): RegExp {
  return new RegExp(regex, 'g');
}

/**
 * Split on a regular expression.
 *
 * With a positive limit at most `limit` parts are returned. With limit 0
 * trailing empty strings are removed. A value without any match is
 * returned whole.
 */
export function splitByRegex(value: string, regex: string, limit = 0): string[] {
  const pattern = compileSplitRegex(regex);
  const parts: string[] = [];
  let start = 0;
  let matched = false;

  for (let match = pattern.exec(value); match !== null; match = pattern.exec(value)) {
    if (limit > 0 && parts.length === limit - 1) {
      break;
    }
    if (match[0].length === 0) {
      pattern.lastIndex++;
      if (match.index === 0 || match.index >= value.length) {
        continue;
      }
    }
    matched = true;
    parts.push(value.slice(start, match.index));
    start = match.index + match[0].length;
  }

  if (!matched) {
    return [value];
  }
  parts.push(value.slice(start));
  if (limit === 0) {
    while (parts.length > 0 && parts[parts.length - 1] === '') {
      parts.pop();
    }
  }
  return parts;
}

/**
 * Split a token, honoring double-quoted substrings
 */
export function splitValue(value: string, regex: string, options: SplitOptions): string[] {
  if (regex.length === 0) {
    return [value];
  }
  if (options.splitQuotedStrings) {
    return splitByRegex(value, regex, options.limit);
  }
  return splitRespectingQuotes(value, regex, options);
}

function splitRespectingQuotes(value: string, regex: string, options: SplitOptions): string[] {
  let splittable = '';
  let quoted = '';
  const quotedValues: string[] = [];
  let escaping = false;
  let inQuote = false;

  for (const ch of value) {
    if (ch === '\\') {
      escaping = !escaping;
    } else if (ch === '"') {
      if (!escaping) {
        inQuote = !inQuote;
        if (inQuote) {
          splittable += ch;
          continue;
        }
        quotedValues.push(quoted);
        quoted = '';
      }
    } else {
      escaping = false;
    }
    if (inQuote) {
      quoted += ch;
    } else {
      splittable += ch;
    }
  }

  if (quoted.length > 0) {
    logger.warn(`Unbalanced quotes in [${quoted}] for ${options.label ?? 'value'} (value=${value})`);
    quotedValues.push(quoted);
  }

  const parts = splitByRegex(splittable, regex, options.limit).map((part) =>
    restoreQuotedValues(part, quotedValues, options.trimQuotes)
  );
  if (quotedValues.length > 0) {
    logger.warn(
      `Unable to respect quotes while splitting value ${value} for ${options.label ?? 'value'} ` +
        `(unprocessed remainder: [${quotedValues.join(', ')}])`
    );
    return splitByRegex(value, regex, options.limit);
  }
  return parts;
}

function restoreQuotedValues(part: string, quotedValues: string[], trimQuotes: boolean): string {
  let result = '';
  let escaping = false;
  let inQuote = false;

  for (const ch of part) {
    let skip = false;
    if (ch === '\\') {
      escaping = !escaping;
    } else if (ch === '"') {
      if (!escaping) {
        inQuote = !inQuote;
        if (!inQuote) {
          result += quotedValues.shift() ?? '';
        }
        skip = trimQuotes;
      }
    } else {
      escaping = false;
    }
    if (!skip) {
      result += ch;
    }
  }
  return result;
}
