/**
 * Parser Configuration
 *
 * Per-command policies of the interpreter. Subcommands receive settings
 * only when CommandSpec.configureParser() is called on an ancestor.
 */

import type { CommandSpec } from './command-spec.js';

export const DEFAULT_SEPARATOR = '=';

/**
 * Decides whether an unmatched token looks like an option
 */
export type OptionResemblance = (arg: string, commandSpec: CommandSpec) => boolean;

export interface ParserSettings {
  /** Separates an option name from an attached value */
  separator: string;
  /** Everything after this token is positional */
  endOfOptionsDelimiter: string;
  /** Treat all tokens after the first unmatched one as unmatched */
  stopAtUnmatched: boolean;
  /** Treat all tokens after the first positional as positional */
  stopAtPositional: boolean;
  toggleBooleanFlags: boolean;
  overwrittenOptionsAllowed: boolean;
  unmatchedArgumentsAllowed: boolean;
  expandAtFiles: boolean;
  /** Starts a comment in @-files; null disables comments */
  atFileCommentChar: string | null;
  posixClusteredShortOptionsAllowed: boolean;
  unmatchedOptionsArePositionalParams: boolean;
  /** Cap the parts of a split value to the remaining arity */
  limitSplit: boolean;
  /** A value attached to the option name satisfies the arity on its own */
  aritySatisfiedByAttachedOptionParam: boolean;
  collectErrors: boolean;
  caseInsensitiveEnumValuesAllowed: boolean;
  /** Remove surrounding double quotes from values */
  trimQuotes: boolean;
  splitQuotedStrings: boolean;
  resemblesOption: OptionResemblance | undefined;
}

export class ParserSpec implements ParserSettings {
  private explicitSeparator: string | undefined;
  endOfOptionsDelimiter = '--';
  stopAtUnmatched = false;
  stopAtPositional = false;
  toggleBooleanFlags = true;
  overwrittenOptionsAllowed = false;
  unmatchedArgumentsAllowed = false;
  expandAtFiles = true;
  atFileCommentChar: string | null = '#';
  posixClusteredShortOptionsAllowed = true;
  unmatchedOptionsArePositionalParams = false;
  limitSplit = false;
  aritySatisfiedByAttachedOptionParam = false;
  collectErrors = false;
  caseInsensitiveEnumValuesAllowed = false;
  trimQuotes = false;
  splitQuotedStrings = false;
  resemblesOption: OptionResemblance | undefined = undefined;

  constructor(settings: Partial<ParserSettings> = {}) {
    this.apply(settings);
  }

  get separator(): string {
    return this.explicitSeparator ?? DEFAULT_SEPARATOR;
  }

  set separator(separator: string) {
    this.explicitSeparator = separator;
  }

  /** True if a separator was set explicitly */
  hasExplicitSeparator(): boolean {
    return this.explicitSeparator !== undefined;
  }

  /**
   * Set the separator unless one was already set (mixins: first writer wins)
   */
  initSeparator(separator: string | undefined): void {
    if (this.explicitSeparator === undefined && separator !== undefined && separator !== DEFAULT_SEPARATOR) {
      this.explicitSeparator = separator;
    }
  }

  /** Split values before checking arity; same flag as limitSplit */
  get splitFirst(): boolean {
    return this.limitSplit;
  }

  apply(settings: Partial<ParserSettings>): ParserSpec {
    const { separator, ...rest } = settings;
    if (separator !== undefined) {
      this.separator = separator;
    }
    Object.assign(this, definedOnly(rest));
    return this;
  }

  /** Copy every setting from another parser spec */
  initFrom(other: ParserSpec): ParserSpec {
    this.explicitSeparator = other.explicitSeparator;
    this.endOfOptionsDelimiter = other.endOfOptionsDelimiter;
    this.stopAtUnmatched = other.stopAtUnmatched;
    this.stopAtPositional = other.stopAtPositional;
    this.toggleBooleanFlags = other.toggleBooleanFlags;
    this.overwrittenOptionsAllowed = other.overwrittenOptionsAllowed;
    this.unmatchedArgumentsAllowed = other.unmatchedArgumentsAllowed;
    this.expandAtFiles = other.expandAtFiles;
    this.atFileCommentChar = other.atFileCommentChar;
    this.posixClusteredShortOptionsAllowed = other.posixClusteredShortOptionsAllowed;
    this.unmatchedOptionsArePositionalParams = other.unmatchedOptionsArePositionalParams;
    this.limitSplit = other.limitSplit;
    this.aritySatisfiedByAttachedOptionParam = other.aritySatisfiedByAttachedOptionParam;
    this.collectErrors = other.collectErrors;
    this.caseInsensitiveEnumValuesAllowed = other.caseInsensitiveEnumValuesAllowed;
    this.trimQuotes = other.trimQuotes;
    this.splitQuotedStrings = other.splitQuotedStrings;
    this.resemblesOption = other.resemblesOption;
    return this;
  }

  toString(): string {
    return (
      `posixClusteredShortOptionsAllowed=${this.posixClusteredShortOptionsAllowed}, ` +
      `stopAtPositional=${this.stopAtPositional}, stopAtUnmatched=${this.stopAtUnmatched}, ` +
      `separator=${this.separator}, overwrittenOptionsAllowed=${this.overwrittenOptionsAllowed}, ` +
      `unmatchedArgumentsAllowed=${this.unmatchedArgumentsAllowed}, expandAtFiles=${this.expandAtFiles}, ` +
      `atFileCommentChar=${String(this.atFileCommentChar)}, endOfOptionsDelimiter=${this.endOfOptionsDelimiter}, ` +
      `limitSplit=${this.limitSplit}, aritySatisfiedByAttachedOptionParam=${this.aritySatisfiedByAttachedOptionParam}, ` +
      `toggleBooleanFlags=${this.toggleBooleanFlags}, ` +
      `unmatchedOptionsArePositionalParams=${this.unmatchedOptionsArePositionalParams}, ` +
      `collectErrors=${this.collectErrors}, caseInsensitiveEnumValuesAllowed=${this.caseInsensitiveEnumValuesAllowed}, ` +
      `trimQuotes=${this.trimQuotes}, splitQuotedStrings=${this.splitQuotedStrings}`
    );
  }
}

function definedOnly<T extends object>(settings: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(settings)) {
    if (isKeyOf(settings, key) && settings[key] !== undefined) {
      result[key] = settings[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
