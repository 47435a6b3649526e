/**
 * Option Specification
 */

import { ArgSpec, ArgSpecBuilder } from './arg-spec.js';
import type { ArgSettings } from './arg-spec.js';
import { InitializationError } from '../errors/index.js';
import { listToString } from '../utils.js';
import type { PositionalParamSpec } from './positional-param-spec.js';

export class OptionSpecBuilder extends ArgSpecBuilder<OptionSpecBuilder> {
  optionNames: string[];
  usageHelpFlag = false;
  versionHelpFlag = false;
  helpFlag = false;

  constructor(names: readonly string[], settings?: ArgSettings) {
    super(settings);
    this.optionNames = [...names];
  }

  protected self(): OptionSpecBuilder {
    return this;
  }

  names(...names: string[]): OptionSpecBuilder {
    this.optionNames = names;
    return this;
  }

  /** Matching this option requests usage help and suppresses required checks */
  usageHelp(usageHelp = true): OptionSpecBuilder {
    this.usageHelpFlag = usageHelp;
    return this;
  }

  /** Matching this option requests version info and suppresses required checks */
  versionHelp(versionHelp = true): OptionSpecBuilder {
    this.versionHelpFlag = versionHelp;
    return this;
  }

  /** Matching this option suppresses required checks */
  help(help = true): OptionSpecBuilder {
    this.helpFlag = help;
    return this;
  }

  build(): OptionSpec {
    return new OptionSpec(this);
  }
}

export class OptionSpec extends ArgSpec {
  readonly names: readonly string[];
  readonly usageHelp: boolean;
  readonly versionHelp: boolean;
  readonly help: boolean;

  constructor(builder: OptionSpecBuilder) {
    const names = builder.optionNames;
    if (names.length === 0 || names.some((name) => name.length === 0)) {
      throw new InitializationError(`Invalid names: ${listToString(names)}`);
    }
    super(builder.settings, 'option');
    this.names = [...names];
    this.usageHelp = builder.usageHelpFlag;
    this.versionHelp = builder.versionHelpFlag;
    this.help = builder.helpFlag;
  }

  static builder(...names: string[]): OptionSpecBuilder {
    return new OptionSpecBuilder(names);
  }

  /** Builder initialized with this option's settings */
  toBuilder(): OptionSpecBuilder {
    return new OptionSpecBuilder(this.names, this.toSettings())
      .usageHelp(this.usageHelp)
      .versionHelp(this.versionHelp)
      .help(this.help);
  }

  isOption(): this is OptionSpec {
    return true;
  }

  isPositional(): this is PositionalParamSpec {
    return false;
  }

  /** Longest name; the first one wins on equal length */
  longestName(): string {
    return [...this.names].sort((a, b) => b.length - a.length)[0];
  }

  /** Shortest name; the first one wins on equal length */
  shortestName(): string {
    return [...this.names].sort((a, b) => a.length - b.length)[0];
  }

  protected describe(): string {
    return `option ${this.longestName()}`;
  }
}
