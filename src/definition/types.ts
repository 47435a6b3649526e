/**
 * Declarative Definition Types
 *
 * Plain configuration objects describing a command tree. defineCommand()
 * turns them into CommandSpecs.
 */

import type { ParserSettings } from '../model/parser-spec.js';
import type { ContainerKind, DefaultValueProvider, TypeConverter, TypeRef } from '../types/index.js';

/** Settings shared by options and positional parameters */
export interface ArgDefinition {
  /** Arity range string (e.g., '1', '0..1', '1..*') */
  arity?: string;
  /** Element type */
  type?: TypeRef;
  /** Container the values are collected in */
  container?: ContainerKind;
  /** Key and value types of a map */
  auxiliaryTypes?: TypeRef[];
  /** Positionals default to required when their arity needs at least one value */
  required?: boolean;
  defaultValue?: string;
  /** Value before the parse; taken from the target record when omitted */
  initialValue?: unknown;
  /** Regular expression splitting one token into several values */
  split?: string;
  paramLabel?: string;
  description?: string | string[];
  hidden?: boolean;
  /** Value is read from the user instead of the command line */
  interactive?: boolean;
  /** Converters per element index */
  converters?: TypeConverter[];
  completionCandidates?: string[];
  /** Property of the target record that receives the value */
  property?: string;
}

/** Option definition */
export interface OptionDefinition extends ArgDefinition {
  /** Option names with their prefix (e.g., ['-v', '--verbose']) */
  names: string[];
  usageHelp?: boolean;
  versionHelp?: boolean;
  help?: boolean;
}

/** Positional parameter definition */
export interface PositionalDefinition extends ArgDefinition {
  /** Index range string; all positions ('*') by default */
  index?: string;
}

/** Command definition */
export interface CommandDefinition {
  name?: string;
  aliases?: string[];
  version?: string | string[];
  /** Invoking this command suppresses required checks of the chain */
  helpCommand?: boolean;
  /** Add -h/--help and -V/--version */
  mixinStandardHelpOptions?: boolean;
  options?: OptionDefinition[];
  positionals?: PositionalDefinition[];
  /** Partial commands merged into this one, by name */
  mixins?: Record<string, CommandDefinition>;
  subcommands?: SubcommandDefinition[];
  /** Parser settings of this command; inherited by subcommands defined here */
  parser?: Partial<ParserSettings>;
  /** Extra converters by type name; inherited by subcommands defined here */
  converters?: Record<string, TypeConverter>;
  defaultValueProvider?: DefaultValueProvider;
  /** Record the values of this command are bound into */
  target?: Record<string, unknown>;
  /** Property of the target record that receives unmatched tokens */
  unmatched?: string;
}

/** Subcommand definition (name required) */
export interface SubcommandDefinition extends CommandDefinition {
  name: string;
}
