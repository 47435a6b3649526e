/**
 * Type Definitions for argbind
 */

import type { ArgSpec } from '../model/arg-spec.js';

// ─────────────────────────────────────────────────────────────
// Value Types
// ─────────────────────────────────────────────────────────────

/** Shape of the value an argument binds */
export type ContainerKind = 'single' | 'array' | 'set' | 'map';

/** Enumeration type: constant names mapped to their values */
export interface EnumType {
  readonly kind: 'enum';
  /** Display name used in error messages */
  readonly name: string;
  /** Constant names in declaration order */
  readonly constants: readonly string[];
  /** Constant name -> value */
  readonly values: ReadonlyMap<string, unknown>;
}

/**
 * Element type reference: a converter registry key ('int', 'url', ...)
 * or an enumeration type
 */
export type TypeRef = string | EnumType;

/** Converts one raw string into a typed value; throws TypeConversionError on bad input */
export type TypeConverter<T = unknown> = (value: string) => T;

// ─────────────────────────────────────────────────────────────
// Bindings
// ─────────────────────────────────────────────────────────────

/** Where the value of an argument is stored */
export interface Binding {
  get(): unknown;
  set(value: unknown): void;
}

// ─────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────

/** How an option's first value was attached to the option token */
export type LookBehind = 'separate' | 'attached' | 'attached-with-separator';

/**
 * Synchronous reader for interactive arguments. Receives the prompt text
 * and returns the entered value.
 */
export type InteractiveReader = (prompt: string) => string;

/** Returns the default value for an argument, or undefined for none */
export type DefaultValueProvider = (argSpec: ArgSpec) => string | undefined;
