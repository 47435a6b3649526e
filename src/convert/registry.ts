/**
 * Type Converter Registry
 *
 * Maps element type names to string -> value converters. Each CommandSpec
 * owns one registry; subcommands never share their parent's instance.
 */

import { BUILT_IN_CONVERTERS } from './builtins.js';
import { typeName } from './enums.js';
import { InitializationError } from '../errors/index.js';
import { logger } from '../logger.js';
import type { TypeConverter, TypeRef } from '../types/index.js';

/**
 * Read ARGBIND_CONVERTERS_EXCLUDES: comma-separated patterns of built-in
 * type names to leave unregistered
 */
export function getConverterExcludesFromEnv(): RegExp[] {
  const raw = process.env.ARGBIND_CONVERTERS_EXCLUDES;
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0)
    .map((pattern) => new RegExp(`^(?:${pattern})$`));
}

/**
 * Registry of type converters
 */
export class TypeConverterRegistry {
  private readonly converters: Map<string, TypeConverter>;

  constructor(entries: Iterable<readonly [string, TypeConverter]> = []) {
    this.converters = new Map(entries);
  }

  /**
   * Registry holding every built-in converter whose type name matches
   * none of `excludes`
   */
  static withBuiltIns(excludes: readonly RegExp[] = getConverterExcludesFromEnv()): TypeConverterRegistry {
    const registry = new TypeConverterRegistry();
    for (const [type, converter] of Object.entries(BUILT_IN_CONVERTERS)) {
      if (excludes.some((pattern) => pattern.test(type))) {
        logger.debug(`Not registering built-in converter for '${type}': excluded`);
        continue;
      }
      registry.converters.set(type, converter);
    }
    return registry;
  }

  /**
   * Register a converter, replacing any existing one for the type
   *
   * @throws {InitializationError} If the registration is invalid
   */
  register<T>(type: TypeRef, converter: TypeConverter<T>): TypeConverterRegistry {
    const error = this.validate(type, converter);
    if (error) {
      throw new InitializationError(`Invalid converter for '${typeName(type)}': ${error}`);
    }
    const name = typeName(type);
    if (this.converters.has(name)) {
      logger.debug(`Replacing converter for '${name}'`);
    }
    this.converters.set(name, converter);
    return this;
  }

  /**
   * Register several converters at once
   */
  registerAll(converters: Record<string, TypeConverter>): TypeConverterRegistry {
    for (const [type, converter] of Object.entries(converters)) {
      this.register(type, converter);
    }
    return this;
  }

  /**
   * Validate a registration
   */
  validate(type: TypeRef, converter: unknown): string | null {
    if (typeName(type).length === 0) {
      return 'Missing type name';
    }
    if (typeof converter !== 'function') {
      return 'Converter must be a function';
    }
    return null;
  }

  get(type: TypeRef): TypeConverter | undefined {
    return this.converters.get(typeName(type));
  }

  has(type: TypeRef): boolean {
    return this.converters.has(typeName(type));
  }

  /** Registered type names in registration order */
  types(): string[] {
    return [...this.converters.keys()];
  }

  /** Independent copy of this registry */
  clone(): TypeConverterRegistry {
    return new TypeConverterRegistry(this.converters);
  }
}
