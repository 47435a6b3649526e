/**
 * Bindings
 *
 * Getter/setter pairs abstracting where a parsed value is stored.
 */

import type { Binding } from '../types/index.js';

/**
 * Holds the value itself. Default binding of every argument.
 */
export class ObjectBinding implements Binding {
  private value: unknown;

  constructor(initialValue?: unknown) {
    this.value = initialValue;
  }

  get(): unknown {
    return this.value;
  }

  set(value: unknown): void {
    this.value = value;
  }
}

/**
 * Reads and writes one property of a host record
 */
export function propertyBinding(target: Record<string, unknown>, key: string): Binding {
  return {
    get: () => target[key],
    set: (value: unknown) => {
      target[key] = value;
    },
  };
}

/**
 * Receives unmatched tokens after a parse
 */
export interface UnmatchedArgsBinding {
  addAll(unmatched: readonly string[]): void;
}

/**
 * Unmatched-args binding that stores tokens in a list
 */
export class UnmatchedArgsList implements UnmatchedArgsBinding {
  readonly values: string[] = [];

  addAll(unmatched: readonly string[]): void {
    this.values.push(...unmatched);
  }
}

/**
 * Unmatched-args binding writing a fresh string array through a binding
 */
export function unmatchedArgsSetter(binding: Binding): UnmatchedArgsBinding {
  return {
    addAll: (unmatched: readonly string[]) => binding.set([...unmatched]),
  };
}
