/**
 * Shared Utilities
 *
 * Small string and list helpers used across the model, parser and errors.
 */

/**
 * Strip the option prefix from a name: everything before the first
 * identifier character (`--dry-run` becomes `dry-run`, `/v` becomes `v`).
 */
export function stripPrefix(prefixed: string): string {
  for (let i = 0; i < prefixed.length; i++) {
    if (/[\p{L}\p{N}_$]/u.test(prefixed.charAt(i))) {
      return prefixed.slice(i);
    }
  }
  return prefixed;
}

/**
 * Convert a dashed or underscored name to camelCase (`dry-run` -> `dryRun`)
 */
export function camelCase(name: string): string {
  return name
    .replace(/[-_]+(\p{L}|\p{N})/gu, (_match, ch: string) => ch.toUpperCase())
    .replace(/[-_]+$/, '');
}

/**
 * Render a list as `[a, b, c]`
 */
export function listToString(items: readonly unknown[]): string {
  return `[${items.map((item) => String(item)).join(', ')}]`;
}

/**
 * Check if a string is empty or whitespace only
 */
export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

/**
 * Remove the first occurrence of an item from an array (in place)
 */
export function removeItem<T>(items: T[], item: T): boolean {
  const index = items.indexOf(item);
  if (index < 0) {
    return false;
  }
  items.splice(index, 1);
  return true;
}
