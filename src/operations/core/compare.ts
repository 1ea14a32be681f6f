/**
 * Ordering helpers shared by the table and catalog writers
 *
 * @module operations/core/compare
 */

/**
 * Compare strings by UTF-16 code unit, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort a copy of `items` by a string key
 */
export function sortByKey<T>(items: Iterable<T>, key: (item: T) => string): T[] {
  return Array.from(items).sort((a, b) => compareCodeUnits(key(a), key(b)));
}
