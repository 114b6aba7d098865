/**
 * Structural paths compiled from column headers.
 *
 * A name segment addresses an object key, a numeric segment an array index.
 * `driver.name` compiles to ['driver', 'name'], `signal[2]` to ['signal', 2].
 */

export type PathSegment = string | number;

export type KeyPath = readonly PathSegment[];

export function isIndexSegment(segment: PathSegment): segment is number {
  return typeof segment === 'number';
}

/**
 * Largest segment used as an array index. Every row allocates index + 1
 * slots, so larger numbers are kept as object keys.
 */
export const MAX_ARRAY_INDEX = 65535;
