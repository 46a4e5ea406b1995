/**
 * Relaxed property name helpers
 *
 * `orders-db`, `orders_db`, `ORDERS_DB` and `ordersDb` all refer to the same
 * configuration segment.
 */

const SEPARATORS = /[-_\s]+/;

/**
 * Canonical form of a single key segment: lowercase, separators removed
 */
export function canonicalName(segment: string): string {
  return segment.toLowerCase().replace(/[-_\s]/g, '');
}

/**
 * Canonical form of a dotted key, segment by segment
 */
export function canonicalPath(key: string): string[] {
  return key
    .split('.')
    .filter((segment) => segment.length > 0)
    .map(canonicalName);
}

/**
 * Convert a separated name to camelCase
 * `orders-db` -> `ordersDb`, `Read_Replica` -> `readReplica`
 */
export function separatedToCamel(name: string): string {
  const pieces = name.split(SEPARATORS).filter((piece) => piece.length > 0);

  return pieces
    .map((piece, index) =>
      index === 0
        ? piece.charAt(0).toLowerCase() + piece.slice(1)
        : piece.charAt(0).toUpperCase() + piece.slice(1),
    )
    .join('');
}

export function endsWithIgnoreCase(value: string, suffix: string): boolean {
  return value.toLowerCase().endsWith(suffix.toLowerCase());
}
