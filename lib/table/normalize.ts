/**
 * Column name canonicalisation
 */

/**
 * Trim and collapse internal whitespace runs to a single space.
 * Case and punctuation are kept, so matching is exact after normalisation.
 */
export function normalizeColumnName(name: string): string {
  return name.trim().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Map each canonical name to every column position carrying it, in order
 */
export function buildColumnMap(columns: string[]): Map<string, number[]> {
  const map = new Map<string, number[]>();

  columns.forEach((column, index) => {
    const key = normalizeColumnName(column);
    const positions = map.get(key);
    if (positions) {
      positions.push(index);
    } else {
      map.set(key, [index]);
    }
  });

  return map;
}
