/**
 * Named column extraction
 * Picks a fixed list of columns by canonical name and standardises their labels
 */

import { fail, ok } from '@/lib/errors';
import { buildColumnMap, normalizeColumnName } from '@/lib/table/normalize';
import type { ExtractResult, Table } from '@/lib/types';

/**
 * Return a table holding exactly `requiredNames`, in that order and under those
 * names. Every missing name is reported at once; a required name that matches
 * more than one source column is rejected as ambiguous. When both happen the
 * failure is missing_columns and its reason lists the ambiguous names too.
 */
export function extractNamedColumns(table: Table, requiredNames: string[]): ExtractResult {
  const columnMap = buildColumnMap(table.columns);

  const missing: string[] = [];
  const ambiguous: string[] = [];
  const positions: number[] = [];

  for (const name of requiredNames) {
    const matches = columnMap.get(normalizeColumnName(name));
    if (!matches) {
      missing.push(name);
    } else if (matches.length > 1) {
      ambiguous.push(name);
    } else {
      positions.push(matches[0]);
    }
  }

  const detail = ambiguous
    .map((name) => {
      const originals = (columnMap.get(normalizeColumnName(name)) ?? []).map(
        (i) => `"${table.columns[i]}"`
      );
      return `${name} (${originals.join(', ')})`;
    })
    .join('; ');

  if (missing.length > 0) {
    const reason = `Missing columns: ${missing.join(', ')}`;
    return fail(
      'missing_columns',
      ambiguous.length > 0 ? `${reason}; Ambiguous columns: ${detail}` : reason,
      missing
    );
  }

  if (ambiguous.length > 0) {
    return fail('ambiguous_column', `Ambiguous columns: ${detail}`, ambiguous);
  }

  return ok({
    columns: [...requiredNames],
    rows: table.rows.map((row) => positions.map((i) => row[i])),
  });
}
