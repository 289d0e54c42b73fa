/**
 * Row deduplication for ledger merges
 */

/**
 * Keep the last row for each key, at the position of that last occurrence.
 */
export function dedupeKeepLast<R>(rows: readonly R[], keyOf: (row: R) => string): R[] {
  const seen = new Set<string>();
  const kept: R[] = [];
  for (let i = rows.length - 1; i >= 0; i--) {
    const key = keyOf(rows[i]);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(rows[i]);
  }
  return kept.reverse();
}

/**
 * Keep the first row for each key.
 */
export function dedupeKeepFirst<R>(rows: readonly R[], keyOf: (row: R) => string): R[] {
  const seen = new Set<string>();
  return rows.filter(row => {
    const key = keyOf(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Key over every listed column, treating a missing cell as null. */
export function fullRowKey<R>(columns: readonly (keyof R & string)[]): (row: R) => string {
  return row => JSON.stringify(columns.map(column => row[column] ?? null));
}
