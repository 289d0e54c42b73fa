import path from 'path';
import {
  CanonicalColumn,
  isNumericColumn,
  isTextColumn,
  LayoutName,
  LayoutSpec,
  NormalizedRow,
  NormalizedTable,
} from '../types/ledger';
import { cleanNumeric, isBlank, toIsoDate, toText } from './cells';
import { detectLayout } from './detect';
import { fail, IngestResult, ok } from './errors';
import { createDefaultRegistry, LayoutRegistry } from './layouts';
import { readSourceTable } from './sourceTable';
import { Logger, silentLogger } from '../logger';

export interface StandardizedFile {
  table: NormalizedTable;
  layout: LayoutSpec;
  encoding: string | null;
  misses: Partial<Record<CanonicalColumn, number>>;   // non-empty cells coerced to null
}

export interface StandardizeOptions {
  layout?: LayoutName;
  registry?: LayoutRegistry;
  encodings?: readonly string[];
  logger?: Logger;
}

/**
 * Bind source header positions to canonical columns. A canonical column takes
 * the first header containing one of its aliases; if a later canonical column
 * claims the same header, the later one keeps it.
 */
export function resolveColumns(layout: LayoutSpec, headers: readonly string[]): Map<number, CanonicalColumn> {
  const bound = new Map<number, CanonicalColumn>();
  for (const { column, aliases } of layout.columns) {
    const index = headers.findIndex(h => aliases.some(alias => h.includes(alias)));
    if (index !== -1) {
      bound.set(index, column);
    }
  }
  return new Map([...bound.entries()].sort(([a], [b]) => a - b));
}

function coerceRow(
  cells: readonly string[],
  bindings: Map<number, CanonicalColumn>,
  misses: Partial<Record<CanonicalColumn, number>>
): NormalizedRow {
  const row: NormalizedRow = {};
  const miss = (column: CanonicalColumn, raw: string | undefined) => {
    if (!isBlank(raw)) misses[column] = (misses[column] ?? 0) + 1;
  };

  for (const [index, column] of bindings) {
    const raw = cells[index];
    if (column === 'date') {
      row.date = toIsoDate(raw);
      if (row.date === null) miss(column, raw);
    } else if (isNumericColumn(column)) {
      const value = cleanNumeric(raw);
      row[column] = value;
      if (value === null) miss(column, raw);
    } else if (isTextColumn(column)) {
      row[column] = toText(raw);
    }
  }
  return row;
}

export function normalizeRows(
  layout: LayoutSpec,
  headers: readonly string[],
  rows: readonly string[][]
): { table: NormalizedTable; misses: Partial<Record<CanonicalColumn, number>> } {
  const bindings = resolveColumns(layout, headers);
  const misses: Partial<Record<CanonicalColumn, number>> = {};
  const normalized = rows.map(cells => coerceRow(cells, bindings, misses));
  return {
    table: { columns: [...bindings.values()], rows: normalized },
    misses,
  };
}

/**
 * Read a broker export, pick (or accept) its layout and produce the canonical table.
 */
export async function standardize(
  filePath: string,
  options: StandardizeOptions = {}
): Promise<IngestResult<StandardizedFile>> {
  const registry = options.registry ?? createDefaultRegistry();
  const logger = options.logger ?? silentLogger;
  const fileName = path.basename(filePath);

  let layout: LayoutSpec | undefined;
  if (options.layout !== undefined) {
    layout = registry.get(options.layout);
    if (!layout) {
      return fail('unknown_format', filePath, `Layout ${options.layout} is not registered`);
    }
  }

  const source = await readSourceTable(filePath, { encodings: options.encodings });
  if (!source.ok) {
    logger.error(`Could not read ${fileName}: ${source.error.message}`);
    return source;
  }
  const { headers, rows, encoding } = source.value;

  if (!layout) {
    const detection = detectLayout(filePath, headers, registry);
    if (!detection) {
      logger.warn(`No layout matched ${fileName}`);
      return fail('unknown_format', filePath, 'No registered layout matched the file name or header');
    }
    layout = detection.layout;
    logger.log(`Layout ${layout.name} from ${detection.source}`);
  }

  const { table, misses } = normalizeRows(layout, headers, rows);
  if (table.columns.length === 0) {
    return fail('data_conversion_failure', filePath, `No column of ${fileName} matched layout ${layout.name}`);
  }

  const missed = Object.values(misses).reduce((sum, n) => sum + (n ?? 0), 0);
  logger.log(
    `Standardized ${table.rows.length} rows from ${fileName}` +
      (encoding ? ` (${encoding})` : '') +
      (missed ? `, ${missed} cells left empty` : '')
  );

  return ok({ table, layout, encoding, misses });
}
