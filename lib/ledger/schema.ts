import {
  CanonicalColumn,
  HoldingRow,
  HoldingsColumn,
  isCanonicalColumn,
  isNumericColumn,
  isTextColumn,
  NormalizedRow,
  PortfolioEntry,
} from '../types/ledger';
import { cleanNumeric, toIsoDate, toText } from '../ingestion/cells';

export const HOLDINGS_FILE = 'holdings.csv';
export const TRADES_FILE = 'trades.csv';
export const PORTFOLIO_FILE = 'portfolio.csv';

/** Known columns of a stored ledger, in file order; unknown ones are ignored. */
export function canonicalColumnsOf(columns: readonly string[]): CanonicalColumn[] {
  return columns.filter(isCanonicalColumn);
}

export function holdingsColumnsOf(columns: readonly string[]): HoldingsColumn[] {
  return columns.filter((c): c is HoldingsColumn => c === 'import_date' || isCanonicalColumn(c));
}

/** Rebuild a typed row from stored text; only columns the file has are set. */
export function rowFromRecord(record: Record<string, string | undefined>, columns: readonly CanonicalColumn[]): NormalizedRow {
  const row: NormalizedRow = {};
  for (const column of columns) {
    const raw = record[column];
    if (column === 'date') {
      row.date = toIsoDate(raw);
    } else if (isNumericColumn(column)) {
      row[column] = cleanNumeric(raw);
    } else if (isTextColumn(column)) {
      row[column] = toText(raw);
    }
  }
  return row;
}

export function holdingFromRecord(record: Record<string, string | undefined>, columns: readonly CanonicalColumn[]): HoldingRow {
  return { ...rowFromRecord(record, columns), import_date: toText(record.import_date) ?? '' };
}

export function entryFromRecord(record: Record<string, string | undefined>): PortfolioEntry {
  const num = (key: keyof PortfolioEntry) => cleanNumeric(record[key]) ?? 0;
  return {
    date: toIsoDate(record.date) ?? toText(record.date) ?? '',
    total_value: num('total_value'),
    deposit: num('deposit'),
    withdrawal: num('withdrawal'),
    net_flow: num('net_flow'),
    return_rate: num('return_rate'),
    notes: record.notes ?? '',
  };
}

/** Column union for a concatenation: existing order first, then new columns. */
export function unionColumns<C extends string>(existing: readonly C[], incoming: readonly C[]): C[] {
  const out = [...existing];
  for (const column of incoming) {
    if (!out.includes(column)) out.push(column);
  }
  return out;
}
