export const NUMERIC_COLUMNS = [
  'quantity',
  'unit_price',
  'market_value',
  'gain_loss',
  'gain_loss_rate',
  'price',
  'amount',
  'avg_price',
  'current_price',
] as const;

export const TEXT_COLUMNS = ['symbol', 'name', 'type'] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];
export type TextColumn = (typeof TEXT_COLUMNS)[number];
export type CanonicalColumn = 'date' | TextColumn | NumericColumn;

export const CANONICAL_COLUMNS: readonly CanonicalColumn[] = ['date', ...TEXT_COLUMNS, ...NUMERIC_COLUMNS];

export type NormalizedRow = {
  date?: string | null;    // YYYY-MM-DD
} & { [K in TextColumn]?: string | null } & { [K in NumericColumn]?: number | null };

export interface NormalizedTable {
  columns: CanonicalColumn[];  // source header order
  rows: NormalizedRow[];
}

export type HoldingsColumn = CanonicalColumn | 'import_date';

export type HoldingRow = NormalizedRow & {
  import_date: string;     // YYYY-MM-DD, day the import ran
};

export interface HoldingsTable {
  columns: HoldingsColumn[];
  rows: HoldingRow[];
}

export type LayoutName = string;
export type LayoutKind = 'holdings' | 'trades';

export interface ColumnAliases {
  column: CanonicalColumn;
  aliases: readonly string[];
}

export interface LayoutSpec {
  name: LayoutName;
  label: string;
  kind: LayoutKind;
  pattern: RegExp;                         // tested against the lower-cased file name
  columns: readonly ColumnAliases[];
}

export type PortfolioEntry = {
  date: string;
  total_value: number;
  deposit: number;
  withdrawal: number;
  net_flow: number;
  return_rate: number;     // percent vs previous entry
  notes: string;
};

export const PORTFOLIO_COLUMNS = [
  'date',
  'total_value',
  'deposit',
  'withdrawal',
  'net_flow',
  'return_rate',
  'notes',
] as const satisfies readonly (keyof PortfolioEntry)[];

export interface PortfolioEntryInput {
  date?: string;
  total_value: number;
  deposit?: number;
  withdrawal?: number;
  notes?: string;
}

export interface PortfolioSummary {
  current_value: number;
  net_invested: number;
  total_return: number;
  total_return_rate: number;
  period_days: number;
}

export interface HoldingPosition {
  symbol: string | null;
  name: string | null;
  market_value: number | null;
  gain_loss: number | null;
  gain_loss_rate: number | null;
  weight: number | null;   // percent of snapshot value
}

export interface HoldingsOverview {
  import_date: string;
  total_value: number;
  total_gain_loss: number;
  avg_return: number;
  holdings_count: number;
  top: HoldingPosition[];
}

export interface MergeResult {
  persisted: number;       // rows in the ledger file after the write
  imported: number;
}

export interface HoldingsMergeResult extends MergeResult {
  entry: PortfolioEntry | null;
}

export const isNumericColumn = (c: string): c is NumericColumn =>
  NUMERIC_COLUMNS.some(n => n === c);

export const isTextColumn = (c: string): c is TextColumn =>
  TEXT_COLUMNS.some(t => t === c);

export const isCanonicalColumn = (c: string): c is CanonicalColumn =>
  CANONICAL_COLUMNS.some(k => k === c);
