import path from 'path';
import { format } from 'date-fns';
import {
  CanonicalColumn,
  HoldingPosition,
  HoldingRow,
  HoldingsColumn,
  HoldingsMergeResult,
  HoldingsOverview,
  HoldingsTable,
  MergeResult,
  NormalizedRow,
  NormalizedTable,
  PortfolioEntry,
} from '../types/ledger';
import { readCsvRecords, writeCsvTable } from '../storage/csvTable';
import { dedupeKeepFirst, dedupeKeepLast, fullRowKey } from './dedupe';
import {
  canonicalColumnsOf,
  holdingFromRecord,
  holdingsColumnsOf,
  HOLDINGS_FILE,
  rowFromRecord,
  TRADES_FILE,
  unionColumns,
} from './schema';
import { PortfolioTracker } from './portfolioTracker';
import { Logger, silentLogger } from '../logger';

export interface LedgerStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

const holdingKey = (row: HoldingRow) => JSON.stringify([row.symbol ?? null, row.import_date]);

/** Sum of the non-null values; null when there are none. */
function sumPresent(values: readonly (number | null | undefined)[]): number | null {
  const present = values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
  return present.length > 0 ? present.reduce((sum, v) => sum + v, 0) : null;
}

/**
 * Holdings and trades ledgers for one data directory.
 * Every merge reads the whole file, merges in memory and rewrites it.
 * One writer per directory; nothing here locks.
 */
export class LedgerStore {
  readonly dataDir: string;
  readonly portfolio: PortfolioTracker;
  private holdingsFile: string;
  private tradesFile: string;
  private logger: Logger;
  private now: () => Date;

  constructor(dataDir: string, options: LedgerStoreOptions = {}) {
    this.dataDir = dataDir;
    this.holdingsFile = path.join(dataDir, HOLDINGS_FILE);
    this.tradesFile = path.join(dataDir, TRADES_FILE);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.portfolio = new PortfolioTracker(dataDir, { logger: this.logger, now: this.now });
  }

  private today(): string {
    return format(this.now(), 'yyyy-MM-dd');
  }

  async loadHoldings(): Promise<HoldingsTable | null> {
    const stored = await readCsvRecords(this.holdingsFile);
    if (!stored) return null;
    const canonical = canonicalColumnsOf(stored.columns);
    return {
      columns: holdingsColumnsOf(stored.columns),
      rows: stored.records.map(record => holdingFromRecord(record, canonical)),
    };
  }

  async loadTrades(): Promise<NormalizedTable | null> {
    const stored = await readCsvRecords(this.tradesFile);
    if (!stored) return null;
    const columns = canonicalColumnsOf(stored.columns);
    return { columns, rows: stored.records.map(record => rowFromRecord(record, columns)) };
  }

  /**
   * Tag rows with today's import date and merge them, last write winning per
   * (symbol, import_date). Records a portfolio entry for today's snapshot
   * when it has any market value.
   */
  async mergeHoldings(table: NormalizedTable): Promise<HoldingsMergeResult> {
    const importDate = this.today();
    const incoming: HoldingRow[] = table.rows.map(row => ({ ...row, import_date: importDate }));
    const existing = await this.loadHoldings();

    const columns = unionColumns<HoldingsColumn>(existing?.columns ?? [], [...table.columns, 'import_date']);
    const merged = dedupeKeepLast([...(existing?.rows ?? []), ...incoming], holdingKey);

    const persisted = await writeCsvTable(this.holdingsFile, columns, merged);
    this.logger.log(`Holdings: merged ${incoming.length} rows for ${importDate}, ${persisted} rows stored`);

    const snapshot = merged.filter(row => row.import_date === importDate);
    const totalValue = sumPresent(snapshot.map(row => row.market_value));
    let entry: PortfolioEntry | null = null;
    if (totalValue !== null) {
      entry = await this.portfolio.addEntry({
        total_value: totalValue,
        notes: `CSV import (${snapshot.length} holdings)`,
      });
    }

    return { persisted, imported: incoming.length, entry };
  }

  /**
   * Append trades, dropping only rows identical in every column.
   */
  async mergeTrades(table: NormalizedTable): Promise<MergeResult> {
    const existing = await this.loadTrades();
    const columns = unionColumns<CanonicalColumn>(existing?.columns ?? [], table.columns);
    const merged = dedupeKeepFirst([...(existing?.rows ?? []), ...table.rows], fullRowKey<NormalizedRow>(columns));

    const persisted = await writeCsvTable(this.tradesFile, columns, merged);
    this.logger.log(`Trades: merged ${table.rows.length} rows, ${persisted} rows stored`);
    return { persisted, imported: table.rows.length };
  }

  /** Rows sharing the most recent import_date. */
  async latestSnapshot(): Promise<HoldingsTable | null> {
    const holdings = await this.loadHoldings();
    if (!holdings || holdings.rows.length === 0) return null;

    const latest = holdings.rows.reduce((max, row) => (row.import_date > max ? row.import_date : max), '');
    return {
      columns: holdings.columns,
      rows: holdings.rows.filter(row => row.import_date === latest),
    };
  }

  /**
   * Totals of the latest snapshot plus its largest positions by market value.
   */
  async holdingsOverview(limit = 10): Promise<HoldingsOverview | null> {
    const snapshot = await this.latestSnapshot();
    if (!snapshot) return null;

    const totalValue = sumPresent(snapshot.rows.map(row => row.market_value)) ?? 0;
    const totalGainLoss = sumPresent(snapshot.rows.map(row => row.gain_loss)) ?? 0;
    const costBasis = totalValue - totalGainLoss;

    const top: HoldingPosition[] = [...snapshot.rows]
      .sort((a, b) => (b.market_value ?? Number.MIN_SAFE_INTEGER) - (a.market_value ?? Number.MIN_SAFE_INTEGER))
      .slice(0, Math.max(0, limit))
      .map(row => {
        const marketValue = row.market_value ?? null;
        return {
          symbol: row.symbol ?? null,
          name: row.name ?? null,
          market_value: marketValue,
          gain_loss: row.gain_loss ?? null,
          gain_loss_rate: row.gain_loss_rate ?? null,
          weight: marketValue !== null && totalValue !== 0 ? (marketValue / totalValue) * 100 : null,
        };
      });

    return {
      import_date: snapshot.rows[0].import_date,
      total_value: totalValue,
      total_gain_loss: totalGainLoss,
      avg_return: totalValue > 0 && costBasis !== 0 ? (totalGainLoss / costBasis) * 100 : 0,
      holdings_count: snapshot.rows.length,
      top,
    };
  }
}
