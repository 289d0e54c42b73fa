import path from 'path';
import { format } from 'date-fns';
import { PORTFOLIO_COLUMNS, PortfolioEntry, PortfolioEntryInput, PortfolioSummary } from '../types/ledger';
import { readCsvRecords, writeCsvTable } from '../storage/csvTable';
import { toIsoDate } from '../ingestion/cells';
import { entryFromRecord, PORTFOLIO_FILE } from './schema';
import { flowAdjustedReturn, summarizeEntries } from './returns';
import { Logger, silentLogger } from '../logger';

export interface TrackerOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Portfolio value ledger: one entry per recorded snapshot, appended in order,
 * each carrying its flow-adjusted return against the entry before it.
 */
export class PortfolioTracker {
  readonly filePath: string;
  private logger: Logger;
  private now: () => Date;

  constructor(dataDir: string, options: TrackerOptions = {}) {
    this.filePath = path.join(dataDir, PORTFOLIO_FILE);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async listEntries(): Promise<PortfolioEntry[]> {
    const stored = await readCsvRecords(this.filePath);
    return stored ? stored.records.map(entryFromRecord) : [];
  }

  /**
   * Append an entry. Past entries are never revised; a correction is a new entry.
   */
  async addEntry(input: PortfolioEntryInput): Promise<PortfolioEntry> {
    const amounts = { total_value: input.total_value, deposit: input.deposit ?? 0, withdrawal: input.withdrawal ?? 0 };
    for (const [field, value] of Object.entries(amounts)) {
      if (!Number.isFinite(value)) {
        throw new RangeError(`${field} must be a finite number, got ${value}`);
      }
    }
    const date = input.date === undefined ? format(this.now(), 'yyyy-MM-dd') : toIsoDate(input.date);
    if (date === null) {
      throw new RangeError(`Invalid entry date: ${input.date}`);
    }

    const { deposit, withdrawal } = amounts;
    const netFlow = deposit - withdrawal;

    const entries = await this.listEntries();
    const prev = entries.length > 0 ? entries[entries.length - 1] : null;

    const entry: PortfolioEntry = {
      date,
      total_value: input.total_value,
      deposit,
      withdrawal,
      net_flow: netFlow,
      return_rate: flowAdjustedReturn(prev ? prev.total_value : null, input.total_value, netFlow),
      notes: input.notes ?? '',
    };

    await writeCsvTable(this.filePath, PORTFOLIO_COLUMNS, [...entries, entry]);
    this.logger.log(`Recorded ${entry.date}: value ${entry.total_value}, return ${entry.return_rate}%`);
    return entry;
  }

  async recent(n = 5): Promise<PortfolioEntry[]> {
    const entries = await this.listEntries();
    return n > 0 ? entries.slice(-n) : [];
  }

  async summary(): Promise<PortfolioSummary | null> {
    return summarizeEntries(await this.listEntries());
  }
}
