import { promises as fs } from 'fs';
import path from 'path';
import { LayoutKind, LayoutName, PortfolioEntry } from '../types/ledger';
import { LedgerStore } from '../ledger/store';
import { describeCause, fail, IngestError, IngestResult, ok } from './errors';
import { standardize, StandardizeOptions } from './normalize';
import { isWorkbookPath } from './sourceTable';

export interface FileImport {
  file: string;
  layout: LayoutName;
  kind: LayoutKind;
  imported: number;
  persisted: number;
  encoding: string | null;
  entry: PortfolioEntry | null;
}

export interface FileImportReport {
  file: string;
  ok: boolean;
  layout?: LayoutName;
  kind?: LayoutKind;
  persisted?: number;
  error?: IngestError;
}

const IMPORTABLE_EXTENSIONS = new Set(['.csv']);

export function isImportable(fileName: string): boolean {
  return IMPORTABLE_EXTENSIONS.has(path.extname(fileName).toLowerCase()) || isWorkbookPath(fileName);
}

/**
 * Standardize one export and merge it into the holdings or trades ledger,
 * depending on the layout's kind.
 */
export async function importFile(
  filePath: string,
  store: LedgerStore,
  options: StandardizeOptions = {}
): Promise<IngestResult<FileImport>> {
  const standardized = await standardize(filePath, options);
  if (!standardized.ok) return standardized;

  const { table, layout, encoding } = standardized.value;
  try {
    if (layout.kind === 'holdings') {
      const merged = await store.mergeHoldings(table);
      return ok({ file: filePath, layout: layout.name, kind: layout.kind, encoding, ...merged });
    }
    const merged = await store.mergeTrades(table);
    return ok({ file: filePath, layout: layout.name, kind: layout.kind, encoding, entry: null, ...merged });
  } catch (error) {
    return fail('io_failure', filePath, `Ledger update failed: ${describeCause(error)}`, error);
  }
}

/**
 * Import every CSV/workbook directly inside `dir`, in name order.
 * Each file stands alone: a failure is reported and the batch continues.
 */
export async function importDirectory(
  dir: string,
  store: LedgerStore,
  options: StandardizeOptions = {}
): Promise<FileImportReport[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    return [{ file: dir, ok: false, error: new IngestError(describeCause(error), { code: 'io_failure', filePath: dir, cause: error }) }];
  }

  const files = entries.filter(isImportable).sort();
  const reports: FileImportReport[] = [];

  for (const name of files) {
    const filePath = path.join(dir, name);
    const result = await importFile(filePath, store, options);
    if (result.ok) {
      reports.push({
        file: name,
        ok: true,
        layout: result.value.layout,
        kind: result.value.kind,
        persisted: result.value.persisted,
      });
    } else {
      options.logger?.warn(`Skipped ${name}: ${result.error.message}`);
      reports.push({ file: name, ok: false, error: result.error });
    }
  }

  return reports;
}
