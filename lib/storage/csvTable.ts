import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';

export interface CsvRecords {
  columns: string[];
  records: Record<string, string>[];
}

// No instanceof: fs errors can come from another realm.
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Read a ledger CSV as string records. Returns null when the file does not exist yet.
 */
export async function readCsvRecords(filePath: string): Promise<CsvRecords | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new Error(`Failed to read ${filePath}: ${error}`, { cause: error });
  }

  const parsed = Papa.parse<Record<string, string>>(content, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  const columns = parsed.meta.fields ?? [];
  return { columns, records: parsed.data };
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  return String(value);
}

/**
 * Replace the file with `rows` projected onto `columns`.
 * Atomic write: write to temp file then rename.
 */
export async function writeCsvTable<R>(
  filePath: string,
  columns: readonly (keyof R & string)[],
  rows: readonly R[]
): Promise<number> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  const csv = Papa.unparse(
    {
      fields: [...columns],
      data: rows.map(row => columns.map(column => formatCell(row[column]))),
    },
    { newline: '\n' }
  );

  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, `${csv}\n`, 'utf-8');
  await fs.promises.rename(tempPath, filePath);

  return rows.length;
}
