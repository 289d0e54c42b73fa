import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { decodeBuffer, DEFAULT_ENCODINGS } from './encoding';
import { describeCause, fail, IngestResult, ok } from './errors';

export interface SourceTable {
  headers: string[];
  rows: string[][];
  encoding: string | null;   // null for workbooks
}

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls']);

export function isWorkbookPath(filePath: string): boolean {
  return WORKBOOK_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

async function readBytes(filePath: string): Promise<IngestResult<Buffer>> {
  try {
    return ok(await fs.readFile(filePath));
  } catch (error) {
    return fail('io_failure', filePath, describeCause(error), error);
  }
}

function splitHeader(filePath: string, matrix: string[][], encoding: string | null): IngestResult<SourceTable> {
  const [header, ...rest] = matrix;
  const headers = (header ?? []).map(h => h.trim());
  if (headers.every(h => h === '')) {
    return fail('data_conversion_failure', filePath, 'File has no header row');
  }
  return ok({ headers, rows: rest, encoding });
}

/**
 * Parse CSV text into a header and string cells. No dynamic typing: broker
 * codes such as "0050" must survive as text.
 */
export function parseCsvMatrix(filePath: string, text: string, preview = 0): IngestResult<string[][]> {
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: true,
    preview,
  });
  const quoteError = parsed.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    return fail('data_conversion_failure', filePath, `Malformed quoting near row ${quoteError.row ?? '?'}: ${quoteError.message}`);
  }
  return ok(parsed.data);
}

function readWorkbookMatrix(filePath: string, buffer: Buffer): IngestResult<string[][]> {
  try {
    const wb = XLSX.read(buffer, { type: 'buffer' });
    if (!wb.SheetNames.length) {
      return fail('data_conversion_failure', filePath, 'Workbook has no sheets');
    }
    const sheet = wb.Sheets[wb.SheetNames[0]];
    const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: false, blankrows: false });
    return ok(raw.map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell)))));
  } catch (error) {
    return fail('data_conversion_failure', filePath, `Unreadable workbook: ${describeCause(error)}`, error);
  }
}

/**
 * Load a broker export as a header plus string cells.
 * With `headerOnly`, only the first row is parsed.
 */
export async function readSourceTable(
  filePath: string,
  options: { encodings?: readonly string[]; headerOnly?: boolean } = {}
): Promise<IngestResult<SourceTable>> {
  const bytes = await readBytes(filePath);
  if (!bytes.ok) return bytes;

  if (isWorkbookPath(filePath)) {
    const matrix = readWorkbookMatrix(filePath, bytes.value);
    if (!matrix.ok) return matrix;
    const rows = options.headerOnly ? matrix.value.slice(0, 1) : matrix.value;
    return splitHeader(filePath, rows, null);
  }

  const encodings = options.encodings ?? DEFAULT_ENCODINGS;
  const decoded = decodeBuffer(bytes.value, encodings);
  if (!decoded) {
    return fail('encoding_failure', filePath, `None of ${encodings.join(', ')} decoded the file`);
  }

  const matrix = parseCsvMatrix(filePath, decoded.text, options.headerOnly ? 1 : 0);
  if (!matrix.ok) return matrix;
  return splitHeader(filePath, matrix.value, decoded.encoding);
}
