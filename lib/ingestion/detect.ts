import path from 'path';
import { LayoutName, LayoutSpec } from '../types/ledger';
import { fail, IngestResult, ok } from './errors';
import { createDefaultRegistry, LayoutRegistry } from './layouts';
import { readSourceTable } from './sourceTable';
import { Logger, silentLogger } from '../logger';

export const HEADER_MATCH_THRESHOLD = 3;

export type DetectionSource = 'filename' | 'header';

export interface Detection {
  layout: LayoutSpec;
  source: DetectionSource;
  matches?: number;
}

/**
 * Number of canonical columns with at least one header containing one of its aliases.
 */
export function countHeaderMatches(layout: LayoutSpec, headers: readonly string[]): number {
  return layout.columns.filter(({ aliases }) =>
    headers.some(header => aliases.some(alias => header.includes(alias)))
  ).length;
}

/**
 * Filename pattern first, then header aliases. Both scans run in registration
 * order and stop at the first layout that qualifies; there is no best-score search.
 */
export function detectLayout(
  fileName: string,
  headers: readonly string[] | null,
  registry: LayoutRegistry
): Detection | null {
  const lowered = path.basename(fileName).toLowerCase();
  for (const layout of registry.list()) {
    // search() leaves lastIndex alone, so /g and /y patterns behave the same on every call.
    if (lowered.search(layout.pattern) !== -1) {
      return { layout, source: 'filename' };
    }
  }

  if (!headers) return null;

  for (const layout of registry.list()) {
    const matches = countHeaderMatches(layout, headers);
    if (matches >= HEADER_MATCH_THRESHOLD) {
      return { layout, source: 'header', matches };
    }
  }
  return null;
}

export interface DetectOptions {
  registry?: LayoutRegistry;
  encodings?: readonly string[];
  logger?: Logger;
}

export async function detectFormat(filePath: string, options: DetectOptions = {}): Promise<IngestResult<LayoutName>> {
  const registry = options.registry ?? createDefaultRegistry();
  const logger = options.logger ?? silentLogger;

  const byName = detectLayout(filePath, null, registry);
  if (byName) {
    logger.log(`Layout ${byName.layout.name} from file name ${path.basename(filePath)}`);
    return ok(byName.layout.name);
  }

  const source = await readSourceTable(filePath, { encodings: options.encodings, headerOnly: true });
  if (!source.ok) return source;

  const byHeader = detectLayout(filePath, source.value.headers, registry);
  if (!byHeader) {
    logger.warn(`No layout matched ${path.basename(filePath)}`);
    return fail('unknown_format', filePath, 'No registered layout matched the file name or header');
  }
  logger.log(`Layout ${byHeader.layout.name} from header (${byHeader.matches} columns matched)`);
  return ok(byHeader.layout.name);
}
