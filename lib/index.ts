export * from './types/ledger';
export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';
export { loadEnvFiles, loadLedgerConfig, createLedgerStore, importConfiguredDirectory } from './config';
export type { LedgerConfig } from './config';
export { IngestError, isIngestError, formatIngestError } from './ingestion/errors';
export type { IngestErrorCode, IngestResult } from './ingestion/errors';
export { BUILTIN_LAYOUTS, LayoutRegistry, createDefaultRegistry } from './ingestion/layouts';
export { detectFormat, detectLayout, HEADER_MATCH_THRESHOLD } from './ingestion/detect';
export { standardize } from './ingestion/normalize';
export type { StandardizedFile, StandardizeOptions } from './ingestion/normalize';
export { cleanNumeric, toIsoDate } from './ingestion/cells';
export { decodeBuffer, DEFAULT_ENCODINGS } from './ingestion/encoding';
export { importFile, importDirectory } from './ingestion/importer';
export type { FileImport, FileImportReport } from './ingestion/importer';
export { LedgerStore } from './ledger/store';
export { PortfolioTracker } from './ledger/portfolioTracker';
export { flowAdjustedReturn, summarizeEntries } from './ledger/returns';
