import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { DEFAULT_ENCODINGS } from "./ingestion/encoding";
import { FileImportReport, importDirectory } from "./ingestion/importer";
import { LedgerStore } from "./ledger/store";
import { createLogger, Logger } from "./logger";

export interface LedgerConfig {
  dataDir: string;
  importDir: string;
  encodings: readonly string[];
}

const ENV_FILES = [".env.local", ".env"];

/** Load `.env.local` then `.env` from `root`; values already set win. */
export function loadEnvFiles(root: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ENV_FILES) {
    const full = path.join(root, file);
    if (fs.existsSync(full)) {
      dotenv.config({ path: full });
      loaded.push(full);
    }
  }
  return loaded;
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadLedgerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): LedgerConfig {
  const encodings = parseList(env.LEDGER_ENCODINGS);
  return {
    dataDir: path.resolve(cwd, env.LEDGER_DATA_DIR || "data"),
    importDir: path.resolve(cwd, env.LEDGER_IMPORT_DIR || "imports"),
    encodings: encodings.length > 0 ? encodings : DEFAULT_ENCODINGS,
  };
}

export function createLedgerStore(config: LedgerConfig, logger: Logger = createLogger("LEDGER")): LedgerStore {
  return new LedgerStore(config.dataDir, { logger });
}

/** Import every pending export in `config.importDir` into the configured ledger. */
export async function importConfiguredDirectory(
  config: LedgerConfig,
  logger: Logger = createLogger("IMPORT")
): Promise<FileImportReport[]> {
  const store = createLedgerStore(config, logger);
  return importDirectory(config.importDir, store, { encodings: config.encodings, logger });
}
