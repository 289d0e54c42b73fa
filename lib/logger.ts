export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Prefix every line with a bracketed tag, e.g. `[LEDGER] Wrote 12 rows`.
 */
export function createLogger(tag: string, sink: Logger = console): Logger {
  const prefix = `[${tag}]`;
  return {
    log: (...args) => sink.log(prefix, ...args),
    warn: (...args) => sink.warn(prefix, ...args),
    error: (...args) => sink.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
