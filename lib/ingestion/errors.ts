export type IngestErrorCode =
  | 'unknown_format'
  | 'encoding_failure'
  | 'data_conversion_failure'
  | 'io_failure';

export class IngestError extends Error {
  code: IngestErrorCode;
  filePath: string;

  constructor(message: string, options: { code: IngestErrorCode; filePath: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'IngestError';
    this.code = options.code;
    this.filePath = options.filePath;
  }
}

export type IngestResult<T> = { ok: true; value: T } | { ok: false; error: IngestError };

export const isIngestError = (value: unknown): value is IngestError => value instanceof IngestError;

export const ok = <T>(value: T): IngestResult<T> => ({ ok: true, value });

export const fail = <T>(
  code: IngestErrorCode,
  filePath: string,
  message: string,
  cause?: unknown,
): IngestResult<T> => ({ ok: false, error: new IngestError(message, { code, filePath, cause }) });

export const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const formatIngestError = (error: unknown): string => {
  if (isIngestError(error)) {
    if (error.code === 'unknown_format') {
      return `Unrecognized CSV layout in ${error.filePath}. Choose a layout explicitly.`;
    }
    if (error.code === 'encoding_failure') {
      return `Could not decode ${error.filePath} with any supported encoding.`;
    }
    if (error.code === 'data_conversion_failure') {
      return `Could not convert ${error.filePath}: ${error.message}`;
    }
    return `File access failed for ${error.filePath}: ${error.message}`;
  }
  return describeCause(error);
};
