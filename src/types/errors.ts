/**
 * Raised when the history store cannot be opened, read or written.
 * Callers treat it as recoverable: the in-memory history is unaffected.
 */
export class HistoryStorageError extends Error {
  readonly docId: string | null;

  constructor(message: string, options: { cause?: unknown; docId?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = 'HistoryStorageError';
    this.docId = options.docId ?? null;
  }
}

/**
 * Raised when a stored record does not decode to the expected shape
 */
export class HistoryFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HistoryFormatError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
