/**
 * Deck Report Module - Domain Errors
 *
 * Every error is fatal for the run; nothing is retried.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The collection could not be opened, queried, or a row could not be decoded.
 */
export interface DataAccessError {
  readonly type: 'DataAccessError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A state code outside the known mapping.
 */
export interface InvalidStateCodeError {
  readonly type: 'InvalidStateCode';
  readonly message: string;
  readonly code: number;
}

/**
 * A note with fewer fields than the card roles require.
 */
export interface MalformedRecordError {
  readonly type: 'MalformedRecord';
  readonly message: string;
  readonly fieldCount: number;
  readonly minimum: number;
}

export interface TemplateIOError {
  readonly type: 'TemplateIOError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

export interface OutputIOError {
  readonly type: 'OutputIOError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type ExtractionError = InvalidStateCodeError | MalformedRecordError;

export type DeckReportError = DataAccessError | ExtractionError | TemplateIOError | OutputIOError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `: ${cause.message}` : '';

export const createDataAccessError = (message: string, cause?: unknown): DataAccessError => ({
  type: 'DataAccessError',
  message: `${message}${describeCause(cause)}`,
  cause,
});

export const createInvalidStateCodeError = (code: number): InvalidStateCodeError => ({
  type: 'InvalidStateCode',
  message: `Unknown card state code: ${String(code)}`,
  code,
});

export const createMalformedRecordError = (
  fieldCount: number,
  minimum: number
): MalformedRecordError => ({
  type: 'MalformedRecord',
  message: `Card note has ${String(fieldCount)} field(s), expected at least ${String(minimum)}`,
  fieldCount,
  minimum,
});

export const createTemplateIOError = (path: string, cause?: unknown): TemplateIOError => ({
  type: 'TemplateIOError',
  message: `Failed to read template at ${path}${describeCause(cause)}`,
  path,
  cause,
});

export const createOutputIOError = (path: string, cause?: unknown): OutputIOError => ({
  type: 'OutputIOError',
  message: `Failed to write report to ${path}${describeCause(cause)}`,
  path,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// Exit Code Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to process exit codes.
 */
export const DECK_REPORT_ERROR_EXIT_CODE: Record<DeckReportError['type'], number> = {
  DataAccessError: 3,
  InvalidStateCode: 4,
  MalformedRecord: 4,
  TemplateIOError: 5,
  OutputIOError: 6,
};

export const getExitCodeForError = (error: DeckReportError): number => {
  return DECK_REPORT_ERROR_EXIT_CODE[error.type];
};
