/**
 * Errors thrown by the replay core.
 *
 * Only opening a file can fail. Everything that goes wrong inside a row
 * (short rows, values that are not numbers) is kept as data.
 */

export type ReplayErrorCode = 'OPEN_FAILED' | 'NO_HEADER' | 'CLOSED';

export class ReplayError extends Error {
  readonly code: ReplayErrorCode;
  readonly filePath: string;

  constructor(message: string, code: ReplayErrorCode, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReplayError';
    this.code = code;
    this.filePath = filePath;
  }
}

/** The file could not be opened for reading */
export class ReplayOpenError extends ReplayError {
  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to open CSV file: ${filePath}${reason}`, 'OPEN_FAILED', filePath, { cause });
    this.name = 'ReplayOpenError';
  }
}

/** The file holds nothing but comments and blank lines */
export class ReplayHeaderError extends ReplayError {
  constructor(filePath: string) {
    super(`CSV file is empty or has no header line: ${filePath}`, 'NO_HEADER', filePath);
    this.name = 'ReplayHeaderError';
  }
}

export class ReplayClosedError extends ReplayError {
  constructor(filePath: string) {
    super(`Replay for ${filePath} has been closed`, 'CLOSED', filePath);
    this.name = 'ReplayClosedError';
  }
}
