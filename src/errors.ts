/**
 * Run-level failures. Row-level problems are reported as values
 * (`RowError`, SyncError cells) and never thrown.
 */

export type EngineErrorCode = "E_INVALID_FORMAT" | "E_NO_ROWS" | "E_PERSISTENCE" | "E_SESSION_NOT_FOUND";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The source header lacks a required column; nothing was classified. */
export class InvalidFormatError extends EngineError {
  readonly missingColumn: string;

  constructor(missingColumn: string) {
    super("E_INVALID_FORMAT", `Cannot find the '${missingColumn}' column in the file.`);
    this.missingColumn = missingColumn;
  }
}

export class NoImportableRowsError extends EngineError {
  constructor() {
    super("E_NO_ROWS", "No valid row (with a barcode) found to import.");
  }
}

/** A store call failed mid-run; the surrounding transaction was rolled back. */
export class PersistenceError extends EngineError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("E_PERSISTENCE", `Error while ${operation}: ${detail}`, { cause });
  }
}

export class SessionNotFoundError extends EngineError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("E_SESSION_NOT_FOUND", `Inventory session '${sessionId}' does not exist.`);
    this.sessionId = sessionId;
  }
}
