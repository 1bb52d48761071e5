/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and are surfaced verbatim by the report CLI.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_INVALID'
  | 'INGEST_ERROR'
  | 'MISSING_COLUMN'
  | 'DIVISION_UNDEFINED';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for diagnostics (e.g. missing column names, batch code) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

/** A required source column is absent; aborts the analysis run. */
export class MissingColumnError extends AppError {
  public readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      'MISSING_COLUMN',
      `Missing columns in file: ${missingColumns.join(', ')}`,
      { missingColumns },
    );
    this.name = 'MissingColumnError';
    this.missingColumns = missingColumns;
  }
}

/** Total adjusted quantity of a batch is zero; the weighted average is undefined. */
export class DivisionUndefinedError extends AppError {
  public readonly batchCode: string;

  constructor(batchCode: string) {
    super(
      'DIVISION_UNDEFINED',
      `Batch ${batchCode} has zero total adjusted quantity`,
      { batchCode },
    );
    this.name = 'DivisionUndefinedError';
    this.batchCode = batchCode;
  }
}
