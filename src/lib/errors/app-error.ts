/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose sensitive data.
 */

export type AppErrorCode =
  | 'NETWORK_ERROR'
  | 'REMOTE_ERROR'
  | 'STORAGE_ERROR'
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 * The safeMessage should not expose sensitive data (keys, user ids, etc.).
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. status: 503, attempt: 2) */
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
      this.details = Object.fromEntries(Object.entries(causeOrDetails));
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /** Transient failures worth another attempt. */
  get isRetryable(): boolean {
    return this.code === 'NETWORK_ERROR';
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

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Wrap anything thrown into an AppError, keeping AppErrors as they are.
 */
export function toAppError(
  error: unknown,
  fallbackCode: AppErrorCode,
  fallbackMessage: string,
): AppError {
  if (error instanceof AppError) return error;
  return new AppError(fallbackCode, fallbackMessage, error);
}
