/**
 * Error Handling Utilities
 *
 * Error types raised by the period engine and helpers for turning unknown
 * thrown values into log-friendly messages.
 */

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for all errors raised by the period engine
 */
export class PeriodEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Criteria that cannot be evaluated (non-finite numbers, unknown level filter,
 * a minimum period length that does not fit into the day).
 */
export class ConfigurationError extends PeriodEngineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.field = field;
  }
}

/**
 * Price input that violates the interval series contract
 * (non-contiguous, unordered, mixed durations, non-finite prices).
 */
export class InputError extends PeriodEngineError {}
