/**
 * Error taxonomy for the prediction pipeline. Every error carries a machine
 * readable `code` and the HTTP status the API maps it to.
 */

export type DashboardErrorCode =
  | 'insufficient_data'
  | 'invalid_price'
  | 'no_data'
  | 'config_invalid'
  | 'run_in_progress';

export class DashboardError extends Error {
  readonly code: DashboardErrorCode;
  readonly status: number;

  constructor(code: DashboardErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Series is shorter than the trend lookback window. */
export class InsufficientDataError extends DashboardError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number) {
    super('insufficient_data', 422, `need at least ${required} sessions, got ${actual}`);
    this.required = required;
    this.actual = actual;
  }
}

export class InvalidPriceError extends DashboardError {
  readonly price: number;

  constructor(price: number, what = 'current price') {
    super('invalid_price', 422, `${what} must be a positive finite number, got ${price}`);
    this.price = price;
  }
}

/** Provider returned an empty series (or every provider failed). */
export class NoDataError extends DashboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('no_data', 502, message, options);
  }
}

export class ConfigError extends DashboardError {
  constructor(message: string) {
    super('config_invalid', 500, message);
  }
}

export class RunInProgressError extends DashboardError {
  constructor() {
    super('run_in_progress', 409, 'a dashboard run is already in progress');
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
