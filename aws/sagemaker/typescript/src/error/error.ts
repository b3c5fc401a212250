/**
 * Closed set of failure kinds surfaced by the action.
 */
export type TrainingErrorKind =
  | 'validation'
  | 'auth'
  | 'submission'
  | 'describe'
  | 'timeout'
  | 'unknown';

export interface TrainingActionErrorOptions {
  kind: TrainingErrorKind;
  code: string;
  message: string;
  httpStatusCode?: number;
  requestId?: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all training action errors.
 * Carries the error kind, an error code (the AWS error name where one exists),
 * and the request metadata reported by the service.
 */
export class TrainingActionError extends Error {
  /**
   * Failure kind, used by the orchestrator for reporting
   */
  public readonly kind: TrainingErrorKind;

  /**
   * Error code (e.g., 'ValidationException', 'ResourceLimitExceeded')
   */
  public readonly code: string;

  /**
   * HTTP status code returned by the service, if any
   */
  public readonly httpStatusCode?: number;

  public readonly requestId?: string;

  public readonly details?: Record<string, unknown>;

  constructor(options: TrainingActionErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TrainingActionError';
    this.kind = options.kind;
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.requestId = options.requestId;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.httpStatusCode) {
      result += ` (HTTP ${this.httpStatusCode})`;
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      httpStatusCode: this.httpStatusCode,
      requestId: this.requestId,
      details: this.details,
    };
  }
}

export function isTrainingActionError(error: unknown): error is TrainingActionError {
  return error instanceof TrainingActionError;
}
