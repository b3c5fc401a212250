import { TrainingActionError } from './error.js';

/**
 * Service metadata attached to errors raised from an AWS call.
 */
export interface ServiceErrorOptions {
  code?: string;
  httpStatusCode?: number;
  requestId?: string;
  cause?: unknown;
}

/**
 * One or more input rules failed. All violations are reported together.
 */
export class ValidationError extends TrainingActionError {
  public readonly errors: readonly string[];

  constructor(errors: readonly string[], cause?: unknown) {
    super({
      kind: 'validation',
      code: 'ValidationError',
      message: `Input validation failed: ${errors.join('; ')}`,
      cause,
      details: { errors: [...errors] },
    });
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Credentials could not be resolved or were rejected by STS
 */
export class AuthError extends TrainingActionError {
  constructor(message: string, options: ServiceErrorOptions = {}) {
    super({
      kind: 'auth',
      code: options.code ?? 'AuthError',
      message,
      httpStatusCode: options.httpStatusCode,
      requestId: options.requestId,
      cause: options.cause,
    });
    this.name = 'AuthError';
  }
}

/**
 * SageMaker rejected the CreateTrainingJob request, or it never arrived.
 */
export class SubmissionError extends TrainingActionError {
  public readonly jobName: string;

  constructor(
    jobName: string,
    message: string,
    options: ServiceErrorOptions = {}
  ) {
    super({
      kind: 'submission',
      code: options.code ?? 'SubmissionError',
      message: `Failed to create training job ${jobName}: ${message}`,
      httpStatusCode: options.httpStatusCode,
      requestId: options.requestId,
      cause: options.cause,
      details: { jobName },
    });
    this.name = 'SubmissionError';
    this.jobName = jobName;
  }
}

/**
 * A describe or list call failed, or the job is unknown
 */
export class DescribeError extends TrainingActionError {
  public readonly jobName?: string;

  constructor(
    jobName: string | undefined,
    message: string,
    options: ServiceErrorOptions = {}
  ) {
    super({
      kind: 'describe',
      code: options.code ?? 'DescribeError',
      message: jobName ? `Failed to describe training job ${jobName}: ${message}` : message,
      httpStatusCode: options.httpStatusCode,
      requestId: options.requestId,
      cause: options.cause,
      details: jobName ? { jobName } : undefined,
    });
    this.name = 'DescribeError';
    this.jobName = jobName;
  }
}

/**
 * The job did not reach a terminal state within the wait bound
 */
export class TimeoutError extends TrainingActionError {
  public readonly jobName: string;
  public readonly maxWaitSeconds: number;

  constructor(jobName: string, maxWaitSeconds: number) {
    super({
      kind: 'timeout',
      code: 'WaitTimeout',
      message: `Training job ${jobName} did not complete within ${maxWaitSeconds} seconds`,
      details: { jobName, maxWaitSeconds },
    });
    this.name = 'TimeoutError';
    this.jobName = jobName;
    this.maxWaitSeconds = maxWaitSeconds;
  }
}

/**
 * Any other failure
 */
export class UnknownError extends TrainingActionError {
  constructor(message: string, options: ServiceErrorOptions = {}) {
    super({
      kind: 'unknown',
      code: options.code ?? 'UnknownError',
      message,
      httpStatusCode: options.httpStatusCode,
      requestId: options.requestId,
      cause: options.cause,
    });
    this.name = 'UnknownError';
  }
}
