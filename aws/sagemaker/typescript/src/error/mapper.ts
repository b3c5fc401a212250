/**
 * Helpers for turning AWS SDK exceptions into training action errors.
 */

import { isTrainingActionError, type TrainingActionError } from './error.js';
import { UnknownError, type ServiceErrorOptions } from './categories.js';

/**
 * Fields read from an AWS SDK v3 service exception
 */
export interface AwsErrorInfo {
  code: string;
  message: string;
  httpStatusCode?: number;
  requestId?: string;
}

interface AwsSdkError extends Error {
  code?: string;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
}

function isAwsSdkError(error: unknown): error is AwsSdkError {
  return error instanceof Error;
}

/**
 * Extracts code, message, and request metadata from any thrown value.
 */
export function describeAwsError(error: unknown): AwsErrorInfo {
  if (!isAwsSdkError(error)) {
    return { code: 'UnknownError', message: String(error) };
  }

  return {
    code: error.code || error.name || 'UnknownError',
    message: error.message,
    httpStatusCode: error.$metadata?.httpStatusCode,
    requestId: error.$metadata?.requestId,
  };
}

/**
 * Options for a typed error built from an AWS SDK exception.
 */
export function serviceErrorOptions(error: unknown): ServiceErrorOptions {
  const info = describeAwsError(error);
  return {
    code: info.code,
    httpStatusCode: info.httpStatusCode,
    requestId: info.requestId,
    cause: error,
  };
}

/**
 * Returns the error unchanged when it is already a {@link TrainingActionError},
 * otherwise wraps it in an {@link UnknownError}.
 */
export function mapAwsError(error: unknown): TrainingActionError {
  if (isTrainingActionError(error)) {
    return error;
  }

  return new UnknownError(describeAwsError(error).message, serviceErrorOptions(error));
}
