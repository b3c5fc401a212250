/**
 * Error types and AWS error mapping for the training action.
 */

export { TrainingActionError, isTrainingActionError } from './error.js';
export type { TrainingErrorKind, TrainingActionErrorOptions } from './error.js';

export {
  ValidationError,
  AuthError,
  SubmissionError,
  DescribeError,
  TimeoutError,
  UnknownError,
} from './categories.js';
export type { ServiceErrorOptions } from './categories.js';

export { mapAwsError, describeAwsError, serviceErrorOptions } from './mapper.js';
export type { AwsErrorInfo } from './mapper.js';
