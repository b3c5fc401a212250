/**
 * Default configuration values for the training action.
 * @module config/defaults
 */

import { TrainingInstanceType } from '@aws-sdk/client-sagemaker';

/**
 * Default AWS region when `aws-region` is not supplied.
 */
export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_INSTANCE_TYPE: TrainingInstanceType = TrainingInstanceType.ML_M5_LARGE;

export const DEFAULT_INSTANCE_COUNT = 1;

/** Training volume size in GB. */
export const DEFAULT_VOLUME_SIZE_GB = 30;

/** Stopping condition, one day. */
export const DEFAULT_MAX_RUNTIME_SECONDS = 86400;

/** Seconds between DescribeTrainingJob calls while waiting. */
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;

/** Upper bound on the time spent waiting for a terminal state. */
export const DEFAULT_MAX_WAIT_SECONDS = 86400;

export const DEFAULT_TRAINING_INPUT_MODE = 'File';

/**
 * CloudWatch log group SageMaker writes training job logs to.
 * Streams are named `<job-name>/algo-<n>-<epoch>`.
 */
export const TRAINING_LOG_GROUP = '/aws/sagemaker/TrainingJobs';

export const DEFAULT_LOG_EVENT_LIMIT = 100;

export const DEFAULT_LIST_MAX_RESULTS = 10;

/** Role session name prefix used when assuming `role-to-assume`. */
export const ROLE_SESSION_NAME_PREFIX = 'SageMakerTrainingAction';
