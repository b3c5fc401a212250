/**
 * Field rules applied by the input validator.
 * @module validation/rules
 */

import type { InputName } from '../types/inputs.js';

export const REQUIRED_INPUTS: readonly InputName[] = [
  'job-name',
  'algorithm-specification',
  'role-arn',
  'input-data-config',
  'output-data-config',
];

export const JOB_NAME_PATTERN = /^[a-zA-Z0-9-]{1,63}$/;

/** Standard, China and GovCloud partitions. */
export const ROLE_ARN_PATTERN = /^arn:aws(-[^:]*)?:iam::[0-9]{12}:role\/.+$/;

export const INSTANCE_TYPE_PATTERN =
  /^ml\.[a-z0-9]+\.(nano|micro|small|medium|large|xlarge|[0-9]+xlarge)$/;

export const S3_URI_PREFIX = 's3://';

export interface NumericRange {
  min: number;
  max: number;
}

export const NUMERIC_RANGES: ReadonlyArray<readonly [InputName, NumericRange]> = [
  ['instance-count', { min: 1, max: 100 }],
  ['volume-size', { min: 1, max: 16384 }],
  // five days
  ['max-runtime', { min: 1, max: 432000 }],
  ['check-interval', { min: 10, max: 3600 }],
  ['max-wait-time', { min: 10, max: 432000 }],
];

export const JSON_INPUTS: readonly InputName[] = [
  'input-data-config',
  'output-data-config',
  'hyperparameters',
  'environment',
  'vpc-config',
  'tags',
];

/** JSON inputs mapped as flat key/value maps by the request builder. */
export const JSON_OBJECT_INPUTS: readonly InputName[] = ['hyperparameters', 'environment', 'tags'];

export const BOOLEAN_INPUTS: readonly InputName[] = ['wait-for-completion', 'stop-on-timeout'];

/**
 * Regions known to offer SageMaker training. Not exhaustive: anything else
 * only produces a warning.
 */
export const COMMON_REGIONS: readonly string[] = [
  'us-east-1',
  'us-east-2',
  'us-west-1',
  'us-west-2',
  'eu-west-1',
  'eu-west-2',
  'eu-west-3',
  'eu-central-1',
  'ap-south-1',
  'ap-southeast-1',
  'ap-southeast-2',
  'ap-northeast-1',
  'ap-northeast-2',
  'sa-east-1',
  'ca-central-1',
];
