/**
 * Builds the CreateTrainingJob request from validated inputs.
 * @module builders/training-job
 */

import type { Tag, TrainingInstanceType } from '@aws-sdk/client-sagemaker';
import type { ZodType, ZodTypeDef } from 'zod';
import type { InputName, InputSet } from '../types/inputs.js';
import { isTrainingInstanceType, type TrainingJobRequest } from '../types/job.js';
import { ValidationError } from '../error/index.js';
import { getInput } from '../config/inputs.js';
import {
  DEFAULT_INSTANCE_TYPE,
  DEFAULT_INSTANCE_COUNT,
  DEFAULT_VOLUME_SIZE_GB,
  DEFAULT_MAX_RUNTIME_SECONDS,
  DEFAULT_TRAINING_INPUT_MODE,
} from '../config/defaults.js';
import {
  inputDataConfigSchema,
  outputDataConfigSchema,
  vpcConfigSchema,
  keyValueSchema,
  formatIssues,
} from './schemas.js';

/**
 * Builds a {@link TrainingJobRequest}. Expects inputs that already passed
 * {@link InputValidator}; a JSON field that still does not fit the API shape
 * raises {@link ValidationError}.
 *
 * @example
 * ```typescript
 * const request = buildTrainingJobRequest({
 *   'job-name': 'churn-model-42',
 *   'role-arn': 'arn:aws:iam::123456789012:role/SageMakerRole',
 *   'algorithm-specification': '123456789012.dkr.ecr.us-east-1.amazonaws.com/churn:latest',
 *   'input-data-config': '[{"ChannelName":"training","DataSource":{"S3DataSource":{"S3Uri":"s3://bucket/train/"}}}]',
 *   'output-data-config': '{"S3OutputPath":"s3://bucket/output/"}',
 * });
 * ```
 */
export function buildTrainingJobRequest(inputs: InputSet): TrainingJobRequest {
  const request: TrainingJobRequest = {
    TrainingJobName: requireInput(inputs, 'job-name'),
    RoleArn: requireInput(inputs, 'role-arn'),
    AlgorithmSpecification: {
      TrainingImage: requireInput(inputs, 'algorithm-specification'),
      TrainingInputMode: DEFAULT_TRAINING_INPUT_MODE,
    },
    InputDataConfig: parseField(inputs, 'input-data-config', inputDataConfigSchema),
    OutputDataConfig: parseField(inputs, 'output-data-config', outputDataConfigSchema),
    ResourceConfig: {
      InstanceType: instanceTypeInput(inputs),
      InstanceCount: intInput(inputs, 'instance-count', DEFAULT_INSTANCE_COUNT),
      VolumeSizeInGB: intInput(inputs, 'volume-size', DEFAULT_VOLUME_SIZE_GB),
    },
    StoppingCondition: {
      MaxRuntimeInSeconds: intInput(inputs, 'max-runtime', DEFAULT_MAX_RUNTIME_SECONDS),
    },
  };

  const hyperParameters = optionalStringMap(inputs, 'hyperparameters');
  if (hyperParameters) {
    request.HyperParameters = hyperParameters;
  }

  const environment = optionalStringMap(inputs, 'environment');
  if (environment) {
    request.Environment = environment;
  }

  if (getInput(inputs, 'vpc-config')) {
    request.VpcConfig = parseField(inputs, 'vpc-config', vpcConfigSchema);
  }

  const tags = optionalStringMap(inputs, 'tags');
  if (tags) {
    request.Tags = toTagList(tags);
  }

  return request;
}

/**
 * Renders a value the way the API expects in a string-valued map.
 * Strings are kept as they are; anything else is JSON-encoded.
 */
export function stringifyValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function toTagList(tags: Record<string, string>): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

function requireInput(inputs: InputSet, name: InputName): string {
  const value = getInput(inputs, name);
  if (value === undefined) {
    throw new ValidationError([`Required field '${name}' is missing or empty`]);
  }
  return value;
}

function instanceTypeInput(inputs: InputSet): TrainingInstanceType {
  const value = getInput(inputs, 'instance-type');
  if (value === undefined) {
    return DEFAULT_INSTANCE_TYPE;
  }
  if (!isTrainingInstanceType(value)) {
    throw new ValidationError([`Instance type '${value}' is not a SageMaker training instance type`]);
  }
  return value;
}

function intInput(inputs: InputSet, name: InputName, fallback: number): number {
  const value = getInput(inputs, name);
  return value === undefined ? fallback : Number.parseInt(value, 10);
}

function parseField<T>(inputs: InputSet, name: InputName, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const raw = requireInput(inputs, name);

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError([`${name} contains invalid JSON: ${reason}`], error);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ValidationError(formatIssues(name, result.error), result.error);
  }
  return result.data;
}

/**
 * Parses a key/value input; absent, blank or empty maps yield `undefined`.
 */
function optionalStringMap(inputs: InputSet, name: InputName): Record<string, string> | undefined {
  if (!getInput(inputs, name)) {
    return undefined;
  }

  const map = parseField(inputs, name, keyValueSchema);
  const entries = Object.entries(map);
  if (entries.length === 0) {
    return undefined;
  }
  return Object.fromEntries(entries.map(([key, value]) => [key, stringifyValue(value)]));
}
