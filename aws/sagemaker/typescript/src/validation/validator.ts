/**
 * Input validation for the training action.
 *
 * Every rule runs on every call and appends to the same error and warning
 * lists; nothing short-circuits. Warnings never affect validity. Values are
 * read trimmed, and JSON fields that pass the structural checks are also
 * checked against the request builder's schemas, so a valid input set always
 * builds.
 *
 * @module validation/validator
 */

import type { InputName, InputSet } from '../types/inputs.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { getInput } from '../config/inputs.js';
import { isTrainingInstanceType } from '../types/job.js';
import {
  inputDataConfigSchema,
  outputDataConfigSchema,
  vpcConfigSchema,
  schemaIssues,
} from '../builders/schemas.js';
import {
  REQUIRED_INPUTS,
  JOB_NAME_PATTERN,
  ROLE_ARN_PATTERN,
  INSTANCE_TYPE_PATTERN,
  S3_URI_PREFIX,
  NUMERIC_RANGES,
  JSON_INPUTS,
  JSON_OBJECT_INPUTS,
  BOOLEAN_INPUTS,
  COMMON_REGIONS,
  type NumericRange,
} from './rules.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

type ParsedJson = { ok: true; value: unknown } | { ok: false; reason: string };

function parseJson(raw: string): ParsedJson {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class InputValidator {
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger.child({ component: 'validator' });
  }

  validate(inputs: InputSet): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const present = (name: InputName): string | undefined => getInput(inputs, name);

    this.logger.info('Starting input validation');

    for (const field of REQUIRED_INPUTS) {
      if (!present(field)) {
        errors.push(`Required field '${field}' is missing or empty`);
      }
    }

    const jobName = present('job-name');
    if (jobName !== undefined) {
      errors.push(...validateJobName(jobName));
    }

    const roleArn = present('role-arn');
    if (roleArn !== undefined && !ROLE_ARN_PATTERN.test(roleArn)) {
      errors.push('Role ARN format is invalid. Expected format: arn:aws:iam::account:role/role-name');
    }

    const instanceType = present('instance-type');
    if (instanceType !== undefined) {
      if (!INSTANCE_TYPE_PATTERN.test(instanceType)) {
        errors.push(`Instance type '${instanceType}' does not match expected SageMaker format`);
      } else if (!isTrainingInstanceType(instanceType)) {
        errors.push(`Instance type '${instanceType}' is not a SageMaker training instance type`);
      }
    }

    for (const [field, range] of NUMERIC_RANGES) {
      const value = present(field);
      if (value !== undefined) {
        errors.push(...validateInteger(field, value, range));
      }
    }

    const parsed = new Map<InputName, unknown>();
    for (const field of JSON_INPUTS) {
      const value = present(field);
      if (value === undefined) {
        continue;
      }
      const result = parseJson(value);
      if (result.ok) {
        parsed.set(field, result.value);
      } else {
        errors.push(`${field} contains invalid JSON: ${result.reason}`);
      }
    }

    const shapes = [
      ['input-data-config', validateInputDataConfig, inputDataConfigSchema],
      ['output-data-config', validateOutputDataConfig, outputDataConfigSchema],
      ['vpc-config', validateVpcConfig, vpcConfigSchema],
    ] as const;
    for (const [field, check, schema] of shapes) {
      if (!parsed.has(field)) {
        continue;
      }
      const value = parsed.get(field);
      const structural = check(value);
      errors.push(...(structural.length > 0 ? structural : schemaIssues(field, schema, value)));
    }
    for (const field of JSON_OBJECT_INPUTS) {
      if (parsed.has(field) && !isRecord(parsed.get(field))) {
        errors.push(`${field} must be a JSON object`);
      }
    }

    for (const field of BOOLEAN_INPUTS) {
      const value = present(field);
      if (value !== undefined && !['true', 'false'].includes(value.toLowerCase())) {
        errors.push(`${field} must be 'true' or 'false'`);
      }
    }

    const region = present('aws-region');
    if (region !== undefined && !COMMON_REGIONS.includes(region)) {
      warnings.push(
        `Region '${region}' is not in the list of common regions. Please verify it supports SageMaker.`
      );
    }

    const result: ValidationResult = { valid: errors.length === 0, errors, warnings };

    if (result.valid) {
      this.logger.info('Input validation passed', { warnings: warnings.length });
    } else {
      this.logger.error('Input validation failed', { errors: errors.length });
    }

    return result;
  }
}

export function validateJobName(jobName: string): string[] {
  const errors: string[] = [];

  if (!JOB_NAME_PATTERN.test(jobName)) {
    errors.push(
      'Job name must be 1-63 characters long and contain only alphanumeric characters and hyphens'
    );
  }
  if (jobName.startsWith('-') || jobName.endsWith('-')) {
    errors.push('Job name cannot start or end with a hyphen');
  }

  return errors;
}

function validateInteger(field: InputName, value: string, range: NumericRange): string[] {
  // Same acceptance as a plain integer parse: optional sign, digits, surrounding whitespace.
  if (!/^\s*[+-]?\d+\s*$/.test(value)) {
    return [`${field} must be a valid integer`];
  }
  const num = Number(value);
  if (num < range.min || num > range.max) {
    return [`${field} must be between ${range.min} and ${range.max}`];
  }
  return [];
}

function validateInputDataConfig(config: unknown): string[] {
  if (!Array.isArray(config)) {
    return ['input-data-config must be a JSON array'];
  }

  const errors: string[] = [];
  config.forEach((channel: unknown, i) => {
    if (!isRecord(channel)) {
      errors.push(`input-data-config[${i}] must be an object`);
      return;
    }

    for (const field of ['ChannelName', 'DataSource']) {
      if (!(field in channel)) {
        errors.push(`input-data-config[${i}] missing required field: ${field}`);
      }
    }

    const dataSource = channel.DataSource;
    if (dataSource === undefined) {
      return;
    }
    if (!isRecord(dataSource)) {
      errors.push(`input-data-config[${i}] DataSource must be an object`);
      return;
    }
    if ('S3DataSource' in dataSource) {
      const s3Source = dataSource.S3DataSource;
      if (!isRecord(s3Source) || !('S3Uri' in s3Source)) {
        errors.push(`input-data-config[${i}] S3DataSource missing S3Uri`);
      }
    }
  });

  return errors;
}

function validateOutputDataConfig(config: unknown): string[] {
  if (!isRecord(config)) {
    return ['output-data-config must be a JSON object'];
  }
  if (!('S3OutputPath' in config)) {
    return ['output-data-config missing required field: S3OutputPath'];
  }

  const path = config.S3OutputPath;
  if (typeof path !== 'string' || !path.startsWith(S3_URI_PREFIX)) {
    return [`S3OutputPath must be a valid S3 URI starting with ${S3_URI_PREFIX}`];
  }
  return [];
}

function validateVpcConfig(config: unknown): string[] {
  if (!isRecord(config)) {
    return ['vpc-config must be a JSON object'];
  }

  const errors: string[] = [];
  for (const field of ['SecurityGroupIds', 'Subnets']) {
    if (!(field in config)) {
      errors.push(`vpc-config missing required field: ${field}`);
    } else if (!Array.isArray(config[field])) {
      errors.push(`vpc-config.${field} must be an array`);
    }
  }
  return errors;
}
