import type { InputSet } from '../types/inputs.js';

export const TRAINING_CHANNELS = [
  {
    ChannelName: 'training',
    DataSource: {
      S3DataSource: {
        S3DataType: 'S3Prefix',
        S3Uri: 's3://test-bucket/training-data/',
      },
    },
  },
];

/**
 * Minimal input set that passes validation.
 */
export function validInputs(overrides: Partial<Record<keyof InputSet, string>> = {}): InputSet {
  return {
    'job-name': 'test-job-123',
    'algorithm-specification': '123456789012.dkr.ecr.us-east-1.amazonaws.com/test-algorithm:latest',
    'role-arn': 'arn:aws:iam::123456789012:role/SageMakerExecutionRole',
    'input-data-config': JSON.stringify(TRAINING_CHANNELS),
    'output-data-config': JSON.stringify({ S3OutputPath: 's3://test-bucket/output/' }),
    ...overrides,
  };
}

/**
 * Same inputs as runner environment variables.
 */
export function inputEnv(inputs: InputSet): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(inputs)) {
    if (value !== undefined) {
      env[`INPUT_${name.toUpperCase().replace(/-/g, '_')}`] = value;
    }
  }
  return env;
}
