/**
 * Tests for the CreateTrainingJob request builder
 */

import { describe, it, expect } from 'vitest';
import { buildTrainingJobRequest, stringifyValue, toTagList } from '../training-job.js';
import { InputValidator } from '../../validation/validator.js';
import { ValidationError } from '../../error/index.js';
import { validInputs } from '../../__mocks__/inputs.fixture.js';
import type { TrainingJobRequest } from '../../types/job.js';
import type { InputSet } from '../../types/inputs.js';

const CHANNEL_SHAPES: Array<{ label: string; channel: Record<string, unknown> }> = [
  {
    label: 'a model access agreement',
    channel: {
      ChannelName: 'model',
      DataSource: {
        S3DataSource: {
          S3DataType: 'S3Prefix',
          S3Uri: 's3://test-bucket/base-model/',
          ModelAccessConfig: { AcceptEula: true },
        },
      },
    },
  },
  {
    label: 'a hub content reference',
    channel: {
      ChannelName: 'model',
      DataSource: {
        S3DataSource: {
          S3Uri: 's3://test-bucket/base-model/',
          HubAccessConfig: { HubContentArn: 'arn:aws:sagemaker:us-east-1:123456789012:hub-content/test' },
        },
      },
    },
  },
  {
    label: 'a file system source',
    channel: {
      ChannelName: 'training',
      DataSource: {
        FileSystemDataSource: {
          FileSystemId: 'fs-0123',
          FileSystemAccessMode: 'ro',
          FileSystemType: 'EFS',
          DirectoryPath: '/data/train',
        },
      },
    },
  },
  {
    label: 'channel options',
    channel: {
      ChannelName: 'training',
      DataSource: { S3DataSource: { S3Uri: 's3://test-bucket/train/', S3DataDistributionType: 'ShardedByS3Key' } },
      ContentType: 'text/csv',
      CompressionType: 'Gzip',
      RecordWrapperType: 'RecordIO',
      InputMode: 'Pipe',
      ShuffleConfig: { Seed: 7 },
    },
  },
];

describe('buildTrainingJobRequest', () => {
  it('should apply defaults for optional fields', () => {
    const request = buildTrainingJobRequest(validInputs());

    expect(request).toEqual({
      TrainingJobName: 'test-job-123',
      RoleArn: 'arn:aws:iam::123456789012:role/SageMakerExecutionRole',
      AlgorithmSpecification: {
        TrainingImage: '123456789012.dkr.ecr.us-east-1.amazonaws.com/test-algorithm:latest',
        TrainingInputMode: 'File',
      },
      InputDataConfig: [
        {
          ChannelName: 'training',
          DataSource: {
            S3DataSource: {
              S3DataType: 'S3Prefix',
              S3Uri: 's3://test-bucket/training-data/',
            },
          },
        },
      ],
      OutputDataConfig: { S3OutputPath: 's3://test-bucket/output/' },
      ResourceConfig: {
        InstanceType: 'ml.m5.large',
        InstanceCount: 1,
        VolumeSizeInGB: 30,
      },
      StoppingCondition: { MaxRuntimeInSeconds: 86400 },
    });
  });

  it('should use supplied resource settings', () => {
    const request = buildTrainingJobRequest(
      validInputs({
        'instance-type': 'ml.p3.2xlarge',
        'instance-count': '4',
        'volume-size': '100',
        'max-runtime': '7200',
      })
    );

    expect(request.ResourceConfig).toEqual({
      InstanceType: 'ml.p3.2xlarge',
      InstanceCount: 4,
      VolumeSizeInGB: 100,
    });
    expect(request.StoppingCondition).toEqual({ MaxRuntimeInSeconds: 7200 });
  });

  it('should default the S3 data type of a channel', () => {
    const channels = [{ ChannelName: 'train', DataSource: { S3DataSource: { S3Uri: 's3://test-bucket/train/' } } }];
    const request = buildTrainingJobRequest(validInputs({ 'input-data-config': JSON.stringify(channels) }));

    expect(request.InputDataConfig?.[0]?.DataSource?.S3DataSource).toEqual({
      S3DataType: 'S3Prefix',
      S3Uri: 's3://test-bucket/train/',
    });
  });

  it('should stringify hyperparameter and environment values', () => {
    const request = buildTrainingJobRequest(
      validInputs({
        hyperparameters: JSON.stringify({ epochs: 10, learning_rate: 0.001, optimizer: 'adam', use_gpu: true }),
        environment: JSON.stringify({ LOG_LEVEL: 'debug', WORKERS: 2 }),
      })
    );

    expect(request.HyperParameters).toEqual({
      epochs: '10',
      learning_rate: '0.001',
      optimizer: 'adam',
      use_gpu: 'true',
    });
    expect(request.Environment).toEqual({ LOG_LEVEL: 'debug', WORKERS: '2' });
  });

  it('should convert tags to a key/value list in order', () => {
    const request = buildTrainingJobRequest(validInputs({ tags: JSON.stringify({ team: 'ml', cost: 42 }) }));

    expect(request.Tags).toEqual([
      { Key: 'team', Value: 'ml' },
      { Key: 'cost', Value: '42' },
    ]);
  });

  it('should attach the network config', () => {
    const vpc = { SecurityGroupIds: ['sg-123'], Subnets: ['subnet-a'] };
    const request = buildTrainingJobRequest(validInputs({ 'vpc-config': JSON.stringify(vpc) }));

    expect(request.VpcConfig).toEqual(vpc);
  });

  it('should leave out optional maps that are empty', () => {
    const request = buildTrainingJobRequest(validInputs({ hyperparameters: '{}', environment: '', tags: '{}' }));

    expect(request).not.toHaveProperty('HyperParameters');
    expect(request).not.toHaveProperty('Environment');
    expect(request).not.toHaveProperty('Tags');
    expect(request).not.toHaveProperty('VpcConfig');
  });

  it('should raise ValidationError for keys the API shape does not have', () => {
    const channels = [{ ChannelName: 'train', DataSource: {}, Shuffle: true }];

    expect(() => buildTrainingJobRequest(validInputs({ 'input-data-config': JSON.stringify(channels) }))).toThrow(
      ValidationError
    );
  });

  it('should raise ValidationError when a required field is absent', () => {
    const inputs: InputSet = { ...validInputs(), 'role-arn': undefined };

    expect(() => buildTrainingJobRequest(inputs)).toThrow("Required field 'role-arn' is missing or empty");
  });

  it.each(CHANNEL_SHAPES)('should build a validated channel with $label', ({ channel }) => {
    const inputs = validInputs({ 'input-data-config': JSON.stringify([channel]) });

    expect(new InputValidator().validate(inputs).errors).toEqual([]);
    expect(buildTrainingJobRequest(inputs).InputDataConfig?.[0]).toMatchObject(channel);
  });

  it('should reject unknown channel keys in both validator and builder', () => {
    const channels = [
      { ChannelName: 'train', DataSource: { S3DataSource: { S3Uri: 's3://test-bucket/train/', Bogus: 1 } } },
    ];
    const inputs = validInputs({ 'input-data-config': JSON.stringify(channels) });
    const message = "input-data-config[0].DataSource.S3DataSource: Unrecognized key(s) in object: 'Bogus'";

    expect(new InputValidator().validate(inputs).errors).toEqual([message]);
    expect(() => buildTrainingJobRequest(inputs)).toThrow(`Input validation failed: ${message}`);
  });

  it('should reject unknown network config keys in both validator and builder', () => {
    const vpc = { SecurityGroupIds: ['sg-1'], Subnets: ['subnet-1'], Bogus: 1 };
    const inputs = validInputs({ 'vpc-config': JSON.stringify(vpc) });
    const message = "vpc-config: Unrecognized key(s) in object: 'Bogus'";

    expect(new InputValidator().validate(inputs).errors).toEqual([message]);
    expect(() => buildTrainingJobRequest(inputs)).toThrow(`Input validation failed: ${message}`);
  });

  it('should reject an instance type the API does not offer for training', () => {
    const inputs = validInputs({ 'instance-type': 'ml.z9.large' });
    const message = "Instance type 'ml.z9.large' is not a SageMaker training instance type";

    expect(new InputValidator().validate(inputs).errors).toEqual([message]);
    expect(() => buildTrainingJobRequest(inputs)).toThrow(message);
  });

  it('should agree with the validator on blank required fields', () => {
    const inputs = validInputs({ 'algorithm-specification': '   ' });
    const message = "Required field 'algorithm-specification' is missing or empty";

    expect(new InputValidator().validate(inputs).errors).toEqual([message]);
    expect(() => buildTrainingJobRequest(inputs)).toThrow(message);
  });

  it('should never introduce new validation errors', () => {
    const inputs = validInputs({
      'instance-type': 'ml.g5.xlarge',
      'instance-count': '2',
      'volume-size': '50',
      'max-runtime': '3600',
      hyperparameters: JSON.stringify({ epochs: 3 }),
      environment: JSON.stringify({ MODE: 'train' }),
      tags: JSON.stringify({ project: 'churn' }),
      'vpc-config': JSON.stringify({ SecurityGroupIds: ['sg-1'], Subnets: ['subnet-1'] }),
    });
    const validator = new InputValidator();
    expect(validator.validate(inputs).errors).toEqual([]);

    const request = buildTrainingJobRequest(inputs);

    expect(validator.validate(flatten(request)).errors).toEqual([]);
    expect(buildTrainingJobRequest(flatten(request))).toEqual(request);
  });
});

describe('stringifyValue', () => {
  it('should keep strings and JSON-encode everything else', () => {
    expect(stringifyValue('abc')).toBe('abc');
    expect(stringifyValue(1.5)).toBe('1.5');
    expect(stringifyValue(false)).toBe('false');
    expect(stringifyValue(null)).toBe('null');
    expect(stringifyValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });
});

describe('toTagList', () => {
  it('should map entries to Key/Value pairs', () => {
    expect(toTagList({ a: '1' })).toEqual([{ Key: 'a', Value: '1' }]);
  });
});

/**
 * Turns a request back into the equivalent action inputs.
 */
function flatten(request: TrainingJobRequest): InputSet {
  const tags = Object.fromEntries((request.Tags ?? []).map((tag) => [tag.Key ?? '', tag.Value ?? '']));
  return {
    'job-name': request.TrainingJobName,
    'role-arn': request.RoleArn,
    'algorithm-specification': request.AlgorithmSpecification?.TrainingImage,
    'instance-type': request.ResourceConfig?.InstanceType,
    'instance-count': String(request.ResourceConfig?.InstanceCount),
    'volume-size': String(request.ResourceConfig?.VolumeSizeInGB),
    'max-runtime': String(request.StoppingCondition?.MaxRuntimeInSeconds),
    'input-data-config': JSON.stringify(request.InputDataConfig),
    'output-data-config': JSON.stringify(request.OutputDataConfig),
    hyperparameters: JSON.stringify(request.HyperParameters ?? {}),
    environment: JSON.stringify(request.Environment ?? {}),
    tags: JSON.stringify(tags),
    'vpc-config': request.VpcConfig ? JSON.stringify(request.VpcConfig) : undefined,
  };
}
