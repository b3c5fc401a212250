import { describe, it, expect } from 'vitest';
import { describeAwsError, serviceErrorOptions, mapAwsError } from '../mapper.js';
import { SubmissionError, TimeoutError, UnknownError, ValidationError } from '../categories.js';
import { isTrainingActionError } from '../error.js';
import { awsError } from '../../__mocks__/aws-apis.mock.js';

describe('describeAwsError', () => {
  it('should read the exception name and request metadata', () => {
    const error = awsError('ResourceLimitExceeded', 'Quota exceeded for ml.p3.2xlarge', 429);

    expect(describeAwsError(error)).toEqual({
      code: 'ResourceLimitExceeded',
      message: 'Quota exceeded for ml.p3.2xlarge',
      httpStatusCode: 429,
      requestId: 'req-test-1',
    });
  });

  it('should prefer an explicit code over the name', () => {
    const error = Object.assign(new Error('expired'), { code: 'ExpiredToken' });

    expect(describeAwsError(error).code).toBe('ExpiredToken');
  });

  it('should describe non-error values', () => {
    expect(describeAwsError('socket hang up')).toEqual({ code: 'UnknownError', message: 'socket hang up' });
  });
});

describe('serviceErrorOptions', () => {
  it('should keep the thrown error as cause', () => {
    const error = awsError('ThrottlingException', 'Rate exceeded');

    expect(serviceErrorOptions(error)).toEqual({
      code: 'ThrottlingException',
      httpStatusCode: 400,
      requestId: 'req-test-1',
      cause: error,
    });
  });
});

describe('mapAwsError', () => {
  it('should pass training action errors through', () => {
    const error = new TimeoutError('test-job-123', 600);

    expect(mapAwsError(error)).toBe(error);
  });

  it('should wrap anything else as unknown', () => {
    const mapped = mapAwsError(new TypeError('fetch failed'));

    expect(mapped).toBeInstanceOf(UnknownError);
    expect(mapped.kind).toBe('unknown');
    expect(mapped.code).toBe('TypeError');
    expect(mapped.message).toBe('fetch failed');
  });
});

describe('error categories', () => {
  it('should render code and status in toString', () => {
    const error = new SubmissionError('test-job-123', 'Quota exceeded', {
      code: 'ResourceLimitExceeded',
      httpStatusCode: 400,
    });

    expect(error.toString()).toBe(
      '[ResourceLimitExceeded] Failed to create training job test-job-123: Quota exceeded (HTTP 400)'
    );
    expect(isTrainingActionError(error)).toBe(true);
  });

  it('should list every violation of a validation error', () => {
    const error = new ValidationError(['first problem', 'second problem']);

    expect(error.message).toBe('Input validation failed: first problem; second problem');
    expect(error.toJSON()).toEqual({
      name: 'ValidationError',
      kind: 'validation',
      code: 'ValidationError',
      message: 'Input validation failed: first problem; second problem',
      httpStatusCode: undefined,
      requestId: undefined,
      details: { errors: ['first problem', 'second problem'] },
    });
  });
});
