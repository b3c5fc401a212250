import { vi } from 'vitest';
import type { SageMakerApi, TrainingLogsApi, IdentityApi } from '../client/api.js';
import type { AwsApis } from '../action/orchestrator.js';
import type { Clock } from '../utils/timers.js';

export interface MockSageMakerApi extends SageMakerApi {
  createTrainingJob: ReturnType<typeof vi.fn>;
  describeTrainingJob: ReturnType<typeof vi.fn>;
  stopTrainingJob: ReturnType<typeof vi.fn>;
  listTrainingJobs: ReturnType<typeof vi.fn>;
}

export interface MockTrainingLogsApi extends TrainingLogsApi {
  describeLogStreams: ReturnType<typeof vi.fn>;
  getLogEvents: ReturnType<typeof vi.fn>;
}

export interface MockIdentityApi extends IdentityApi {
  getCallerIdentity: ReturnType<typeof vi.fn>;
}

export interface MockAwsApis extends AwsApis {
  sagemaker: MockSageMakerApi;
  logs: MockTrainingLogsApi;
  identity: MockIdentityApi;
}

export function createMockSageMakerApi(): MockSageMakerApi {
  return {
    createTrainingJob: vi.fn(),
    describeTrainingJob: vi.fn(),
    stopTrainingJob: vi.fn().mockResolvedValue(undefined),
    listTrainingJobs: vi.fn(),
  };
}

export function createMockTrainingLogsApi(): MockTrainingLogsApi {
  return {
    describeLogStreams: vi.fn().mockResolvedValue({ logStreams: [] }),
    getLogEvents: vi.fn().mockResolvedValue({ events: [] }),
  };
}

export function createMockAwsApis(): MockAwsApis {
  return {
    sagemaker: createMockSageMakerApi(),
    logs: createMockTrainingLogsApi(),
    identity: {
      getCallerIdentity: vi.fn().mockResolvedValue({
        Account: '123456789012',
        Arn: 'arn:aws:sts::123456789012:assumed-role/ci/test',
      }),
    },
  };
}

/**
 * Queues DescribeTrainingJob responses with the given statuses, in order.
 */
export function mockStatusSequence(api: MockSageMakerApi, jobName: string, statuses: string[]): void {
  for (const status of statuses) {
    api.describeTrainingJob.mockResolvedValueOnce({
      TrainingJobName: jobName,
      TrainingJobArn: `arn:aws:sagemaker:us-east-1:123456789012:training-job/${jobName}`,
      TrainingJobStatus: status,
      SecondaryStatus: status === 'InProgress' ? 'Training' : status,
    });
  }
}

/**
 * AWS SDK style service exception.
 */
export function awsError(name: string, message: string, httpStatusCode = 400): Error {
  return Object.assign(new Error(message), {
    name,
    $fault: 'client',
    $metadata: { httpStatusCode, requestId: 'req-test-1' },
  });
}

/**
 * Clock whose sleep advances time instantly.
 */
export class FakeClock implements Clock {
  public current = 0;
  public readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    this.sleeps.push(ms);
    this.current += ms;
    return Promise.resolve();
  }
}
