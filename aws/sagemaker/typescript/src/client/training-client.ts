/**
 * Training Job Client
 *
 * Submits, inspects, stops and lists SageMaker training jobs, and waits for a
 * job to reach a terminal state by polling DescribeTrainingJob.
 */

import { SortBy, SortOrder } from '@aws-sdk/client-sagemaker';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type {
  TrainingJobRequest,
  JobDetails,
  JobListPage,
  JobState,
  SubmitResult,
  ListJobsOptions,
} from '../types/job.js';
import { isTerminalState } from '../types/job.js';
import {
  SubmissionError,
  DescribeError,
  TimeoutError,
  UnknownError,
  describeAwsError,
  serviceErrorOptions,
} from '../error/index.js';
import {
  TRAINING_LOG_GROUP,
  DEFAULT_LOG_EVENT_LIMIT,
  DEFAULT_LIST_MAX_RESULTS,
} from '../config/defaults.js';
import { systemClock, type Clock } from '../utils/timers.js';
import type { SageMakerApi, TrainingLogsApi } from './api.js';

export interface TrainingJobClientOptions {
  sagemaker: SageMakerApi;
  /** Needed only for {@link TrainingJobClient.getLogs}. */
  logs?: TrainingLogsApi;
  logger?: Logger;
  clock?: Clock;
}

export interface AwaitCompletionOptions {
  /** Aborts the wait between polls. The abort reason is rethrown. */
  signal?: AbortSignal;
}

export class TrainingJobClient {
  private readonly sagemaker: SageMakerApi;
  private readonly logs?: TrainingLogsApi;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly submitted = new Set<string>();

  constructor(options: TrainingJobClientOptions) {
    this.sagemaker = options.sagemaker;
    this.logs = options.logs;
    this.logger = (options.logger ?? new NoopLogger()).child({ component: 'sagemaker_client' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Creates the training job. Failures are not retried.
   *
   * @throws {SubmissionError} if the request is rejected, fails in transit,
   * or names a job this client already submitted
   */
  async submit(request: TrainingJobRequest): Promise<SubmitResult> {
    const jobName = request.TrainingJobName ?? '';

    if (this.submitted.has(jobName)) {
      throw new SubmissionError(jobName, 'job name was already submitted by this invocation', {
        code: 'DuplicateJobName',
      });
    }

    this.logger.info('Creating SageMaker training job', { jobName });
    this.submitted.add(jobName);

    try {
      const response = await this.sagemaker.createTrainingJob(request);

      if (!response.TrainingJobArn) {
        throw new SubmissionError(jobName, 'response did not include a TrainingJobArn', {
          code: 'MissingTrainingJobArn',
        });
      }

      this.logger.info('Training job created successfully', {
        jobName,
        jobArn: response.TrainingJobArn,
      });

      return { jobName, jobArn: response.TrainingJobArn };
    } catch (error) {
      if (error instanceof SubmissionError) {
        throw error;
      }
      const info = describeAwsError(error);
      this.logger.error('Failed to create training job', { jobName, code: info.code, error: info.message });
      throw new SubmissionError(jobName, info.message, serviceErrorOptions(error));
    }
  }

  /**
   * @throws {DescribeError} if the job is unknown or the call fails
   */
  async describe(jobName: string): Promise<JobDetails> {
    try {
      return await this.sagemaker.describeTrainingJob({ TrainingJobName: jobName });
    } catch (error) {
      const info = describeAwsError(error);
      this.logger.error('Failed to describe training job', { jobName, code: info.code, error: info.message });
      throw new DescribeError(jobName, info.message, serviceErrorOptions(error));
    }
  }

  /**
   * Polls the job until it reports a terminal status and returns that status.
   *
   * Polling starts immediately and repeats every `pollIntervalSeconds` while
   * less than `maxWaitSeconds` have elapsed. The secondary status is logged
   * but never affects the loop.
   *
   * @throws {TimeoutError} when the wait bound is reached first
   * @throws {DescribeError} from the first failing status check
   */
  async awaitCompletion(
    jobName: string,
    pollIntervalSeconds: number,
    maxWaitSeconds: number,
    options: AwaitCompletionOptions = {}
  ): Promise<JobState> {
    this.logger.info('Waiting for training job completion', {
      jobName,
      checkInterval: pollIntervalSeconds,
      maxWaitTime: maxWaitSeconds,
    });

    const start = this.clock.now();
    const elapsedSeconds = (): number => Math.floor((this.clock.now() - start) / 1000);

    while (this.clock.now() - start < maxWaitSeconds * 1000) {
      const details = await this.describe(jobName);
      const status = details.TrainingJobStatus;

      this.logger.info('Training job status check', {
        jobName,
        status,
        elapsedTime: elapsedSeconds(),
      });

      if (isTerminalState(status)) {
        if (status === 'Completed') {
          this.logger.info('Training job completed successfully', {
            jobName,
            totalTime: elapsedSeconds(),
          });
        } else {
          this.logger.error(`Training job finished with status: ${status}`, {
            jobName,
            failureReason: details.FailureReason ?? 'Unknown',
          });
        }
        return status;
      }

      if (details.SecondaryStatus) {
        this.logger.debug('Training job secondary status', {
          jobName,
          secondaryStatus: details.SecondaryStatus,
        });
      }

      await this.clock.sleep(pollIntervalSeconds * 1000, options.signal);
    }

    this.logger.error('Timeout waiting for training job completion', { jobName, maxWaitTime: maxWaitSeconds });
    throw new TimeoutError(jobName, maxWaitSeconds);
  }

  /**
   * Requests that the job stop. Does not wait for the status to change.
   *
   * @throws {UnknownError} if the stop request is rejected
   */
  async stop(jobName: string): Promise<void> {
    this.logger.info(`Stopping training job: ${jobName}`);

    try {
      await this.sagemaker.stopTrainingJob({ TrainingJobName: jobName });
      this.logger.info(`Stop request sent for training job: ${jobName}`);
    } catch (error) {
      const info = describeAwsError(error);
      this.logger.error(`Failed to stop training job ${jobName}`, { code: info.code, error: info.message });
      throw new UnknownError(`Failed to stop training job ${jobName}: ${info.message}`, {
        ...serviceErrorOptions(error),
        code: 'StopTrainingJobFailed',
      });
    }
  }

  /**
   * Returns one page of training jobs, newest first.
   *
   * @throws {DescribeError} if the listing call fails
   */
  async list(options: ListJobsOptions = {}): Promise<JobListPage> {
    try {
      return await this.sagemaker.listTrainingJobs({
        MaxResults: options.maxResults ?? DEFAULT_LIST_MAX_RESULTS,
        SortBy: SortBy.CREATION_TIME,
        SortOrder: SortOrder.DESCENDING,
        NameContains: options.nameContains,
        StatusEquals: options.statusEquals,
      });
    } catch (error) {
      const info = describeAwsError(error);
      this.logger.error('Failed to list training jobs', { code: info.code, error: info.message });
      throw new DescribeError(undefined, `Failed to list training jobs: ${info.message}`, serviceErrorOptions(error));
    }
  }

  /**
   * Returns the latest log lines of the job's most recent log stream, or
   * `undefined` when there are none or they cannot be read.
   */
  async getLogs(jobName: string, limit: number = DEFAULT_LOG_EVENT_LIMIT): Promise<string | undefined> {
    if (!this.logs) {
      this.logger.warn('No CloudWatch Logs client configured', { jobName });
      return undefined;
    }

    try {
      const streams = await this.logs.describeLogStreams({
        logGroupName: TRAINING_LOG_GROUP,
        logStreamNamePrefix: `${jobName}/`,
      });

      const stream = (streams.logStreams ?? [])
        .filter((candidate) => candidate.logStreamName)
        .sort((a, b) => (b.lastEventTimestamp ?? 0) - (a.lastEventTimestamp ?? 0))[0];
      if (!stream?.logStreamName) {
        return undefined;
      }

      const response = await this.logs.getLogEvents({
        logGroupName: TRAINING_LOG_GROUP,
        logStreamName: stream.logStreamName,
        limit,
        startFromHead: false,
      });

      return (response.events ?? []).map((event) => event.message ?? '').join('\n');
    } catch (error) {
      this.logger.warn(`Could not retrieve logs for job ${jobName}`, {
        error: describeAwsError(error).message,
      });
      return undefined;
    }
  }
}
