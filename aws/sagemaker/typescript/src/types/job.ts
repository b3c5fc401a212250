/**
 * Training job state and API result types.
 * @module types/job
 */

import {
  TrainingJobStatus,
  TrainingInstanceType,
  type CreateTrainingJobRequest,
  type DescribeTrainingJobResponse,
  type ListTrainingJobsResponse,
} from '@aws-sdk/client-sagemaker';

/**
 * Request sent to CreateTrainingJob.
 */
export type TrainingJobRequest = CreateTrainingJobRequest;

/**
 * Status and metadata returned by DescribeTrainingJob.
 */
export type JobDetails = DescribeTrainingJobResponse;

export type JobListPage = ListTrainingJobsResponse;

/**
 * Remote-reported job status.
 */
export type JobState = TrainingJobStatus;

export type TerminalJobState = 'Completed' | 'Failed' | 'Stopped';

export const TERMINAL_STATES: readonly TerminalJobState[] = [
  TrainingJobStatus.COMPLETED,
  TrainingJobStatus.FAILED,
  TrainingJobStatus.STOPPED,
];

export function isTerminalState(state: string | undefined): state is TerminalJobState {
  return TERMINAL_STATES.some((terminal) => terminal === state);
}

/**
 * True for instance types the SageMaker API accepts for training.
 */
export function isTrainingInstanceType(value: string): value is TrainingInstanceType {
  return Object.values(TrainingInstanceType).some((instanceType) => instanceType === value);
}

export interface SubmitResult {
  jobName: string;
  jobArn: string;
}

export interface ListJobsOptions {
  /** Only jobs whose name contains this substring. */
  nameContains?: string;
  /** Only jobs in this status. */
  statusEquals?: JobState;
  /** Page size. @default 10 */
  maxResults?: number;
}
