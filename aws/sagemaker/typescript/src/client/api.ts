/**
 * Narrow service ports used by the training job client, plus adapters that
 * back them with the AWS SDK v3 clients.
 * @module client/api
 */

import {
  SageMakerClient,
  CreateTrainingJobCommand,
  DescribeTrainingJobCommand,
  StopTrainingJobCommand,
  ListTrainingJobsCommand,
  type CreateTrainingJobRequest,
  type CreateTrainingJobResponse,
  type DescribeTrainingJobRequest,
  type DescribeTrainingJobResponse,
  type StopTrainingJobRequest,
  type ListTrainingJobsRequest,
  type ListTrainingJobsResponse,
} from '@aws-sdk/client-sagemaker';
import {
  CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
  type DescribeLogStreamsRequest,
  type DescribeLogStreamsResponse,
  type GetLogEventsRequest,
  type GetLogEventsResponse,
} from '@aws-sdk/client-cloudwatch-logs';
import {
  STSClient,
  GetCallerIdentityCommand,
  type GetCallerIdentityResponse,
} from '@aws-sdk/client-sts';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';

export interface SageMakerApi {
  createTrainingJob(input: CreateTrainingJobRequest): Promise<CreateTrainingJobResponse>;
  describeTrainingJob(input: DescribeTrainingJobRequest): Promise<DescribeTrainingJobResponse>;
  stopTrainingJob(input: StopTrainingJobRequest): Promise<void>;
  listTrainingJobs(input: ListTrainingJobsRequest): Promise<ListTrainingJobsResponse>;
}

export interface TrainingLogsApi {
  describeLogStreams(input: DescribeLogStreamsRequest): Promise<DescribeLogStreamsResponse>;
  getLogEvents(input: GetLogEventsRequest): Promise<GetLogEventsResponse>;
}

export interface IdentityApi {
  getCallerIdentity(): Promise<GetCallerIdentityResponse>;
}

/**
 * Settings shared by the SDK clients.
 */
export interface AwsClientOptions {
  region: string;
  credentials: AwsCredentialIdentityProvider;
}

export function createSageMakerApi(client: SageMakerClient): SageMakerApi {
  return {
    createTrainingJob: (input) => client.send(new CreateTrainingJobCommand(input)),
    describeTrainingJob: (input) => client.send(new DescribeTrainingJobCommand(input)),
    stopTrainingJob: async (input) => {
      await client.send(new StopTrainingJobCommand(input));
    },
    listTrainingJobs: (input) => client.send(new ListTrainingJobsCommand(input)),
  };
}

export function createTrainingLogsApi(client: CloudWatchLogsClient): TrainingLogsApi {
  return {
    describeLogStreams: (input) => client.send(new DescribeLogStreamsCommand(input)),
    getLogEvents: (input) => client.send(new GetLogEventsCommand(input)),
  };
}

export function createIdentityApi(client: STSClient): IdentityApi {
  return {
    getCallerIdentity: () => client.send(new GetCallerIdentityCommand({})),
  };
}

/**
 * Builds the three service ports for one region and credential source.
 */
export function createAwsApis(options: AwsClientOptions): {
  sagemaker: SageMakerApi;
  logs: TrainingLogsApi;
  identity: IdentityApi;
} {
  const config = { region: options.region, credentials: options.credentials };
  return {
    sagemaker: createSageMakerApi(new SageMakerClient(config)),
    logs: createTrainingLogsApi(new CloudWatchLogsClient(config)),
    identity: createIdentityApi(new STSClient(config)),
  };
}
