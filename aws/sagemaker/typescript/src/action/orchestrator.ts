/**
 * Training action workflow: validate, build, submit, optionally wait, report.
 * @module action/orchestrator
 */

import type { Logger } from '../observability/logging.js';
import type { OutputChannel } from './outputs.js';
import type { Clock } from '../utils/timers.js';
import { systemClock } from '../utils/timers.js';
import { formatDuration } from '../utils/format.js';
import type { AwsClientOptions, SageMakerApi, TrainingLogsApi, IdentityApi } from '../client/api.js';
import { TrainingJobClient } from '../client/training-client.js';
import { InputValidator } from '../validation/validator.js';
import { collectInputs, getInput } from '../config/inputs.js';
import { toActionConfig, type ActionConfig } from '../config/action-config.js';
import { buildTrainingJobRequest } from '../builders/training-job.js';
import {
  resolveCredentialProvider,
  describeCredentialSource,
  validateCredentials,
} from '../credentials/provider.js';
import { ValidationError, TimeoutError, mapAwsError } from '../error/index.js';
import type { JobDetails, JobState } from '../types/job.js';

export interface AwsApis {
  sagemaker: SageMakerApi;
  logs: TrainingLogsApi;
  identity: IdentityApi;
}

export interface TrainingActionDeps {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  outputs: OutputChannel;
  createApis(options: AwsClientOptions): AwsApis;
  clock?: Clock;
  /** Aborts a running wait. */
  signal?: AbortSignal;
}

/** Number of log lines reported for a job that did not complete. */
const FAILURE_LOG_LINES = 50;

/**
 * Runs the action and returns the process exit code.
 *
 * Every failure is caught here, logged, and turned into exit code 1.
 */
export async function runTrainingAction(deps: TrainingActionDeps): Promise<number> {
  const { env, logger, outputs } = deps;
  const clock = deps.clock ?? systemClock;

  logger.info('Starting SageMaker Training Action');

  try {
    const inputs = collectInputs(env);

    for (const secret of [getInput(inputs, 'aws-secret-access-key'), getInput(inputs, 'aws-session-token')]) {
      if (secret) {
        outputs.mask(secret);
      }
    }

    const validation = new InputValidator(logger).validate(inputs);
    for (const warning of validation.warnings) {
      logger.warn(warning);
    }
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const config = toActionConfig(inputs, env);

    logger.info('Initializing AWS session', {
      region: config.region,
      credentials: describeCredentialSource(config.credentials),
    });
    const apis = deps.createApis({
      region: config.region,
      credentials: resolveCredentialProvider(config.credentials, config.region, env),
    });
    await validateCredentials(apis.identity, logger);

    const request = buildTrainingJobRequest(inputs);
    const definition = JSON.stringify(request);
    logger.info('Training job configuration', { request });

    const client = new TrainingJobClient({
      sagemaker: apis.sagemaker,
      logs: apis.logs,
      logger,
      clock,
    });

    logger.info(`Submitting training job: ${config.jobName}`);
    const { jobName, jobArn } = await client.submit(request);
    logger.info(`Training job submitted successfully. ARN: ${jobArn}`);

    outputs.setOutput('job-name', jobName);
    outputs.setOutput('job-arn', jobArn);
    outputs.setOutput('training-image', request.AlgorithmSpecification?.TrainingImage ?? '');
    outputs.setOutput('training-job-definition', definition);

    if (!config.waitForCompletion) {
      outputs.setOutput('job-status', 'InProgress');
      logger.info('Training job submitted. Not waiting for completion.');
      return 0;
    }

    const started = clock.now();
    const status = await waitForJob(client, config, deps.signal, logger);
    const details = await client.describe(jobName);

    outputs.setOutput('job-status', status);
    const artifacts = details.ModelArtifacts?.S3ModelArtifacts;
    if (artifacts) {
      outputs.setOutput('model-artifacts', artifacts);
    }
    outputs.appendSummary(renderSummary(details, status, (clock.now() - started) / 1000));

    logger.info(`Training job completed with status: ${status}`);

    if (status !== 'Completed') {
      logger.error(`Training job failed with status: ${status}`);
      if (details.FailureReason) {
        logger.error(`Failure reason: ${details.FailureReason}`);
        outputs.error(`Training job ${jobName} ${status.toLowerCase()}: ${details.FailureReason}`);
      }
      const logs = await client.getLogs(jobName, FAILURE_LOG_LINES);
      if (logs) {
        logger.info('Training job log tail', { jobName, logs });
      }
      return 1;
    }

    logger.info('SageMaker Training Action completed successfully');
    return 0;
  } catch (error) {
    const failure = mapAwsError(error);
    logger.error(`Action failed with error: ${failure.message}`, failure.toJSON());
    outputs.error(failure.message);
    return 1;
  }
}

async function waitForJob(
  client: TrainingJobClient,
  config: ActionConfig,
  signal: AbortSignal | undefined,
  logger: Logger
): Promise<JobState> {
  logger.info('Waiting for training job completion...');

  try {
    return await client.awaitCompletion(
      config.jobName,
      config.checkIntervalSeconds,
      config.maxWaitSeconds,
      { signal }
    );
  } catch (error) {
    if (error instanceof TimeoutError && config.stopOnTimeout) {
      try {
        await client.stop(config.jobName);
      } catch (stopError) {
        logger.warn('Stop request after timeout failed', { error: mapAwsError(stopError).message });
      }
    }
    throw error;
  }
}

/**
 * Markdown table for the job summary.
 */
export function renderSummary(details: JobDetails, status: JobState, elapsedSeconds: number): string {
  const rows: Array<[string, string]> = [
    ['Job name', details.TrainingJobName ?? ''],
    ['Job ARN', details.TrainingJobArn ?? ''],
    ['Status', status],
    ['Wait time', formatDuration(elapsedSeconds)],
  ];
  if (details.ModelArtifacts?.S3ModelArtifacts) {
    rows.push(['Model artifacts', details.ModelArtifacts.S3ModelArtifacts]);
  }
  if (details.FailureReason) {
    rows.push(['Failure reason', details.FailureReason]);
  }

  const lines = [
    '## SageMaker Training Job',
    '',
    '| Field | Value |',
    '| --- | --- |',
    ...rows.map(([field, value]) => `| ${field} | ${value.replace(/\|/g, '\\|')} |`),
    '',
  ];
  return lines.join('\n') + '\n';
}
