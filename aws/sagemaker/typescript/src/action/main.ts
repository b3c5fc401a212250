/**
 * Action entry point.
 */

import { ConsoleLogger, logLevelFromEnv } from '../observability/logging.js';
import { createAwsApis } from '../client/api.js';
import { GitHubOutputChannel } from './outputs.js';
import { runTrainingAction } from './orchestrator.js';

const logger = new ConsoleLogger(logLevelFromEnv(process.env), { logger: 'sagemaker_training_action' });

runTrainingAction({
  env: process.env,
  logger,
  outputs: new GitHubOutputChannel(process.env),
  createApis: createAwsApis,
}).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.error('Unhandled failure', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  }
);
