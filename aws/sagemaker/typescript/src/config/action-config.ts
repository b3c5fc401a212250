/**
 * Typed runtime settings derived from the raw inputs.
 * @module config/action-config
 */

import { z } from 'zod';
import type { InputSet } from '../types/inputs.js';
import { ValidationError } from '../error/index.js';
import { getInput } from './inputs.js';
import {
  DEFAULT_REGION,
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_MAX_WAIT_SECONDS,
} from './defaults.js';

/**
 * Where the action gets AWS credentials from.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'role'; roleArn: string }
  | { type: 'webIdentity'; roleArn: string; tokenFile: string }
  | { type: 'environment' };

/**
 * Settings that drive the orchestrator.
 */
export interface ActionConfig {
  region: string;
  credentials: CredentialsConfig;
  jobName: string;
  waitForCompletion: boolean;
  /** Seconds between status checks. */
  checkIntervalSeconds: number;
  /** Seconds to wait for a terminal state before giving up. */
  maxWaitSeconds: number;
  /** Send StopTrainingJob when the wait bound is reached. */
  stopOnTimeout: boolean;
}

const booleanInput = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.toLowerCase() === 'true'));

const integerInput = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : Number(value)))
    .pipe(z.number().int().positive());

const actionInputSchema = z.object({
  region: z.string().default(DEFAULT_REGION),
  jobName: z.string().min(1),
  waitForCompletion: booleanInput(true),
  checkIntervalSeconds: integerInput(DEFAULT_CHECK_INTERVAL_SECONDS),
  maxWaitSeconds: integerInput(DEFAULT_MAX_WAIT_SECONDS),
  stopOnTimeout: booleanInput(false),
});

/**
 * Maps validated inputs onto an {@link ActionConfig}.
 *
 * @param env - environment consulted for the web identity token file
 * @throws {ValidationError} if the inputs do not satisfy the schema
 */
export function toActionConfig(inputs: InputSet, env: NodeJS.ProcessEnv = process.env): ActionConfig {
  const result = actionInputSchema.safeParse({
    region: getInput(inputs, 'aws-region'),
    jobName: getInput(inputs, 'job-name'),
    waitForCompletion: getInput(inputs, 'wait-for-completion'),
    checkIntervalSeconds: getInput(inputs, 'check-interval'),
    maxWaitSeconds: getInput(inputs, 'max-wait-time'),
    stopOnTimeout: getInput(inputs, 'stop-on-timeout'),
  });

  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      result.error
    );
  }

  return {
    ...result.data,
    credentials: credentialsFromInputs(inputs, env),
  };
}

/**
 * Resolution order:
 * 1. Static keys from `aws-access-key-id` / `aws-secret-access-key`
 * 2. `role-to-assume` with the runner's OIDC token file, if one is present
 * 3. `role-to-assume` with the ambient credentials
 * 4. The default provider chain
 */
export function credentialsFromInputs(inputs: InputSet, env: NodeJS.ProcessEnv): CredentialsConfig {
  const accessKeyId = getInput(inputs, 'aws-access-key-id');
  const secretAccessKey = getInput(inputs, 'aws-secret-access-key');
  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: getInput(inputs, 'aws-session-token'),
    };
  }

  const roleArn = getInput(inputs, 'role-to-assume');
  if (roleArn) {
    const tokenFile = env.AWS_WEB_IDENTITY_TOKEN_FILE;
    return tokenFile ? { type: 'webIdentity', roleArn, tokenFile } : { type: 'role', roleArn };
  }

  return { type: 'environment' };
}
