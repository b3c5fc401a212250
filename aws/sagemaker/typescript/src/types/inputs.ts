/**
 * Action input names and the raw input map.
 * @module types/inputs
 */

/**
 * Every input the action recognizes, as declared in action.yml.
 */
export const INPUT_NAMES = [
  'aws-access-key-id',
  'aws-secret-access-key',
  'aws-session-token',
  'aws-region',
  'role-to-assume',
  'job-name',
  'algorithm-specification',
  'role-arn',
  'instance-type',
  'instance-count',
  'volume-size',
  'max-runtime',
  'input-data-config',
  'output-data-config',
  'hyperparameters',
  'environment',
  'vpc-config',
  'tags',
  'wait-for-completion',
  'check-interval',
  'max-wait-time',
  'stop-on-timeout',
] as const;

export type InputName = (typeof INPUT_NAMES)[number];

/**
 * Raw string inputs of one invocation. Absent keys were not supplied.
 */
export type InputSet = Readonly<Partial<Record<InputName, string>>>;

/**
 * Returns the environment variable the runner uses for an input
 * (`job-name` -> `INPUT_JOB_NAME`).
 */
export function inputEnvName(name: InputName): string {
  return `INPUT_${name.toUpperCase().replace(/-/g, '_')}`;
}
