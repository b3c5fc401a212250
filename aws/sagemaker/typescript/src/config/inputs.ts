/**
 * Collection of action inputs from the runner environment.
 * @module config/inputs
 */

import { INPUT_NAMES, inputEnvName, type InputName, type InputSet } from '../types/inputs.js';

/**
 * Reads every recognized `INPUT_*` variable into a frozen {@link InputSet}.
 *
 * Variables that are unset are left out. Empty strings are kept so the
 * validator can report them as empty.
 */
export function collectInputs(env: NodeJS.ProcessEnv = process.env): InputSet {
  const inputs: Partial<Record<InputName, string>> = {};

  for (const name of INPUT_NAMES) {
    const value = env[inputEnvName(name)];
    if (value !== undefined) {
      inputs[name] = value;
    }
  }

  return Object.freeze(inputs);
}

/**
 * Returns the trimmed value of an input, or `undefined` when it is absent or blank.
 */
export function getInput(inputs: InputSet, name: InputName): string | undefined {
  const value = inputs[name]?.trim();
  return value ? value : undefined;
}
