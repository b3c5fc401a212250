/**
 * Results channel of the CI runner: step outputs, job summary, masking and
 * annotations.
 * @module action/outputs
 */

import { appendFileSync } from 'fs';
import { randomUUID } from 'crypto';
import { EOL } from 'os';

export interface OutputChannel {
  setOutput(name: string, value: string): void;
  appendSummary(markdown: string): void;
  /** Hides a value from the runner's log output. */
  mask(value: string): void;
  /** Error annotation shown on the workflow run. */
  error(message: string): void;
}

export type LineWriter = (line: string) => void;

/**
 * Writes to the files named by `GITHUB_OUTPUT` and `GITHUB_STEP_SUMMARY`.
 * Without them (local runs) outputs and the summary go to `write`.
 */
export class GitHubOutputChannel implements OutputChannel {
  private readonly outputFile?: string;
  private readonly summaryFile?: string;
  private readonly write: LineWriter;

  constructor(env: NodeJS.ProcessEnv = process.env, write: LineWriter = (line) => process.stdout.write(line + EOL)) {
    this.outputFile = env.GITHUB_OUTPUT || undefined;
    this.summaryFile = env.GITHUB_STEP_SUMMARY || undefined;
    this.write = write;
  }

  setOutput(name: string, value: string): void {
    if (!this.outputFile) {
      this.write(`${name}=${value}`);
      return;
    }
    appendFileSync(this.outputFile, formatOutput(name, value), { encoding: 'utf8' });
  }

  appendSummary(markdown: string): void {
    if (!this.summaryFile) {
      this.write('Step Summary:');
      this.write(markdown);
      return;
    }
    appendFileSync(this.summaryFile, markdown, { encoding: 'utf8' });
  }

  mask(value: string): void {
    if (value) {
      this.write(`::add-mask::${value}`);
    }
  }

  error(message: string): void {
    this.write(`::error::${escapeCommandData(message)}`);
  }
}

/**
 * Formats one entry of the output file. Multi-line values use a heredoc
 * delimiter that cannot occur in the value.
 */
export function formatOutput(name: string, value: string, delimiter: string = `ghadelimiter_${randomUUID()}`): string {
  if (!value.includes('\n') && !value.includes('\r')) {
    return `${name}=${value}${EOL}`;
  }
  if (value.includes(delimiter)) {
    throw new Error(`Output value for '${name}' contains the delimiter ${delimiter}`);
  }
  return `${name}<<${delimiter}${EOL}${value}${EOL}${delimiter}${EOL}`;
}

/**
 * Escapes a workflow command message (`%`, CR and LF).
 */
export function escapeCommandData(message: string): string {
  return message.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}
