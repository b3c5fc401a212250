export { INPUT_NAMES, inputEnvName } from './inputs.js';
export type { InputName, InputSet } from './inputs.js';

export { TERMINAL_STATES, isTerminalState, isTrainingInstanceType } from './job.js';
export type {
  TrainingJobRequest,
  JobDetails,
  JobListPage,
  JobState,
  TerminalJobState,
  SubmitResult,
  ListJobsOptions,
} from './job.js';
