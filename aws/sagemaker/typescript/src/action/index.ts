export { runTrainingAction, renderSummary } from './orchestrator.js';
export type { TrainingActionDeps, AwsApis } from './orchestrator.js';
export { GitHubOutputChannel, formatOutput, escapeCommandData } from './outputs.js';
export type { OutputChannel, LineWriter } from './outputs.js';
