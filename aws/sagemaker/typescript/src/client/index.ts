export { TrainingJobClient } from './training-client.js';
export type { TrainingJobClientOptions, AwaitCompletionOptions } from './training-client.js';
export {
  createSageMakerApi,
  createTrainingLogsApi,
  createIdentityApi,
  createAwsApis,
} from './api.js';
export type { SageMakerApi, TrainingLogsApi, IdentityApi, AwsClientOptions } from './api.js';
