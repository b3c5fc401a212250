export { buildTrainingJobRequest, stringifyValue, toTagList } from './training-job.js';
export {
  channelSchema,
  inputDataConfigSchema,
  outputDataConfigSchema,
  vpcConfigSchema,
} from './schemas.js';
