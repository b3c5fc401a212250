export { InputValidator, validateJobName } from './validator.js';
export type { ValidationResult } from './validator.js';
export {
  REQUIRED_INPUTS,
  JOB_NAME_PATTERN,
  ROLE_ARN_PATTERN,
  INSTANCE_TYPE_PATTERN,
  NUMERIC_RANGES,
  COMMON_REGIONS,
} from './rules.js';
