export {
  resolveCredentialProvider,
  describeCredentialSource,
  validateCredentials,
} from './provider.js';
