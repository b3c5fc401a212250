/**
 * Credential resolution for the AWS clients.
 * @module credentials/provider
 */

import {
  fromNodeProviderChain,
  fromTemporaryCredentials,
  fromTokenFile,
} from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { GetCallerIdentityResponse } from '@aws-sdk/client-sts';
import type { CredentialsConfig } from '../config/action-config.js';
import { ROLE_SESSION_NAME_PREFIX } from '../config/defaults.js';
import type { IdentityApi } from '../client/api.js';
import type { Logger } from '../observability/logging.js';
import { AuthError, describeAwsError, serviceErrorOptions } from '../error/index.js';

/**
 * Returns a credential provider for the configured source.
 *
 * @param env - consulted for the role session name
 */
export function resolveCredentialProvider(
  credentials: CredentialsConfig,
  region: string,
  env: NodeJS.ProcessEnv = process.env
): AwsCredentialIdentityProvider {
  switch (credentials.type) {
    case 'static': {
      const identity = {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      };
      return async () => identity;
    }

    case 'webIdentity':
      return fromTokenFile({
        roleArn: credentials.roleArn,
        webIdentityTokenFile: credentials.tokenFile,
        roleSessionName: env.AWS_ROLE_SESSION_NAME ?? 'GitHubActions',
        clientConfig: { region },
      });

    case 'role':
      return fromTemporaryCredentials({
        params: {
          RoleArn: credentials.roleArn,
          RoleSessionName: `${ROLE_SESSION_NAME_PREFIX}-${env.GITHUB_RUN_ID ?? 'local'}`,
        },
        clientConfig: { region },
      });

    case 'environment':
      return fromNodeProviderChain({ clientConfig: { region } });
  }
}

/**
 * Describes how credentials will be obtained, without exposing secrets.
 */
export function describeCredentialSource(credentials: CredentialsConfig): string {
  switch (credentials.type) {
    case 'static':
      return 'explicit AWS credentials';
    case 'webIdentity':
      return `OIDC web identity for role ${credentials.roleArn}`;
    case 'role':
      return `assumed role ${credentials.roleArn}`;
    case 'environment':
      return 'default AWS credential chain';
  }
}

/**
 * Confirms the credentials work by calling STS GetCallerIdentity.
 *
 * @throws {AuthError} if credentials cannot be resolved or are rejected
 */
export async function validateCredentials(
  identity: IdentityApi,
  logger: Logger
): Promise<GetCallerIdentityResponse> {
  try {
    const response = await identity.getCallerIdentity();
    logger.info('AWS credentials validated', {
      accountId: response.Account,
      userArn: response.Arn,
    });
    return response;
  } catch (error) {
    const info = describeAwsError(error);
    logger.error('AWS credential validation failed', { code: info.code, error: info.message });
    throw new AuthError(`AWS credential validation failed: ${info.message}`, serviceErrorOptions(error));
  }
}
