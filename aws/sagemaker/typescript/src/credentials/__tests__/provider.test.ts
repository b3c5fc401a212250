import { describe, it, expect } from 'vitest';
import {
  resolveCredentialProvider,
  describeCredentialSource,
  validateCredentials,
} from '../provider.js';
import { AuthError } from '../../error/index.js';
import { NoopLogger } from '../../observability/logging.js';
import { createMockAwsApis, awsError } from '../../__mocks__/aws-apis.mock.js';

describe('resolveCredentialProvider', () => {
  it('should return static keys as given', async () => {
    const provider = resolveCredentialProvider(
      { type: 'static', accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
      'us-east-1',
      {}
    );

    await expect(provider()).resolves.toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: undefined,
    });
  });

  it('should build a provider for every other source', () => {
    for (const credentials of [
      { type: 'role' as const, roleArn: 'arn:aws:iam::123456789012:role/Deploy' },
      { type: 'webIdentity' as const, roleArn: 'arn:aws:iam::123456789012:role/Deploy', tokenFile: '/tmp/token' },
      { type: 'environment' as const },
    ]) {
      expect(typeof resolveCredentialProvider(credentials, 'us-east-1', {})).toBe('function');
    }
  });
});

describe('describeCredentialSource', () => {
  it('should name the source without secrets', () => {
    expect(
      describeCredentialSource({ type: 'static', accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' })
    ).toBe('explicit AWS credentials');
    expect(describeCredentialSource({ type: 'role', roleArn: 'arn:aws:iam::123456789012:role/Deploy' })).toBe(
      'assumed role arn:aws:iam::123456789012:role/Deploy'
    );
    expect(describeCredentialSource({ type: 'environment' })).toBe('default AWS credential chain');
  });
});

describe('validateCredentials', () => {
  it('should return the caller identity', async () => {
    const { identity } = createMockAwsApis();

    const response = await validateCredentials(identity, new NoopLogger());

    expect(response.Account).toBe('123456789012');
  });

  it('should raise an AuthError when STS rejects the credentials', async () => {
    const { identity } = createMockAwsApis();
    identity.getCallerIdentity.mockRejectedValue(awsError('ExpiredToken', 'The security token has expired', 403));

    const error = await validateCredentials(identity, new NoopLogger()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      kind: 'auth',
      code: 'ExpiredToken',
      httpStatusCode: 403,
      message: 'AWS credential validation failed: The security token has expired',
    });
  });
});
