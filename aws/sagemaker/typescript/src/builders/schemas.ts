/**
 * zod schemas for the JSON-valued inputs, typed against the SageMaker models.
 * Keys the schemas do not model are rejected rather than dropped. The input
 * validator checks the same schemas, so accepted inputs always build.
 * @module builders/schemas
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import {
  CompressionType,
  FileSystemAccessMode,
  FileSystemType,
  OutputCompressionType,
  RecordWrapper,
  S3DataDistribution,
  S3DataType,
  TrainingInputMode,
} from '@aws-sdk/client-sagemaker';

export const s3DataSourceSchema = z
  .object({
    S3DataType: z.nativeEnum(S3DataType).default(S3DataType.S3_PREFIX),
    S3Uri: z.string().min(1),
    S3DataDistributionType: z.nativeEnum(S3DataDistribution).optional(),
    AttributeNames: z.array(z.string()).optional(),
    InstanceGroupNames: z.array(z.string()).optional(),
    ModelAccessConfig: z.object({ AcceptEula: z.boolean() }).strict().optional(),
    HubAccessConfig: z.object({ HubContentArn: z.string() }).strict().optional(),
  })
  .strict();

export const fileSystemDataSourceSchema = z
  .object({
    FileSystemId: z.string(),
    FileSystemAccessMode: z.nativeEnum(FileSystemAccessMode),
    FileSystemType: z.nativeEnum(FileSystemType),
    DirectoryPath: z.string(),
  })
  .strict();

export const channelSchema = z
  .object({
    ChannelName: z.string().min(1),
    DataSource: z
      .object({
        S3DataSource: s3DataSourceSchema.optional(),
        FileSystemDataSource: fileSystemDataSourceSchema.optional(),
      })
      .strict(),
    ContentType: z.string().optional(),
    CompressionType: z.nativeEnum(CompressionType).optional(),
    RecordWrapperType: z.nativeEnum(RecordWrapper).optional(),
    InputMode: z.nativeEnum(TrainingInputMode).optional(),
    ShuffleConfig: z.object({ Seed: z.number().int() }).strict().optional(),
  })
  .strict();

export const inputDataConfigSchema = z.array(channelSchema);

export const outputDataConfigSchema = z
  .object({
    S3OutputPath: z.string().startsWith('s3://'),
    KmsKeyId: z.string().optional(),
    CompressionType: z.nativeEnum(OutputCompressionType).optional(),
  })
  .strict();

export const vpcConfigSchema = z
  .object({
    SecurityGroupIds: z.array(z.string()),
    Subnets: z.array(z.string()),
  })
  .strict();

/** Flat key/value maps: hyperparameters, environment, tags. */
export const keyValueSchema = z.record(z.unknown());

/**
 * One message per issue, prefixed with the input name and the issue path
 * (`input-data-config[0].DataSource: ...`).
 */
export function formatIssues(name: string, error: ZodError): string[] {
  return error.issues.map((issue) => `${name}${formatPath(issue.path)}: ${issue.message}`);
}

/**
 * Messages for every way `value` fails `schema`; empty when it fits.
 */
export function schemaIssues(name: string, schema: ZodTypeAny, value: unknown): string[] {
  const result = schema.safeParse(value);
  return result.success ? [] : formatIssues(name, result.error);
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`)).join('');
}
