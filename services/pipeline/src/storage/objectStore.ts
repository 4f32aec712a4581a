import { GetObjectCommand, ListObjectsV2Command, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { err, ok, type Result } from '@airwise/shared';
import { StorageError, describeError, type StorageErrorCode } from '../errors';
import type { StorageCredentials } from '../config/credentials';

export type StorageResult<T> = Result<T, StorageError>;

/** The four object-storage calls the pipeline makes; failures come back as values. */
export interface ObjectStore {
  listKeys(bucket: string, prefix: string): Promise<StorageResult<string[]>>;
  getObject(bucket: string, key: string): Promise<StorageResult<Buffer>>;
  putObject(bucket: string, key: string, body: string | Buffer, contentType?: string): Promise<StorageResult<void>>;
}

function extractS3ErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  const code = (error as { Code?: string }).Code;
  if (typeof code === 'string' && code.length > 0) {
    return code;
  }
  const name = (error as { name?: string }).name;
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  return undefined;
}

function extractStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  return (error as { $metadata?: { httpStatusCode?: number } }).$metadata?.httpStatusCode;
}

export function classifyS3Error(error: unknown): StorageErrorCode {
  const status = extractStatus(error);
  const code = extractS3ErrorCode(error)?.toLowerCase();
  if (status === 404 || code === 'nosuchkey' || code === 'nosuchbucket' || code === 'notfound') {
    return 'not_found';
  }
  if (status === 403 || code === 'accessdenied' || code === 'invalidaccesskeyid' || code === 'expiredtoken') {
    return 'access_denied';
  }
  return 'transport';
}

function toStorageError(action: string, error: unknown, details: Record<string, unknown>): StorageError {
  return new StorageError(`S3 ${action} failed: ${describeError(error)}`, classifyS3Error(error), details, error);
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  /** First listing page only; the archive's per-month prefixes stay well below it. */
  async listKeys(bucket: string, prefix: string): Promise<StorageResult<string[]>> {
    try {
      const response = await this.client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix }));
      const keys = (response.Contents ?? [])
        .map((entry) => entry.Key)
        .filter((key): key is string => typeof key === 'string' && key.length > 0);
      return ok(keys);
    } catch (error) {
      return err(toStorageError('list', error, { bucket, prefix }));
    }
  }

  async getObject(bucket: string, key: string): Promise<StorageResult<Buffer>> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        return err(new StorageError('S3 object body missing', 'not_found', { bucket, key }));
      }
      const bytes = await response.Body.transformToByteArray();
      return ok(Buffer.from(bytes));
    } catch (error) {
      return err(toStorageError('get', error, { bucket, key }));
    }
  }

  async putObject(
    bucket: string,
    key: string,
    body: string | Buffer,
    contentType?: string
  ): Promise<StorageResult<void>> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType
        })
      );
      return ok(undefined);
    } catch (error) {
      return err(toStorageError('put', error, { bucket, key }));
    }
  }
}

export const ARCHIVE_BUCKET_REGION = 'us-east-1';

/** Client for the public archive bucket, which lives in us-east-1; requests go out unsigned. */
export function createArchiveS3Client(): S3Client {
  return new S3Client({
    region: ARCHIVE_BUCKET_REGION,
    credentials: { accessKeyId: 'anonymous', secretAccessKey: 'anonymous' },
    signer: { sign: async (request) => request }
  });
}

export function createTargetS3Client(region: string, credentials: StorageCredentials | null): S3Client {
  return new S3Client({
    region: credentials?.region ?? region,
    credentials: credentials
      ? {
          accessKeyId: credentials.accessKeyId,
          secretAccessKey: credentials.secretAccessKey,
          sessionToken: credentials.sessionToken
        }
      : undefined
  });
}
