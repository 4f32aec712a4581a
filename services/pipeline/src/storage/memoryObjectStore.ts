import { err, ok } from '@airwise/shared';
import { StorageError } from '../errors';
import type { ObjectStore, StorageResult } from './objectStore';

export interface StoredObject {
  body: Buffer;
  contentType?: string;
}

/** Bucket-keyed in-process store; listings come back in lexicographic key order like S3. */
export class MemoryObjectStore implements ObjectStore {
  private readonly buckets = new Map<string, Map<string, StoredObject>>();
  readonly listCalls: Array<{ bucket: string; prefix: string }> = [];

  seed(bucket: string, key: string, body: string | Buffer, contentType?: string): void {
    this.bucket(bucket).set(key, { body: Buffer.from(body), contentType });
  }

  peek(bucket: string, key: string): StoredObject | undefined {
    return this.buckets.get(bucket)?.get(key);
  }

  async listKeys(bucket: string, prefix: string): Promise<StorageResult<string[]>> {
    this.listCalls.push({ bucket, prefix });
    const keys = Array.from(this.buckets.get(bucket)?.keys() ?? [])
      .filter((key) => key.startsWith(prefix))
      .sort();
    return ok(keys);
  }

  async getObject(bucket: string, key: string): Promise<StorageResult<Buffer>> {
    const stored = this.buckets.get(bucket)?.get(key);
    if (!stored) {
      return err(new StorageError(`Object ${key} not found in ${bucket}`, 'not_found', { bucket, key }));
    }
    return ok(Buffer.from(stored.body));
  }

  async putObject(
    bucket: string,
    key: string,
    body: string | Buffer,
    contentType?: string
  ): Promise<StorageResult<void>> {
    this.seed(bucket, key, body, contentType);
    return ok(undefined);
  }

  private bucket(name: string): Map<string, StoredObject> {
    let bucket = this.buckets.get(name);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(name, bucket);
    }
    return bucket;
  }
}
