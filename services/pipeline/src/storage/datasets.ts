import { err, ok } from '@airwise/shared';
import { StorageError, describeError } from '../errors';
import { parseCsv, serializeCsv } from '../table/csv';
import type { Table } from '../table/table';
import type { ObjectStore, StorageResult } from './objectStore';

export function cityDatasetKey(prefix: string, city: string): string {
  return `${prefix}/${city}_data.csv`;
}

/** Overwrites whatever is stored at the key; no existence check, no versioning. */
export async function writeDatasetCsv(
  store: ObjectStore,
  bucket: string,
  key: string,
  table: Table
): Promise<StorageResult<void>> {
  return store.putObject(bucket, key, serializeCsv(table), 'text/csv');
}

export async function readDatasetCsv(store: ObjectStore, bucket: string, key: string): Promise<StorageResult<Table>> {
  const object = await store.getObject(bucket, key);
  if (!object.ok) {
    return object;
  }
  try {
    return ok(parseCsv(object.value.toString('utf8')));
  } catch (error) {
    return err(new StorageError(`Dataset ${key} is not readable CSV: ${describeError(error)}`, 'unreadable', { bucket, key }, error));
  }
}
