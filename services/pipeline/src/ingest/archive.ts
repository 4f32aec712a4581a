import { gunzipSync } from 'node:zlib';
import { err, ok, type Logger, type Result } from '@airwise/shared';
import { dateParts } from '../dates';
import { StorageError, describeError } from '../errors';
import type { ObjectStore } from '../storage/objectStore';
import { parseCsv } from '../table/csv';
import { concatTables, emptyTable, type Table } from '../table/table';

export interface DownloadArchiveInput {
  bucket: string;
  locationIds: string[];
  /** Inclusive list of `YYYY-MM-DD` dates. */
  days: string[];
}

export interface ArchiveDownload {
  table: Table;
  /** One entry per (location, day) without a file; a location repeats once per missing day. */
  failedLocations: string[];
  filesRead: string[];
}

export function archivePrefix(locationId: string, isoDate: string): string {
  const { year, month } = dateParts(isoDate);
  return `records/csv.gz/locationid=${locationId}/year=${year}/month=${month}/`;
}

export function archiveFileSuffix(isoDate: string): string {
  const { year, month, day } = dateParts(isoDate);
  return `${year}${month}${day}.csv.gz`;
}

function decodeArchiveFile(key: string, bucket: string, body: Buffer): Result<Table, StorageError> {
  try {
    return ok(parseCsv(gunzipSync(body).toString('utf8')));
  } catch (error) {
    return err(
      new StorageError(`Archive file ${key} could not be decoded: ${describeError(error)}`, 'unreadable', { bucket, key }, error)
    );
  }
}

/**
 * Walks every (location, day) pair in order, listing the location's month prefix and
 * reading the files for that day. Missing days are expected and only tracked; the
 * first storage failure stops the walk and is returned.
 */
export async function downloadArchive(
  store: ObjectStore,
  input: DownloadArchiveInput,
  logger: Logger
): Promise<Result<ArchiveDownload, StorageError>> {
  const tables: Table[] = [];
  const failedLocations: string[] = [];
  const filesRead: string[] = [];

  for (const locationId of input.locationIds) {
    for (const day of input.days) {
      const listing = await store.listKeys(input.bucket, archivePrefix(locationId, day));
      if (!listing.ok) {
        return listing;
      }

      const suffix = archiveFileSuffix(day);
      const matches = listing.value.filter((key) => key.endsWith(suffix));
      if (matches.length === 0) {
        failedLocations.push(locationId);
        continue;
      }

      for (const key of matches) {
        const object = await store.getObject(input.bucket, key);
        if (!object.ok) {
          return object;
        }
        const decoded = decodeArchiveFile(key, input.bucket, object.value);
        if (!decoded.ok) {
          return decoded;
        }
        logger.debug({ key, rows: decoded.value.rows.length }, 'Read archive file');
        tables.push(decoded.value);
        filesRead.push(key);
      }
    }
  }

  const table = tables.length > 0 ? concatTables(tables) : emptyTable();
  if (table.rows.length > 0) {
    logger.info({ records: table.rows.length, files: filesRead.length }, 'Data successfully consolidated');
  } else {
    logger.info('No data was fetched for any location IDs');
  }
  if (failedLocations.length > 0) {
    logger.info({ failedLocations }, 'Locations with no data for some days');
  }

  return ok({ table, failedLocations, filesRead });
}
