import type { Logger } from '@airwise/shared';
import type { BoundingBox, OpenAqClient, OpenAqLocation } from '@airwise/openaq-client';

export interface LocationMetadata {
  locationId: string;
  locationName: string;
  country: string;
  provider: string;
}

export type LocationMetadataMap = Map<string, LocationMetadata>;

export function extractMetadataFields(location: OpenAqLocation): LocationMetadata {
  return {
    locationId: String(location.id),
    locationName: location.name ?? '',
    country: location.country?.name ?? '',
    provider: location.provider?.name ?? ''
  };
}

/**
 * One locations request per city. The map keeps response order and is keyed by the
 * location id as text, which is how ids appear in archive rows.
 */
export async function fetchLocationMetadata(
  client: Pick<OpenAqClient, 'listLocations'>,
  city: string,
  bbox: BoundingBox,
  options: { limit?: number; logger: Logger }
): Promise<LocationMetadataMap> {
  const locations = await client.listLocations({ bbox, limit: options.limit });
  const metadata: LocationMetadataMap = new Map();
  for (const location of locations) {
    const record = extractMetadataFields(location);
    metadata.set(record.locationId, record);
  }
  options.logger.info({ city, locations: metadata.size }, 'Fetched location metadata');
  return metadata;
}
