import { z } from 'zod';

/** `[west, south, east, north]` in decimal degrees. */
export type BoundingBox = readonly [number, number, number, number];

const namedEntitySchema = z
  .object({
    name: z.string().nullable().optional()
  })
  .passthrough();

export const locationSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string().nullable().optional(),
    country: namedEntitySchema.nullable().optional(),
    provider: namedEntitySchema.nullable().optional()
  })
  .passthrough();

export const locationsResponseSchema = z
  .object({
    results: z.array(locationSchema).default([])
  })
  .passthrough();

export type OpenAqLocation = z.infer<typeof locationSchema>;

export interface ListLocationsInput {
  bbox: BoundingBox;
  limit?: number;
}

export interface OpenAqClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Aborts a request whose response headers have not arrived in time. */
  fetchTimeoutMs?: number;
}
