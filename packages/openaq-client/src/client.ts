import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { UpstreamRequestError } from './errors';
import {
  locationsResponseSchema,
  type BoundingBox,
  type ListLocationsInput,
  type OpenAqClientOptions,
  type OpenAqLocation
} from './types';

export const DEFAULT_OPENAQ_BASE_URL = 'https://api.openaq.org';
export const DEFAULT_LOCATIONS_LIMIT = 1000;

export function formatBoundingBox(bbox: BoundingBox): string {
  return bbox.map((coordinate) => String(coordinate)).join(',');
}

export class OpenAqClient {
  private readonly baseUrl: URL;
  private readonly apiKey: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: OpenAqClientOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAqClient requires an apiKey');
    }
    this.baseUrl = new URL(options.baseUrl ?? DEFAULT_OPENAQ_BASE_URL);
    this.apiKey = options.apiKey;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  /**
   * Lists the monitoring locations inside a bounding box. One request, no paging:
   * anything past `limit` is not returned.
   */
  async listLocations(input: ListLocationsInput): Promise<OpenAqLocation[]> {
    const url = this.buildUrl('/v3/locations', {
      bbox: formatBoundingBox(input.bbox),
      limit: input.limit ?? DEFAULT_LOCATIONS_LIMIT
    });

    const response = await this.fetchRaw(url, { method: 'GET' });
    if (!response.ok) {
      await this.handleErrorResponse('GET', url, response);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamRequestError({
        method: 'GET',
        url: url.toString(),
        status: response.status,
        message: `OpenAQ locations response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      });
    }

    const parsed = locationsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const [firstIssue] = parsed.error.issues;
      throw new UpstreamRequestError({
        method: 'GET',
        url: url.toString(),
        status: response.status,
        message: `OpenAQ locations response has an unexpected shape: ${firstIssue?.path.join('.') ?? '<root>'} ${firstIssue?.message ?? ''}`.trim()
      });
    }
    return parsed.data.results;
  }

  private buildUrl(path: string, query?: Record<string, string | number | undefined>): URL {
    const url = new URL(path.replace(/^\/+/, ''), this.baseUrl.toString().replace(/\/?$/, '/'));
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async fetchRaw(input: URL, init: RequestInit): Promise<Response> {
    const headers = new Headers();
    headers.set('Accept', 'application/json');
    headers.set('X-API-Key', this.apiKey);

    if (!this.fetchTimeoutMs) {
      return fetch(input, { ...init, headers });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.fetchTimeoutMs);
    try {
      return await fetch(input, { ...init, headers, signal: controller.signal });
    } catch (error) {
      if (!controller.signal.aborted) {
        throw error;
      }
      const method = init.method ?? 'GET';
      throw new UpstreamRequestError({
        method,
        url: input.toString(),
        status: 0,
        message: `Request to ${method} ${input.toString()} timed out after ${this.fetchTimeoutMs}ms`
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async handleErrorResponse(method: string, url: URL, response: Response): Promise<never> {
    const body = await response.text().catch(() => undefined);
    throw new UpstreamRequestError({
      method,
      url: url.toString(),
      status: response.status,
      body
    });
  }
}
