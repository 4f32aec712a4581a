import { fetch } from 'undici';
import { z } from 'zod';
import type { EnvSource } from '@airwise/shared';
import { UpstreamRequestError } from '@airwise/openaq-client';

export const BROKER_CREDENTIALS_PATH = '/gateway/aws-cab/cab/api/v1/credentials';

export interface StorageCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  region: string;
}

const brokerResponseSchema = z.object({
  Credentials: z.object({
    AccessKeyId: z.string().min(1),
    SecretAccessKey: z.string().min(1),
    SessionToken: z.string().min(1)
  })
});

function readEnv(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
}

async function exchangeBrokerToken(baseUrl: string, accessToken: string, region: string): Promise<StorageCredentials> {
  const url = new URL(BROKER_CREDENTIALS_PATH.replace(/^\//, ''), baseUrl.replace(/\/?$/, '/'));
  const response = await fetch(url, {
    method: 'GET',
    headers: {
      Authorization: `Bearer ${accessToken}`,
      'Cache-Control': 'no-cache',
      Accept: 'application/json'
    }
  });

  if (!response.ok) {
    const body = await response.text().catch(() => undefined);
    throw new UpstreamRequestError({ method: 'GET', url: url.toString(), status: response.status, body });
  }

  const parsed = brokerResponseSchema.safeParse(await response.json().catch(() => null));
  if (!parsed.success) {
    throw new UpstreamRequestError({
      method: 'GET',
      url: url.toString(),
      status: response.status,
      message: 'Credential broker response did not include temporary credentials'
    });
  }

  return {
    accessKeyId: parsed.data.Credentials.AccessKeyId,
    secretAccessKey: parsed.data.Credentials.SecretAccessKey,
    sessionToken: parsed.data.Credentials.SessionToken,
    region
  };
}

/**
 * Resolves credentials for the target bucket. A configured identity broker wins over
 * static `AWS_*` keys; `null` leaves the SDK's default provider chain in charge.
 */
export async function resolveStorageCredentials(env: EnvSource = process.env): Promise<StorageCredentials | null> {
  const region = readEnv(env, 'AWS_REGION') ?? readEnv(env, 'AWS_DEFAULT_REGION') ?? 'us-east-1';

  const brokerUrl = readEnv(env, 'IDBROKER_BASE_URL');
  const brokerToken = readEnv(env, 'IDBROKER_ACCESS_TOKEN');
  if (brokerUrl && brokerToken) {
    return exchangeBrokerToken(brokerUrl, brokerToken, region);
  }

  const accessKeyId = readEnv(env, 'AWS_ACCESS_KEY_ID');
  const secretAccessKey = readEnv(env, 'AWS_SECRET_ACCESS_KEY');
  if (!accessKeyId || !secretAccessKey) {
    return null;
  }
  return {
    accessKeyId,
    secretAccessKey,
    sessionToken: readEnv(env, 'AWS_SESSION_TOKEN'),
    region
  };
}
