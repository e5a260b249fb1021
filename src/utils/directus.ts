import { createDirectus, readItems, rest, staticToken } from '@directus/sdk';
import { isRecord, type AnyRecord } from './values.js';

export interface DirectusSettings {
  url?: string;
  token?: string;
}

function createClient(url: string, token: string) {
  return createDirectus(url).with(staticToken(token)).with(rest());
}

type DirectusClient = ReturnType<typeof createClient>;

let client: DirectusClient | undefined;

/** The client is created on first use so that file-backed imports need no credentials. */
export function getDirectus(settings: DirectusSettings = {}): DirectusClient {
  if (client) return client;
  const url = settings.url ?? process.env.DIRECTUS_URL;
  const token = settings.token ?? process.env.DIRECTUS_TOKEN;
  if (!url || !token) {
    throw new Error('DIRECTUS_URL and DIRECTUS_TOKEN must be configured to read the catalog from Directus.');
  }
  client = createClient(url, token);
  return client;
}

function toRows(collection: string, result: unknown): AnyRecord[] {
  if (typeof Response !== 'undefined' && result instanceof Response) {
    throw new Error(
      `Directus query for collection ${collection} failed with status ${result.status} ${result.statusText}`
    );
  }

  if (result === null || result === undefined) {
    return [];
  }

  if (Array.isArray(result)) {
    return result.filter(isRecord);
  }

  if (isRecord(result)) {
    if ('data' in result) {
      const { data } = result;
      if (Array.isArray(data)) return data.filter(isRecord);
      if (data === null || data === undefined) return [];
      if (isRecord(data)) return [data];
      throw new Error(`Directus query for collection ${collection} returned unexpected data shape.`);
    }
    return [result];
  }

  throw new Error(
    `Directus query for collection ${collection} returned unexpected response type: ${typeof result}.`
  );
}

export async function readByQuery(
  collection: string,
  query: Record<string, unknown>,
  settings?: DirectusSettings
): Promise<AnyRecord[]> {
  const result: unknown = await getDirectus(settings).request(
    readItems(collection as any, query as any)
  );
  return toRows(collection, result);
}
