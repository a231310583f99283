import { FetchError, describeError } from './errors.js';
import type { ClimaCanConfig, ProviderCredential, Source } from './types.js';

export type AemetForecastBlock = {
  municipality: string;
  document: unknown;
};

export type AemetPayload = {
  stations: unknown[];
  forecasts: AemetForecastBlock[];
};

export type GrafcanStationPayload = {
  thing: number;
  observations: unknown[];
};

export type GrafcanPayload = {
  stations: GrafcanStationPayload[];
};

export type GrafcanQuery = {
  thing: number;
};

export interface ProviderClient<TQuery, TPayload> {
  fetch(credential: ProviderCredential, query: TQuery): Promise<TPayload>;
}

type JsonRequest = {
  source: Source;
  url: URL;
  headers: Record<string, string>;
  timeoutMs: number;
};

export function sanitizeUrlForLog(input: URL | string): string {
  const url = new URL(typeof input === 'string' ? input : input.toString());
  for (const key of ['api_key', 'apikey', 'key', 'token']) {
    if (url.searchParams.has(key)) {
      url.searchParams.set(key, 'REDACTED');
    }
  }
  return url.toString();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinUrl(baseUrl: string, pathname: string): URL {
  return new URL(`${baseUrl.replace(/\/+$/, '')}/${pathname.replace(/^\/+/, '')}`);
}

async function fetchJson(request: JsonRequest): Promise<unknown> {
  const { source, url, headers, timeoutMs } = request;
  const safeUrl = sanitizeUrlForLog(url);

  let response: Response;
  let body: string;
  try {
    response = await fetch(url, { headers, signal: AbortSignal.timeout(timeoutMs) });
    body = await response.text();
  } catch (error) {
    throw new FetchError('network', source, `Request to ${safeUrl} failed: ${describeError(error)}`, { cause: error });
  }

  if (response.status === 401 || response.status === 403) {
    throw new FetchError('auth', source, `HTTP ${response.status} for ${safeUrl}`, { status: response.status });
  }
  if (!response.ok) {
    throw new FetchError('http_status', source, `HTTP ${response.status} for ${safeUrl}`, { status: response.status });
  }

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new FetchError('parse', source, `Response from ${safeUrl} is not JSON`, { cause: error });
  }
}

export type AemetClient = ProviderClient<void, unknown[]> & {
  /** Hourly forecast document for one municipality (`datos` content, unparsed). */
  fetchForecast(credential: ProviderCredential, municipality: string): Promise<unknown>;
  /** Canary municipality codes (provinces 35 and 38), sorted. */
  fetchMunicipalities(credential: ProviderCredential): Promise<string[]>;
};

const CANARY_MUNICIPALITY = /^id(3[58]\d{3})$/;

/**
 * AEMET answers every data request with an envelope pointing at a second URL
 * (`datos`) that holds the actual records.
 */
export function createAemetClient(config: ClimaCanConfig['sources']['aemet']): AemetClient {
  async function fetchData(credential: ProviderCredential, pathname: string): Promise<unknown> {
    const headers = { accept: 'application/json', Authorization: `Bearer ${credential.token}` };
    const envelope = await fetchJson({
      source: 'AEMET',
      url: joinUrl(config.baseUrl, pathname),
      headers,
      timeoutMs: config.requestTimeoutMs
    });

    if (!isRecord(envelope) || typeof envelope.estado !== 'number') {
      throw new FetchError('parse', 'AEMET', 'AEMET envelope has no numeric "estado"');
    }
    const description = typeof envelope.descripcion === 'string' ? envelope.descripcion : 'no description';
    if (envelope.estado === 401) {
      throw new FetchError('auth', 'AEMET', `AEMET rejected the API key: ${description}`, { status: 401 });
    }
    if (envelope.estado !== 200) {
      throw new FetchError('http_status', 'AEMET', `AEMET estado ${envelope.estado}: ${description}`, {
        status: envelope.estado
      });
    }
    if (typeof envelope.datos !== 'string') {
      throw new FetchError('parse', 'AEMET', 'AEMET envelope has no "datos" URL');
    }

    let datosUrl: URL;
    try {
      datosUrl = new URL(envelope.datos);
    } catch (error) {
      throw new FetchError('parse', 'AEMET', 'AEMET "datos" is not a URL', { cause: error });
    }

    return fetchJson({ source: 'AEMET', url: datosUrl, headers, timeoutMs: config.requestTimeoutMs });
  }

  return {
    async fetch(credential) {
      const data = await fetchData(credential, '/api/observacion/convencional/todas');
      if (!Array.isArray(data)) {
        throw new FetchError('parse', 'AEMET', 'AEMET observation data is not an array');
      }
      return data;
    },

    fetchForecast(credential, municipality) {
      return fetchData(credential, `/api/prediccion/especifica/municipio/horaria/${encodeURIComponent(municipality)}`);
    },

    async fetchMunicipalities(credential) {
      const data = await fetchData(credential, '/api/maestro/municipios');
      if (!Array.isArray(data)) {
        throw new FetchError('parse', 'AEMET', 'AEMET municipality list is not an array');
      }
      const codes = new Set<string>();
      for (const entry of data) {
        const match = isRecord(entry) && typeof entry.id === 'string' ? CANARY_MUNICIPALITY.exec(entry.id) : null;
        if (match?.[1]) codes.add(match[1]);
      }
      return [...codes].sort();
    }
  };
}

function grafcanHeaders(credential: ProviderCredential): Record<string, string> {
  return { accept: 'application/json', Authorization: `Api-Key ${credential.token}` };
}

export type GrafcanClient = ProviderClient<GrafcanQuery, GrafcanStationPayload> & {
  fetchStationIds(credential: ProviderCredential): Promise<number[]>;
};

export function parseThingId(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  if (typeof value !== 'string') return null;
  const match = /things\/(\d+)\/?$/.exec(value) ?? /^(\d+)$/.exec(value);
  return match?.[1] ? Number(match[1]) : null;
}

export function createGrafcanClient(config: ClimaCanConfig['sources']['grafcan']): GrafcanClient {
  return {
    async fetch(credential, query) {
      const url = joinUrl(config.baseUrl, '/observations_last/');
      url.searchParams.set('thing', String(query.thing));
      const body = await fetchJson({
        source: 'GRAFCAN',
        url,
        headers: grafcanHeaders(credential),
        timeoutMs: config.requestTimeoutMs
      });

      if (!isRecord(body) || !Array.isArray(body.observations)) {
        throw new FetchError('parse', 'GRAFCAN', `Grafcan response for thing ${query.thing} has no "observations" list`);
      }
      return { thing: query.thing, observations: body.observations };
    },

    async fetchStationIds(credential) {
      const body = await fetchJson({
        source: 'GRAFCAN',
        url: joinUrl(config.baseUrl, '/historicallocations/'),
        headers: grafcanHeaders(credential),
        timeoutMs: config.requestTimeoutMs
      });

      if (!isRecord(body) || !Array.isArray(body.results)) {
        throw new FetchError('parse', 'GRAFCAN', 'Grafcan historical locations response has no "results" list');
      }
      const ids = new Set<number>();
      for (const result of body.results) {
        const id = isRecord(result) ? parseThingId(result.thing) : null;
        if (id !== null) ids.add(id);
      }
      return [...ids].sort((a, b) => a - b);
    }
  };
}
