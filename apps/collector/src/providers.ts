import { FetchError, describeError, isFatalError } from './errors.js';
import type { Logger } from './logger.js';
import { normalizeAemet, normalizeGrafcan } from './normalize.js';
import { createAemetClient, createGrafcanClient } from './sources.js';
import type { AemetClient, AemetForecastBlock, AemetPayload, GrafcanClient, GrafcanPayload, GrafcanStationPayload } from './sources.js';
import type { ClimaCanConfig, ProviderCredential, Provider, Source } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Caches a discovered id list for `refreshMs`. An empty list is an error and
 * is never cached. When a later rediscovery fails for a non-fatal reason the
 * previous list is reused and discovery is retried on the next call.
 */
export function cachedDiscovery<T>(options: {
  source: Source;
  label: string;
  refreshMs: number;
  now: () => Date;
  logger: Logger;
  discover: () => Promise<T[]>;
}): () => Promise<T[]> {
  const { source, label, refreshMs, now, logger, discover } = options;
  let cached: { ids: T[]; at: number } | null = null;

  return async () => {
    const at = now().getTime();
    if (cached && at - cached.at < refreshMs) return cached.ids;

    try {
      const ids = await discover();
      if (ids.length === 0) throw new FetchError('parse', source, `${label} discovery returned nothing`);
      logger.info(`Discovered ${ids.length} ${label}`);
      cached = { ids, at };
      return ids;
    } catch (error) {
      if (!cached || isFatalError(error)) throw error;
      logger.warn(`${label} discovery failed; reusing ${cached.ids.length} known ids`, error);
      return cached.ids;
    }
  };
}

/**
 * Observations every cycle; the hourly municipal forecast only once every
 * `forecast.intervalHours`. A forecast failure never fails the cycle (except
 * on auth), it is retried on the next one.
 */
export function createAemetProvider(options: {
  config: ClimaCanConfig['sources']['aemet'];
  credential: ProviderCredential;
  logger: Logger;
  client?: AemetClient;
  now?: () => Date;
}): Provider<AemetPayload> {
  const { config, credential, logger } = options;
  const client = options.client ?? createAemetClient(config);
  const now = options.now ?? (() => new Date());
  const forecastIntervalMs = config.forecast.intervalHours * HOUR_MS;
  let lastForecastAt: number | null = null;

  const resolveMunicipalities =
    config.forecast.municipalities.length > 0
      ? async () => config.forecast.municipalities
      : cachedDiscovery({
          source: 'AEMET',
          label: 'Canary municipalities',
          refreshMs: config.forecast.municipalityRefreshHours * HOUR_MS,
          now,
          logger,
          discover: () => client.fetchMunicipalities(credential)
        });

  async function fetchForecasts(): Promise<AemetForecastBlock[]> {
    if (!config.forecast.enabled) return [];
    const at = now().getTime();
    if (lastForecastAt !== null && at - lastForecastAt < forecastIntervalMs) return [];

    let municipalities: string[];
    try {
      municipalities = await resolveMunicipalities();
    } catch (error) {
      if (isFatalError(error)) throw error;
      logger.warn('Skipping the forecast this cycle', error);
      return [];
    }

    const blocks: AemetForecastBlock[] = [];
    for (const municipality of municipalities) {
      try {
        blocks.push({ municipality, document: await client.fetchForecast(credential, municipality) });
      } catch (error) {
        if (isFatalError(error)) throw error;
        logger.warn(`Forecast for municipality ${municipality} unavailable: ${describeError(error)}`);
      }
    }

    if (blocks.length > 0) lastForecastAt = at;
    else logger.warn('No municipality forecast could be fetched; retrying next cycle');
    return blocks;
  }

  return {
    source: 'AEMET',
    async fetch() {
      const stations = await client.fetch(credential);
      const forecasts = await fetchForecasts();
      return { stations, forecasts };
    },
    normalize: (raw) => normalizeAemet(raw, { canaryOnly: config.canaryOnly })
  };
}

/**
 * Grafcan serves one station per request. A cycle fails only when every
 * station failed, or on an auth error.
 */
export function createGrafcanProvider(options: {
  config: ClimaCanConfig['sources']['grafcan'];
  credential: ProviderCredential;
  logger: Logger;
  client?: GrafcanClient;
  now?: () => Date;
}): Provider<GrafcanPayload> {
  const { config, credential, logger } = options;
  const client = options.client ?? createGrafcanClient(config);

  const resolveThings =
    config.things.length > 0
      ? async () => config.things
      : cachedDiscovery({
          source: 'GRAFCAN',
          label: 'Grafcan stations',
          refreshMs: config.stationRefreshHours * HOUR_MS,
          now: options.now ?? (() => new Date()),
          logger,
          discover: () => client.fetchStationIds(credential)
        });

  return {
    source: 'GRAFCAN',
    async fetch() {
      const things = await resolveThings();
      const stations: GrafcanStationPayload[] = [];
      let firstError: unknown = null;

      for (const thing of things) {
        try {
          stations.push(await client.fetch(credential, { thing }));
        } catch (error) {
          if (error instanceof FetchError && error.kind === 'auth') throw error;
          firstError ??= error;
          logger.warn(`Station ${thing} unavailable: ${describeError(error)}`);
        }
      }

      if (stations.length === 0 && firstError !== null) throw firstError;
      return { stations };
    },
    normalize: normalizeGrafcan
  };
}
