import { Ajv } from 'ajv';
import type { JSONSchemaType } from 'ajv';

import {
  AEMET_FORECAST_METRICS,
  AEMET_FORECAST_WIND,
  AEMET_METRICS,
  GRAFCAN_METRICS,
  WIND_DIRECTION_DEGREES,
  mapFields
} from './mappings.js';
import type { MetricMapping } from './mappings.js';
import { isRecord } from './sources.js';
import type { AemetForecastBlock, AemetPayload, GrafcanPayload } from './sources.js';
import type { NormalizeResult, ObservationPoint, Source } from './types.js';

type AemetStation = {
  idema: string;
  fint: string;
  lat?: number;
  lon?: number;
  ubi?: string;
};

type GrafcanObservation = {
  name: string;
  value: number;
  resultTime: string;
  unitOfMeasurement?: string;
};

const aemetStationSchema: JSONSchemaType<AemetStation> = {
  type: 'object',
  properties: {
    idema: { type: 'string', minLength: 1 },
    fint: { type: 'string', minLength: 1 },
    lat: { type: 'number', nullable: true },
    lon: { type: 'number', nullable: true },
    ubi: { type: 'string', nullable: true }
  },
  required: ['idema', 'fint'],
  additionalProperties: true
};

const grafcanObservationSchema: JSONSchemaType<GrafcanObservation> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    value: { type: 'number' },
    resultTime: { type: 'string', minLength: 1 },
    unitOfMeasurement: { type: 'string', nullable: true }
  },
  required: ['name', 'value', 'resultTime'],
  additionalProperties: true
};

type ForecastValue = {
  periodo: string;
  value?: string;
};

type ForecastWind = {
  periodo: string;
  direccion?: string[];
  velocidad?: string[];
  value?: string;
};

const forecastValueSchema: JSONSchemaType<ForecastValue> = {
  type: 'object',
  properties: {
    periodo: { type: 'string', minLength: 2 },
    value: { type: 'string', nullable: true }
  },
  required: ['periodo'],
  additionalProperties: true
};

const forecastWindSchema: JSONSchemaType<ForecastWind> = {
  type: 'object',
  properties: {
    periodo: { type: 'string', minLength: 2 },
    direccion: { type: 'array', items: { type: 'string' }, nullable: true },
    velocidad: { type: 'array', items: { type: 'string' }, nullable: true },
    value: { type: 'string', nullable: true }
  },
  required: ['periodo'],
  additionalProperties: true
};

const ajv = new Ajv({ allErrors: false });
const isAemetStation = ajv.compile(aemetStationSchema);
const isGrafcanObservation = ajv.compile(grafcanObservationSchema);
const isForecastValue = ajv.compile(forecastValueSchema);
const isForecastWind = ajv.compile(forecastWindSchema);

// Rough bounding box around the archipelago
const CANARY_LATITUDE = { min: 27, max: 29 };
const CANARY_LONGITUDE = { min: -19, max: -13 };

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Timestamps without a zone designator are UTC. */
export function parseUtcTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  if (!ISO_PREFIX.test(trimmed)) return null;
  const millis = Date.parse(ZONE_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`);
  return Number.isNaN(millis) ? null : new Date(millis);
}

export function cleanFieldName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function isCanaryStation(station: Pick<AemetStation, 'idema' | 'lat' | 'lon'>): boolean {
  if (station.idema.startsWith('C')) return true;
  const { lat, lon } = station;
  return (
    typeof lat === 'number' &&
    typeof lon === 'number' &&
    lat >= CANARY_LATITUDE.min &&
    lat <= CANARY_LATITUDE.max &&
    lon >= CANARY_LONGITUDE.min &&
    lon <= CANARY_LONGITUDE.max
  );
}

function toPoint(
  source: Source,
  stationId: string,
  measuredAt: Date,
  reading: MetricMapping & { value: number }
): ObservationPoint {
  return {
    source,
    stationId,
    measuredAt,
    metric: reading.metric,
    value: reading.value,
    unit: reading.unit
  };
}

export function normalizeAemet(payload: AemetPayload, options: { canaryOnly: boolean } = { canaryOnly: true }): NormalizeResult {
  const observations = normalizeAemetObservations(payload.stations, options);
  const forecasts = normalizeAemetForecasts(payload.forecasts);
  return {
    points: [...observations.points, ...forecasts.points],
    skipped: observations.skipped + forecasts.skipped
  };
}

export function normalizeAemetObservations(stations: unknown[], options: { canaryOnly: boolean }): NormalizeResult {
  const points: ObservationPoint[] = [];
  let skipped = 0;

  for (const entry of stations) {
    if (!isRecord(entry) || !isAemetStation(entry)) {
      skipped += 1;
      continue;
    }
    if (options.canaryOnly && !isCanaryStation(entry)) continue;

    const measuredAt = parseUtcTimestamp(entry.fint);
    const mapped = mapFields(entry, AEMET_METRICS);
    if (!measuredAt || mapped.missingRequired.length > 0) {
      skipped += 1;
      continue;
    }

    skipped += mapped.invalid;
    for (const reading of mapped.readings) {
      points.push(toPoint('AEMET', entry.idema, measuredAt, reading));
    }
  }

  return { points, skipped };
}

/** `periodo` is the hour of day ("14") or an hour range ("0814", starting at 08). */
export function forecastPeriodStart(day: Date, periodo: string): Date | null {
  const match = /^(\d{2})(\d{2})?$/.exec(periodo);
  const hour = match?.[1] === undefined ? Number.NaN : Number(match[1]);
  if (!Number.isInteger(hour) || hour > 23) return null;
  return new Date(day.getTime() + hour * 60 * 60 * 1000);
}

/** `undefined` for an empty slot, `null` for text that is not a number (e.g. "Ip"). */
function parseForecastNumber(text: string | undefined): number | null | undefined {
  if (text === undefined || text.trim() === '') return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function forecastDays(document: unknown): unknown[] | null {
  const first: unknown = Array.isArray(document) ? document[0] : undefined;
  if (!isRecord(first) || !isRecord(first.prediccion) || !Array.isArray(first.prediccion.dia)) return null;
  return first.prediccion.dia;
}

function windReadings(entry: ForecastWind): { readings: Array<MetricMapping & { value: number }>; invalid: number } {
  const readings: Array<MetricMapping & { value: number }> = [];
  let invalid = 0;
  const add = (mapping: MetricMapping, value: number | null | undefined) => {
    if (value === null) invalid += 1;
    else if (value !== undefined) readings.push({ ...mapping, value });
  };

  add(AEMET_FORECAST_WIND.speed, parseForecastNumber(entry.velocidad?.[0]));
  const direction = entry.direccion?.[0];
  if (direction !== undefined && Object.hasOwn(WIND_DIRECTION_DEGREES, direction)) {
    add(AEMET_FORECAST_WIND.direction, WIND_DIRECTION_DEGREES[direction]);
  }
  add(AEMET_FORECAST_WIND.gust, parseForecastNumber(entry.value));
  return { readings, invalid };
}

/**
 * One point per forecast hour and series, keyed by municipality code. A block
 * without forecast days, a day without a parseable `fecha` and every
 * malformed or non-numeric slot count as skipped; empty slots do not.
 */
export function normalizeAemetForecasts(blocks: AemetForecastBlock[]): NormalizeResult {
  const points: ObservationPoint[] = [];
  let skipped = 0;

  for (const block of blocks) {
    const days = forecastDays(block.document);
    if (!days) {
      skipped += 1;
      continue;
    }

    for (const day of days) {
      const date = isRecord(day) && typeof day.fecha === 'string' ? parseUtcTimestamp(day.fecha) : null;
      if (!isRecord(day) || !date) {
        skipped += 1;
        continue;
      }

      for (const [key, mapping] of Object.entries(AEMET_FORECAST_METRICS)) {
        const slots = day[key];
        if (!Array.isArray(slots)) continue;
        for (const slot of slots) {
          if (!isForecastValue(slot)) {
            skipped += 1;
            continue;
          }
          const value = parseForecastNumber(slot.value);
          if (value === undefined) continue;
          const at = forecastPeriodStart(date, slot.periodo);
          if (!at || value === null) {
            skipped += 1;
            continue;
          }
          points.push(toPoint('AEMET', block.municipality, at, { ...mapping, value }));
        }
      }

      const wind = day.vientoAndRachaMax;
      if (!Array.isArray(wind)) continue;
      for (const slot of wind) {
        const at = isForecastWind(slot) ? forecastPeriodStart(date, slot.periodo) : null;
        if (!at || !isForecastWind(slot)) {
          skipped += 1;
          continue;
        }
        const { readings, invalid } = windReadings(slot);
        skipped += invalid;
        for (const reading of readings) points.push(toPoint('AEMET', block.municipality, at, reading));
      }
    }
  }

  return { points, skipped };
}

export function normalizeGrafcan(payload: GrafcanPayload): NormalizeResult {
  const points: ObservationPoint[] = [];
  let skipped = 0;

  for (const station of payload.stations) {
    const values: Record<string, unknown> = {};
    const times = new Map<string, Date>();
    let invalid = 0;

    for (const observation of station.observations) {
      if (!isGrafcanObservation(observation)) {
        invalid += 1;
        continue;
      }
      const measuredAt = parseUtcTimestamp(observation.resultTime);
      if (!measuredAt) {
        invalid += 1;
        continue;
      }
      const field = cleanFieldName(observation.name);
      values[field] = observation.value;
      times.set(field, measuredAt);
    }

    const mapped = mapFields(values, GRAFCAN_METRICS);
    if (mapped.missingRequired.length > 0) {
      skipped += 1;
      continue;
    }

    skipped += invalid + mapped.invalid;
    const stationId = String(station.thing);
    for (const reading of mapped.readings) {
      const measuredAt = times.get(reading.field);
      if (measuredAt) points.push(toPoint('GRAFCAN', stationId, measuredAt, reading));
    }
  }

  return { points, skipped };
}
