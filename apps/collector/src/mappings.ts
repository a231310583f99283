import type { Metric } from './types.js';

export type MetricMapping = {
  metric: Metric;
  unit: string;
  /** A station without this field is skipped whole. */
  required?: boolean;
};

/** Provider-native field name -> canonical metric. */
export type MappingTable = Readonly<Record<string, MetricMapping>>;

// Conventional observation fields (api/observacion/convencional)
export const AEMET_METRICS: MappingTable = {
  ta: { metric: 'temperature', unit: 'degC' },
  hr: { metric: 'humidity', unit: '%' },
  vv: { metric: 'wind_speed', unit: 'm/s' },
  dv: { metric: 'wind_direction', unit: 'deg' },
  vmax: { metric: 'wind_gust', unit: 'm/s' },
  prec: { metric: 'precipitation', unit: 'mm' },
  pres: { metric: 'pressure', unit: 'hPa' },
  pres_nmar: { metric: 'sea_level_pressure', unit: 'hPa' },
  tpr: { metric: 'dew_point', unit: 'degC' },
  vis: { metric: 'visibility', unit: 'km' },
  inso: { metric: 'sunshine_duration', unit: 'h' }
};

// Keys are observation names after cleanFieldName()
export const GRAFCAN_METRICS: MappingTable = {
  temperature: { metric: 'temperature', unit: 'degC', required: true },
  relative_humidity: { metric: 'humidity', unit: '%' },
  wind_speed: { metric: 'wind_speed', unit: 'm/s' },
  wind_direction: { metric: 'wind_direction', unit: 'deg' },
  wind_gust: { metric: 'wind_gust', unit: 'm/s' },
  precipitation: { metric: 'precipitation', unit: 'mm' },
  pressure: { metric: 'pressure', unit: 'hPa' },
  dew_point: { metric: 'dew_point', unit: 'degC' },
  solar_radiation: { metric: 'solar_radiation', unit: 'W/m2' }
};

export type MappedReading = MetricMapping & {
  field: string;
  value: number;
};

export type MappedFields = {
  readings: MappedReading[];
  invalid: number;
  missingRequired: string[];
};

/**
 * Walks the table in declaration order, so the output order only depends on
 * the table. Absent optional fields are ignored; present but non-numeric ones
 * are counted as invalid.
 */
export function mapFields(fields: Readonly<Record<string, unknown>>, table: MappingTable): MappedFields {
  const readings: MappedReading[] = [];
  const missingRequired: string[] = [];
  let invalid = 0;

  for (const [field, mapping] of Object.entries(table)) {
    const value = Object.hasOwn(fields, field) ? fields[field] : undefined;
    if (value === undefined || value === null) {
      if (mapping.required) missingRequired.push(field);
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      if (mapping.required) missingRequired.push(field);
      else invalid += 1;
      continue;
    }
    readings.push({ ...mapping, field, value });
  }

  return { readings, invalid, missingRequired };
}

// Hourly municipal forecast (api/prediccion/especifica/municipio/horaria); keys are the day's series
export const AEMET_FORECAST_METRICS: MappingTable = {
  temperatura: { metric: 'forecast_temperature', unit: 'degC' },
  sensTermica: { metric: 'forecast_apparent_temperature', unit: 'degC' },
  humedadRelativa: { metric: 'forecast_humidity', unit: '%' },
  precipitacion: { metric: 'forecast_precipitation', unit: 'mm' },
  probPrecipitacion: { metric: 'forecast_precipitation_probability', unit: '%' },
  nieve: { metric: 'forecast_snow', unit: 'mm' }
};

// `vientoAndRachaMax` mixes wind entries (direccion + velocidad) with gust entries (value)
export const AEMET_FORECAST_WIND = {
  speed: { metric: 'forecast_wind_speed', unit: 'km/h' },
  direction: { metric: 'forecast_wind_direction', unit: 'deg' },
  gust: { metric: 'forecast_wind_gust', unit: 'km/h' }
} satisfies Record<string, MetricMapping>;

// Spanish compass points; calm ("C") has no direction
export const WIND_DIRECTION_DEGREES: Readonly<Record<string, number>> = {
  N: 0,
  NE: 45,
  E: 90,
  SE: 135,
  S: 180,
  SO: 225,
  O: 270,
  NO: 315
};
