export const SOURCES = ['AEMET', 'GRAFCAN'] as const;

export type Source = (typeof SOURCES)[number];

export type Metric =
  | 'temperature'
  | 'humidity'
  | 'wind_speed'
  | 'wind_direction'
  | 'wind_gust'
  | 'precipitation'
  | 'pressure'
  | 'sea_level_pressure'
  | 'dew_point'
  | 'visibility'
  | 'sunshine_duration'
  | 'solar_radiation'
  | 'forecast_temperature'
  | 'forecast_apparent_temperature'
  | 'forecast_humidity'
  | 'forecast_precipitation'
  | 'forecast_precipitation_probability'
  | 'forecast_snow'
  | 'forecast_wind_speed'
  | 'forecast_wind_direction'
  | 'forecast_wind_gust';

export type ObservationPoint = {
  source: Source;
  stationId: string;
  measuredAt: Date;
  metric: Metric;
  value: number;
  unit: string;
};

export type ProviderCredential = {
  readonly source: Source;
  readonly token: string;
};

export type CollectorPhase = 'IDLE' | 'FETCHING' | 'NORMALIZING' | 'WRITING' | 'SLEEPING' | 'BACKOFF';

export type CollectorState = {
  source: Source;
  phase: CollectorPhase;
  lastPollAt: Date | null;
  lastSuccessAt: Date | null;
  consecutiveFailures: number;
};

export type NormalizeResult = {
  points: ObservationPoint[];
  skipped: number;
};

export type RejectedPoint = {
  point: ObservationPoint;
  reason: string;
};

export type WriteResult = {
  accepted: number;
  rejected: RejectedPoint[];
};

/** Outcome of one Collector Loop cycle, kept in the store for health dashboards. */
export type CycleStatus = {
  source: Source;
  at: Date;
  success: boolean;
  accepted: number;
  rejected: number;
  skipped: number;
  consecutiveFailures: number;
};

/** Everything a Collector Loop needs to know about one provider. */
export interface Provider<TRaw> {
  readonly source: Source;
  fetch(): Promise<TRaw>;
  normalize(raw: TRaw): NormalizeResult;
}

export interface PointWriter {
  write(batch: ObservationPoint[]): Promise<WriteResult>;
  recordCycle(status: CycleStatus): Promise<void>;
  close(): Promise<void>;
}

export type BackoffConfig = {
  baseDelaySeconds: number;
  maxDelaySeconds: number;
};

export type SourceConfig = {
  enabled: boolean;
  baseUrl: string;
  tokenEnv: string;
  requestTimeoutMs: number;
  pollIntervalSeconds: number;
  backoff: BackoffConfig;
};

export type AemetForecastConfig = {
  enabled: boolean;
  intervalHours: number;
  /** INE municipality codes (CPRO + CMUN); empty means discover the Canary ones. */
  municipalities: string[];
  municipalityRefreshHours: number;
};

export type ClimaCanConfig = {
  project: {
    name: string;
  };
  store: {
    hostEnv: string;
    portEnv: string;
    usernameEnv: string;
    passwordEnv: string;
    defaultHost: string;
    defaultPort: number;
    database: string;
    retentionPolicy: string;
    timeoutMs: number;
    batchSize: number;
  };
  supervisor: {
    livenessIntervalSeconds: number;
  };
  sources: {
    aemet: SourceConfig & {
      canaryOnly: boolean;
      forecast: AemetForecastConfig;
    };
    grafcan: SourceConfig & {
      things: number[];
      stationRefreshHours: number;
    };
  };
};

export type SourceKey = keyof ClimaCanConfig['sources'];

export const SOURCE_KEYS: Record<Source, SourceKey> = {
  AEMET: 'aemet',
  GRAFCAN: 'grafcan'
};
