import { createLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';
import type {
  ClimaCanConfig,
  CycleStatus,
  NormalizeResult,
  ObservationPoint,
  PointWriter,
  Provider,
  Source,
  WriteResult
} from '../src/types.js';

export function makeValidConfig(): ClimaCanConfig {
  return {
    project: {
      name: 'Test Project'
    },
    store: {
      hostEnv: 'INFLUXDB_HOST',
      portEnv: 'INFLUXDB_PORT',
      usernameEnv: 'INFLUXDB_USERNAME',
      passwordEnv: 'INFLUXDB_PASSWORD',
      defaultHost: 'influx.test',
      defaultPort: 8086,
      database: 'climacan',
      retentionPolicy: 'autogen',
      timeoutMs: 2000,
      batchSize: 100
    },
    supervisor: {
      livenessIntervalSeconds: 600
    },
    sources: {
      aemet: {
        enabled: true,
        baseUrl: 'https://aemet.test/opendata',
        tokenEnv: 'AEMET_TOKEN',
        requestTimeoutMs: 2000,
        pollIntervalSeconds: 3600,
        backoff: { baseDelaySeconds: 30, maxDelaySeconds: 600 },
        canaryOnly: true,
        forecast: { enabled: false, intervalHours: 6, municipalities: [], municipalityRefreshHours: 168 }
      },
      grafcan: {
        enabled: true,
        baseUrl: 'https://grafcan.test/api/v1.0',
        tokenEnv: 'GRAFCAN_TOKEN',
        requestTimeoutMs: 2000,
        pollIntervalSeconds: 600,
        backoff: { baseDelaySeconds: 10, maxDelaySeconds: 300 },
        things: [],
        stationRefreshHours: 24
      }
    }
  };
}

export const silentLogger: Logger = createLogger('test', 'silent');

export function makePoint(overrides: Partial<ObservationPoint> = {}): ObservationPoint {
  return {
    source: 'AEMET',
    stationId: 'C447A',
    measuredAt: new Date('2024-05-01T10:00:00.000Z'),
    metric: 'temperature',
    value: 18.4,
    unit: 'degC',
    ...overrides
  };
}

/** A provider whose fetch outcomes are scripted per call. */
export function scriptedProvider(
  source: Source,
  script: Array<'ok' | Error>,
  points: ObservationPoint[] = [makePoint({ source })]
): Provider<ObservationPoint[]> & { calls: number } {
  const provider = {
    source,
    calls: 0,
    async fetch(): Promise<ObservationPoint[]> {
      const step = script[provider.calls] ?? 'ok';
      provider.calls += 1;
      if (step instanceof Error) throw step;
      return points;
    },
    normalize(raw: ObservationPoint[]): NormalizeResult {
      return { points: raw, skipped: 0 };
    }
  };
  return provider;
}

export class MemoryWriter implements PointWriter {
  readonly batches: ObservationPoint[][] = [];
  readonly statuses: CycleStatus[] = [];
  closed = false;

  async write(batch: ObservationPoint[]): Promise<WriteResult> {
    this.batches.push(batch);
    return { accepted: batch.length, rejected: [] };
  }

  async recordCycle(status: CycleStatus): Promise<void> {
    this.statuses.push(status);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type ParsedLine = {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, number>;
  timestamp: number;
};

/** Enough line protocol for the tags, float and integer fields the writer emits. */
export function parseLine(line: string): ParsedLine {
  const [series = '', fieldSet = '', timestamp = ''] = line.split(' ');
  const [measurement = '', ...tagPairs] = series.split(',');
  const tags: Record<string, string> = {};
  for (const pair of tagPairs) {
    const [key = '', value = ''] = pair.split('=');
    tags[key] = value;
  }
  const fields: Record<string, number> = {};
  for (const pair of fieldSet.split(',')) {
    const [key = '', value = ''] = pair.split('=');
    fields[key] = Number(value.replace(/i$/, ''));
  }
  return { measurement, tags, fields, timestamp: Number(timestamp) };
}
