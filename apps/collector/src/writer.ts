import { InfluxDB, Point, setLogger } from '@influxdata/influxdb-client';
import type { WriteApi } from '@influxdata/influxdb-client';

import type { StoreConnection } from './config.js';
import { WriteError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { CycleStatus, ObservationPoint, PointWriter, RejectedPoint, WriteResult } from './types.js';

export const CYCLE_MEASUREMENT = 'collector_cycle';

export const SUPERSEDED_REASON = 'superseded by a later point with the same series and timestamp';

export function createInfluxClient(connection: StoreConnection, logger: Logger): InfluxDB {
  setLogger({
    error: (message, error) => logger.error(message, error),
    warn: (message, error) => logger.warn(message, error)
  });
  return new InfluxDB({
    url: connection.url,
    token: connection.token || undefined,
    timeout: connection.timeoutMs
  });
}

function invalidReason(point: ObservationPoint): string | null {
  if (point.stationId.trim() === '') return 'missing station id';
  if (!Number.isFinite(point.value)) return 'value is not a finite number';
  if (Number.isNaN(point.measuredAt.getTime())) return 'invalid timestamp';
  return null;
}

function seriesKey(point: ObservationPoint): string {
  return [point.metric, point.source, point.stationId, point.unit, point.measuredAt.getTime()].join('\u0000');
}

/**
 * Drops points the store would refuse and, within one batch, every point
 * overwritten by a later one with the same series key and timestamp.
 */
export function screenBatch(batch: ObservationPoint[]): { valid: ObservationPoint[]; rejected: RejectedPoint[] } {
  const rejected: RejectedPoint[] = [];
  const latest = new Map<string, ObservationPoint>();

  for (const point of batch) {
    const reason = invalidReason(point);
    if (reason) {
      rejected.push({ point, reason });
      continue;
    }
    const key = seriesKey(point);
    const previous = latest.get(key);
    if (previous) rejected.push({ point: previous, reason: SUPERSEDED_REASON });
    latest.set(key, point);
  }

  const valid = batch.filter((point) => latest.get(seriesKey(point)) === point);
  return { valid, rejected };
}

export function toInfluxPoint(point: ObservationPoint): Point {
  return new Point(point.metric)
    .tag('source', point.source)
    .tag('station_id', point.stationId)
    .tag('unit', point.unit)
    .floatField('value', point.value)
    .timestamp(point.measuredAt);
}

export function toCyclePoint(status: CycleStatus): Point {
  return new Point(CYCLE_MEASUREMENT)
    .tag('source', status.source)
    .intField('success', status.success ? 1 : 0)
    .intField('accepted', status.accepted)
    .intField('rejected', status.rejected)
    .intField('skipped', status.skipped)
    .intField('consecutive_failures', status.consecutiveFailures)
    .timestamp(status.at);
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

export type InfluxWriterOptions = {
  bucket: string;
  batchSize: number;
  logger: Logger;
};

/** One per Collector Loop; owns its WriteApi until close(). */
export class InfluxWriter implements PointWriter {
  private readonly writeApi: WriteApi;
  private readonly bucket: string;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private closed = false;

  constructor(client: InfluxDB, options: InfluxWriterOptions) {
    this.bucket = options.bucket;
    this.batchSize = options.batchSize;
    this.logger = options.logger;
    // Flushing is driven by write(); the buffer never fills on its own.
    this.writeApi = client.getWriteApi('', options.bucket, 'ms', {
      batchSize: options.batchSize + 1,
      flushInterval: 0,
      maxRetries: 0
    });
  }

  async write(batch: ObservationPoint[]): Promise<WriteResult> {
    if (this.closed) throw new WriteError(`Writer for ${this.bucket} is closed`, batch.map((point) => ({ point, reason: 'writer closed' })));

    const { valid, rejected } = screenBatch(batch);
    let accepted = 0;
    let storeError: unknown = null;

    for (const points of chunk(valid, this.batchSize)) {
      this.writeApi.writePoints(points.map(toInfluxPoint));
      try {
        await this.writeApi.flush();
        accepted += points.length;
      } catch (error) {
        storeError ??= error;
        const reason = `store rejected the write: ${describeError(error)}`;
        for (const point of points) rejected.push({ point, reason });
      }
    }

    if (storeError !== null && accepted === 0) {
      throw new WriteError(`Write to ${this.bucket} failed: ${describeError(storeError)}`, rejected, { cause: storeError });
    }
    if (storeError !== null) {
      this.logger.warn(`Partial write to ${this.bucket}: ${accepted} accepted`, storeError);
    }
    return { accepted, rejected };
  }

  async recordCycle(status: CycleStatus): Promise<void> {
    if (this.closed) throw new WriteError(`Writer for ${this.bucket} is closed`, []);
    this.writeApi.writePoint(toCyclePoint(status));
    await this.writeApi.flush();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writeApi.close();
  }
}
