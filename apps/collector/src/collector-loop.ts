import { setTimeout as delay } from 'node:timers/promises';

import { FetchError, describeError, isFatalError } from './errors.js';
import type { Logger } from './logger.js';
import type { CollectorPhase, CollectorState, CycleStatus, NormalizeResult, PointWriter, Provider, WriteResult } from './types.js';

export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type CollectorLoopOptions = {
  pollIntervalMs: number;
  backoff: BackoffPolicy;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type CycleOutcome =
  | { status: 'success'; delayMs: number; accepted: number; rejected: number; skipped: number }
  | { status: 'failure'; delayMs: number; phase: CollectorPhase; error: unknown };

/** `min(base * 2^exponent, max)`; non-decreasing in `exponent`. */
export function computeBackoffDelay(exponent: number, backoff: BackoffPolicy): number {
  return Math.min(backoff.baseDelayMs * 2 ** Math.max(0, exponent), backoff.maxDelayMs);
}

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}

export class CollectorLoop<TRaw> {
  private readonly state: CollectorState;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly provider: Provider<TRaw>,
    private readonly writer: PointWriter,
    private readonly options: CollectorLoopOptions
  ) {
    this.state = {
      source: provider.source,
      phase: 'IDLE',
      lastPollAt: null,
      lastSuccessAt: null,
      consecutiveFailures: 0
    };
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  snapshot(): CollectorState {
    return { ...this.state };
  }

  /**
   * One FETCHING -> NORMALIZING -> WRITING pass. Ends in SLEEPING or BACKOFF
   * and returns how long to wait before the next pass. Auth and config
   * errors are rethrown.
   */
  async runCycle(): Promise<CycleOutcome> {
    const { logger } = this.options;

    this.state.phase = 'FETCHING';
    this.state.lastPollAt = this.now();
    let raw: TRaw;
    try {
      raw = await this.provider.fetch();
    } catch (error) {
      return await this.fail(error);
    }

    this.state.phase = 'NORMALIZING';
    let normalized: NormalizeResult;
    try {
      normalized = this.provider.normalize(raw);
    } catch (error) {
      return await this.fail(error);
    }
    if (normalized.skipped > 0) {
      logger.warn(`Skipped ${normalized.skipped} malformed entries`);
    }

    this.state.phase = 'WRITING';
    let result: WriteResult;
    try {
      result = await this.writer.write(normalized.points);
    } catch (error) {
      return await this.fail(error);
    }
    for (const { point, reason } of result.rejected) {
      logger.warn(`Rejected ${point.metric} for station ${point.stationId} at ${point.measuredAt.toISOString()}: ${reason}`);
    }

    this.state.consecutiveFailures = 0;
    this.state.lastSuccessAt = this.now();
    this.state.phase = 'SLEEPING';
    await this.recordCycle({
      success: true,
      accepted: result.accepted,
      rejected: result.rejected.length,
      skipped: normalized.skipped
    });
    logger.info(
      `Wrote ${result.accepted} points (${result.rejected.length} rejected, ${normalized.skipped} skipped); next poll in ${Math.round(this.options.pollIntervalMs / 1000)}s`
    );

    return {
      status: 'success',
      delayMs: this.options.pollIntervalMs,
      accepted: result.accepted,
      rejected: result.rejected.length,
      skipped: normalized.skipped
    };
  }

  private async fail(error: unknown): Promise<CycleOutcome> {
    const phase = this.state.phase;
    if (isFatalError(error)) {
      this.options.logger.error(`Fatal error while ${phase.toLowerCase()}`, error);
      await this.recordCycle({ success: false, accepted: 0, rejected: 0, skipped: 0 });
      throw error;
    }

    this.state.consecutiveFailures += 1;
    this.state.phase = 'BACKOFF';
    await this.recordCycle({ success: false, accepted: 0, rejected: 0, skipped: 0 });
    // First failure waits the base delay
    const delayMs = computeBackoffDelay(this.state.consecutiveFailures - 1, this.options.backoff);
    const kind = error instanceof FetchError ? ` (${error.kind})` : '';
    this.options.logger.warn(
      `Failure #${this.state.consecutiveFailures} while ${phase.toLowerCase()}${kind}; retrying in ${Math.round(delayMs / 1000)}s: ${describeError(error)}`
    );
    return { status: 'failure', delayMs, phase, error };
  }

  /** A status write that fails is logged; it never changes the cycle outcome. */
  private async recordCycle(counts: Pick<CycleStatus, 'success' | 'accepted' | 'rejected' | 'skipped'>): Promise<void> {
    try {
      await this.writer.recordCycle({
        source: this.state.source,
        at: this.now(),
        consecutiveFailures: this.state.consecutiveFailures,
        ...counts
      });
    } catch (error) {
      this.options.logger.warn('Could not record the cycle status', error);
    }
  }

  /** Never resolves; ends only by throwing. */
  async run(): Promise<never> {
    this.options.logger.info('Collector loop started');
    for (;;) {
      const outcome = await this.runCycle();
      await this.sleep(outcome.delayMs);
    }
  }
}
