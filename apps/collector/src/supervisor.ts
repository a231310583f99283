import { constants } from 'node:os';

import { ConfigError, FetchError } from './errors.js';
import type { Logger } from './logger.js';
import type { CollectorState, Source } from './types.js';

export type WorkerStatus = 'running' | 'exited' | 'crashed';

export type WorkerSpec = {
  source: Source;
  run: () => Promise<unknown>;
  state?: () => CollectorState | null;
};

export type WorkerExit =
  | { source: Source; status: 'exited' }
  | { source: Source; status: 'crashed'; error: unknown };

export type WorkerHandle = {
  readonly source: Source;
  readonly done: Promise<WorkerExit>;
  isAlive(): boolean;
  status(): WorkerStatus;
  state(): CollectorState | null;
};

export const EXIT_CODES = {
  crashed: 1,
  noPermission: 77,
  config: 78
} as const;

function startWorker(spec: WorkerSpec, logger: Logger): WorkerHandle {
  let status: WorkerStatus = 'running';

  // Deferred to a microtask so a synchronous throw in run() is caught too
  const done = Promise.resolve()
    .then(() => spec.run())
    .then(
      (): WorkerExit => {
        status = 'exited';
        logger.warn(`${spec.source} worker returned; it will not be restarted`);
        return { source: spec.source, status: 'exited' };
      },
      (error: unknown): WorkerExit => {
        status = 'crashed';
        logger.error(`${spec.source} worker stopped; it will not be restarted`, error);
        return { source: spec.source, status: 'crashed', error };
      }
    );

  logger.info(`${spec.source} worker started`);
  return {
    source: spec.source,
    done,
    isAlive: () => status === 'running',
    status: () => status,
    state: () => spec.state?.() ?? null
  };
}

/** Starts one independent worker per spec. Workers are never restarted. */
export function startAll(specs: WorkerSpec[], logger: Logger): WorkerHandle[] {
  const seen = new Set<Source>();
  for (const spec of specs) {
    if (seen.has(spec.source)) throw new ConfigError(`Only one worker per source is allowed (${spec.source})`);
    seen.add(spec.source);
  }
  return specs.map((spec) => startWorker(spec, logger));
}

/** Resolves once every worker has ended. */
export function waitForAll(handles: WorkerHandle[]): Promise<WorkerExit[]> {
  return Promise.all(handles.map((handle) => handle.done));
}

export function describeLiveness(handle: WorkerHandle): string {
  const state = handle.state();
  if (!state) return `${handle.source}: ${handle.status()}`;
  const lastSuccess = state.lastSuccessAt?.toISOString() ?? 'never';
  return `${handle.source}: ${handle.status()}, phase=${state.phase}, lastSuccess=${lastSuccess}, consecutiveFailures=${state.consecutiveFailures}`;
}

export function watchLiveness(handles: WorkerHandle[], intervalMs: number, logger: Logger): () => void {
  const timer = setInterval(() => {
    for (const handle of handles) {
      const line = describeLiveness(handle);
      if (handle.isAlive()) logger.info(line);
      else logger.warn(line);
    }
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}

export function exitCodeFor(exits: WorkerExit[]): number {
  const errors = exits.flatMap((exit) => (exit.status === 'crashed' ? [exit.error] : []));
  if (errors.some((error) => error instanceof ConfigError)) return EXIT_CODES.config;
  if (errors.some((error) => error instanceof FetchError && error.kind === 'auth')) return EXIT_CODES.noPermission;
  return EXIT_CODES.crashed;
}

export type StopSignal = 'SIGINT' | 'SIGTERM';

/** Conventional shell status for a process stopped by `signal` (130 for SIGINT, 143 for SIGTERM). */
export function signalExitCode(signal: StopSignal): number {
  return 128 + constants.signals[signal];
}
