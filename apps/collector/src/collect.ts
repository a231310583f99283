import { CollectorLoop } from './collector-loop.js';
import { getDefaultConfigPath, loadCredential, loadValidatedConfig, resolveStoreConnection } from './config.js';
import type { Env } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createAemetProvider, createGrafcanProvider } from './providers.js';
import type { AemetClient, GrafcanClient } from './sources.js';
import { exitCodeFor, startAll, waitForAll, watchLiveness } from './supervisor.js';
import type { WorkerHandle, WorkerSpec } from './supervisor.js';
import { SOURCE_KEYS, SOURCES } from './types.js';
import type { ClimaCanConfig, CollectorState, PointWriter, Provider, Source } from './types.js';
import { InfluxWriter, createInfluxClient } from './writer.js';

export type WorkerDeps = {
  config: ClimaCanConfig;
  env: Env;
  logger: Logger;
  createWriter: (source: Source) => PointWriter;
  sleep?: (ms: number) => Promise<void>;
  clients?: {
    aemet?: AemetClient;
    grafcan?: GrafcanClient;
  };
};

/**
 * One spec per enabled source. Credentials and writers are acquired when the
 * worker starts, so a missing token only stops that worker.
 */
export function buildWorkerSpecs(deps: WorkerDeps): { specs: WorkerSpec[]; release: () => Promise<void> } {
  const { config, env, logger } = deps;
  const writers: PointWriter[] = [];

  const specFor = (source: Source): WorkerSpec => {
    const sourceConfig = config.sources[SOURCE_KEYS[source]];
    const workerLogger = logger.child(source.toLowerCase());
    let snapshot: (() => CollectorState) | null = null;

    const runLoop = async <TRaw>(provider: Provider<TRaw>): Promise<never> => {
      const writer = deps.createWriter(source);
      writers.push(writer);
      const loop = new CollectorLoop(provider, writer, {
        pollIntervalMs: sourceConfig.pollIntervalSeconds * 1000,
        backoff: {
          baseDelayMs: sourceConfig.backoff.baseDelaySeconds * 1000,
          maxDelayMs: sourceConfig.backoff.maxDelaySeconds * 1000
        },
        logger: workerLogger,
        sleep: deps.sleep
      });
      snapshot = () => loop.snapshot();
      return loop.run();
    };

    return {
      source,
      state: () => snapshot?.() ?? null,
      run: async () => {
        const credential = loadCredential(config, source, env);
        if (source === 'AEMET') {
          return runLoop(
            createAemetProvider({ config: config.sources.aemet, credential, logger: workerLogger, client: deps.clients?.aemet })
          );
        }
        return runLoop(
          createGrafcanProvider({ config: config.sources.grafcan, credential, logger: workerLogger, client: deps.clients?.grafcan })
        );
      }
    };
  };

  const specs = SOURCES.filter((source) => config.sources[SOURCE_KEYS[source]].enabled).map(specFor);

  const release = async () => {
    const pending = writers.splice(0);
    const results = await Promise.allSettled(pending.map((writer) => writer.close()));
    for (const result of results) {
      if (result.status === 'rejected') logger.warn('Failed to close writer', result.reason);
    }
  };

  return { specs, release };
}

export type StartOptions = {
  configPath?: string;
  env?: Env;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type CollectorRuntime = {
  config: ClimaCanConfig;
  handles: WorkerHandle[];
  /** Resolves with the process exit code once every worker has ended. */
  finished: Promise<number>;
  shutdown(): Promise<void>;
};

export async function startCollectors(options: StartOptions = {}): Promise<CollectorRuntime> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger('climacan');
  const config = await loadValidatedConfig(options.configPath ?? getDefaultConfigPath(env));
  const connection = resolveStoreConnection(config.store, env);
  const influx = createInfluxClient(connection, logger.child('influx'));
  logger.info(`${config.project.name}: writing to ${connection.url}, bucket ${connection.bucket}`);

  const { specs, release } = buildWorkerSpecs({
    config,
    env,
    logger,
    sleep: options.sleep,
    createWriter: (source) =>
      new InfluxWriter(influx, {
        bucket: connection.bucket,
        batchSize: config.store.batchSize,
        logger: logger.child(`${source.toLowerCase()}:writer`)
      })
  });

  const supervisorLogger = logger.child('supervisor');
  const handles = startAll(specs, supervisorLogger);
  const stopWatching = watchLiveness(handles, config.supervisor.livenessIntervalSeconds * 1000, supervisorLogger);

  const finished = waitForAll(handles).then(async (exits) => {
    stopWatching();
    await release();
    return exitCodeFor(exits);
  });

  return {
    config,
    handles,
    finished,
    shutdown: async () => {
      stopWatching();
      await release();
    }
  };
}
