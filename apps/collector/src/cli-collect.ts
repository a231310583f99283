import 'dotenv/config';

import { startCollectors } from './collect.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { EXIT_CODES, signalExitCode } from './supervisor.js';
import type { StopSignal } from './supervisor.js';

async function main(): Promise<void> {
  const logger = createLogger('climacan');
  try {
    const runtime = await startCollectors({ logger });

    const stop = (signal: StopSignal) => {
      logger.info(`Received ${signal}; flushing writers`);
      void runtime.shutdown().then(
        () => process.exit(signalExitCode(signal)),
        (error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));

    const exitCode = await runtime.finished;
    logger.error(`All collector workers have stopped; exiting with code ${exitCode}`);
    process.exitCode = exitCode;
  } catch (error) {
    logger.error('Collector failed to start', error);
    process.exitCode = error instanceof ConfigError ? EXIT_CODES.config : 1;
  }
}

void main();
