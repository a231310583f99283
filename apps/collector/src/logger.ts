export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

function withError(message: string, error: unknown): string {
  if (error === undefined) return message;
  return `${message}: ${error instanceof Error ? error.message : String(error)}`;
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];
  const line = (name: Exclude<LogLevel, 'silent'>, message: string) =>
    `${new Date().toISOString()} ${name.toUpperCase()} [${scope}] ${message}`;

  return {
    debug(message) {
      if (threshold <= LEVEL_ORDER.debug) console.log(line('debug', message));
    },
    info(message) {
      if (threshold <= LEVEL_ORDER.info) console.log(line('info', message));
    },
    warn(message, error) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(line('warn', withError(message, error)));
    },
    error(message, error) {
      if (threshold <= LEVEL_ORDER.error) console.error(line('error', withError(message, error)));
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    }
  };
}
