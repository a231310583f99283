import type { RejectedPoint, Source } from './types.js';

export type FetchErrorKind = 'network' | 'auth' | 'http_status' | 'parse';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly source: Source;
  readonly status: number | null;

  constructor(kind: FetchErrorKind, source: Source, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.source = source;
    this.status = options.status ?? null;
  }
}

export class WriteError extends Error {
  readonly rejected: RejectedPoint[];

  constructor(message: string, rejected: RejectedPoint[], options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'WriteError';
    this.rejected = rejected;
  }
}

/** Invalid configuration or a missing credential. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigError || (error instanceof FetchError && error.kind === 'auth');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
