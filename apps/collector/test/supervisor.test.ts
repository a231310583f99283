import { describe, expect, it } from 'vitest';

import { ConfigError, FetchError } from '../src/errors.js';
import { EXIT_CODES, describeLiveness, exitCodeFor, signalExitCode, startAll, waitForAll } from '../src/supervisor.js';
import type { CollectorState } from '../src/types.js';
import { silentLogger } from './helpers.js';

function never(): Promise<never> {
  return new Promise<never>(() => undefined);
}

describe('supervisor', () => {
  it('keeps the sibling alive when one worker crashes', async () => {
    const [aemet, grafcan] = startAll(
      [
        { source: 'AEMET', run: async () => Promise.reject(new Error('boom')) },
        { source: 'GRAFCAN', run: never }
      ],
      silentLogger
    );

    const exit = await aemet?.done;

    expect(exit).toEqual({ source: 'AEMET', status: 'crashed', error: new Error('boom') });
    expect(aemet?.isAlive()).toBe(false);
    expect(grafcan?.isAlive()).toBe(true);
    expect(grafcan?.status()).toBe('running');
  });

  it('catches a worker that throws synchronously', async () => {
    const [handle] = startAll(
      [
        {
          source: 'GRAFCAN',
          run: () => {
            throw new ConfigError('GRAFCAN_TOKEN is not set');
          }
        }
      ],
      silentLogger
    );

    await expect(handle?.done).resolves.toMatchObject({ status: 'crashed' });
  });

  it('refuses two workers for the same source', () => {
    expect(() =>
      startAll(
        [
          { source: 'AEMET', run: never },
          { source: 'AEMET', run: never }
        ],
        silentLogger
      )
    ).toThrow('Only one worker per source is allowed (AEMET)');
  });

  it('waits for every worker', async () => {
    const handles = startAll(
      [
        { source: 'AEMET', run: async () => undefined },
        { source: 'GRAFCAN', run: async () => Promise.reject(new Error('boom')) }
      ],
      silentLogger
    );

    const exits = await waitForAll(handles);
    expect(exits.map((exit) => `${exit.source}:${exit.status}`)).toEqual(['AEMET:exited', 'GRAFCAN:crashed']);
  });

  it('describes worker liveness from the loop state', () => {
    const state: CollectorState = {
      source: 'AEMET',
      phase: 'BACKOFF',
      lastPollAt: new Date('2024-05-01T11:00:00.000Z'),
      lastSuccessAt: new Date('2024-05-01T10:00:00.000Z'),
      consecutiveFailures: 2
    };
    const [withState, withoutState] = startAll(
      [
        { source: 'AEMET', run: never, state: () => state },
        { source: 'GRAFCAN', run: never }
      ],
      silentLogger
    );

    expect(withState && describeLiveness(withState)).toBe(
      'AEMET: running, phase=BACKOFF, lastSuccess=2024-05-01T10:00:00.000Z, consecutiveFailures=2'
    );
    expect(withoutState && describeLiveness(withoutState)).toBe('GRAFCAN: running');
  });
});

describe('exitCodeFor', () => {
  it('prefers configuration errors, then auth failures', () => {
    const auth = new FetchError('auth', 'GRAFCAN', 'HTTP 401 for https://grafcan.test/', { status: 401 });

    expect(
      exitCodeFor([
        { source: 'AEMET', status: 'crashed', error: new ConfigError('AEMET_TOKEN is not set') },
        { source: 'GRAFCAN', status: 'crashed', error: auth }
      ])
    ).toBe(EXIT_CODES.config);
    expect(exitCodeFor([{ source: 'GRAFCAN', status: 'crashed', error: auth }])).toBe(77);
    expect(exitCodeFor([{ source: 'AEMET', status: 'crashed', error: new Error('boom') }])).toBe(1);
    expect(exitCodeFor([{ source: 'AEMET', status: 'exited' }])).toBe(1);
  });
});

describe('signalExitCode', () => {
  it('exits with 128 plus the signal number', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });
});
