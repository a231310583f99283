import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { getRepoRoot, loadCredential, loadValidatedConfig, resolveStoreConnection, validateConfigObject } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { makeValidConfig } from './helpers.js';

describe('config validation', () => {
  it('accepts a valid config object', async () => {
    await expect(validateConfigObject(makeValidConfig())).resolves.toBeTruthy();
  });

  it('accepts the shipped config file', async () => {
    const config = await loadValidatedConfig(path.join(getRepoRoot(), 'config', 'climacan.yaml'));
    expect(config.sources.aemet.tokenEnv).toBe('AEMET_TOKEN');
    expect(config.sources.grafcan.tokenEnv).toBe('GRAFCAN_TOKEN');
  });

  it('rejects if all sources are disabled', async () => {
    const config = makeValidConfig();
    config.sources.aemet.enabled = false;
    config.sources.grafcan.enabled = false;

    await expect(validateConfigObject(config)).rejects.toThrow('at least 1 source');
  });

  it('rejects a base delay above the ceiling', async () => {
    const config = makeValidConfig();
    config.sources.grafcan.backoff = { baseDelaySeconds: 900, maxDelaySeconds: 60 };

    await expect(validateConfigObject(config)).rejects.toThrow(
      'sources.grafcan.backoff.baseDelaySeconds must be <= maxDelaySeconds'
    );
  });

  it('rejects poll intervals below one minute', async () => {
    const config = makeValidConfig();
    config.sources.aemet.pollIntervalSeconds = 30;

    await expect(validateConfigObject(config)).rejects.toThrow('sources.aemet.pollIntervalSeconds must be >= 60 seconds');
  });

  it('rejects a forecast municipality that is not an INE code', async () => {
    const config = makeValidConfig();
    config.sources.aemet.forecast.municipalities = ['id38023'];

    await expect(validateConfigObject(config)).rejects.toThrow(
      'Config schema validation failed: /sources/aemet/forecast/municipalities/0 must match pattern "^[0-9]{5}$"'
    );
  });

  it('reports schema violations with their path', async () => {
    const config = { ...makeValidConfig(), supervisor: {} };

    await expect(validateConfigObject(config)).rejects.toThrow(
      "Config schema validation failed: /supervisor must have required property 'livenessIntervalSeconds'"
    );
  });
});

describe('credentials', () => {
  it('loads a token from the configured variable', () => {
    const credential = loadCredential(makeValidConfig(), 'GRAFCAN', { GRAFCAN_TOKEN: ' test-secret ' });
    expect(credential).toEqual({ source: 'GRAFCAN', token: 'test-secret' });
    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('fails with a ConfigError naming the missing variable', () => {
    expect(() => loadCredential(makeValidConfig(), 'AEMET', {})).toThrow(ConfigError);
    expect(() => loadCredential(makeValidConfig(), 'AEMET', { AEMET_TOKEN: '' })).toThrow('AEMET_TOKEN is not set');
  });
});

describe('store connection', () => {
  it('falls back to configured defaults', () => {
    expect(resolveStoreConnection(makeValidConfig().store, {})).toEqual({
      url: 'http://influx.test:8086',
      token: '',
      bucket: 'climacan/autogen',
      timeoutMs: 2000
    });
  });

  it('reads host, port and v1 credentials from the environment', () => {
    const connection = resolveStoreConnection(makeValidConfig().store, {
      INFLUXDB_HOST: 'db.internal',
      INFLUXDB_PORT: '8087',
      INFLUXDB_USERNAME: 'writer',
      INFLUXDB_PASSWORD: 'test-secret'
    });
    expect(connection.url).toBe('http://db.internal:8087');
    expect(connection.token).toBe('writer:test-secret');
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveStoreConnection(makeValidConfig().store, { INFLUXDB_PORT: 'abc' })).toThrow(
      "INFLUXDB_PORT must be a TCP port, got 'abc'"
    );
  });
});
