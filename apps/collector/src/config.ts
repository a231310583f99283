import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject } from 'ajv';
import formatsModule from 'ajv-formats';
import YAML from 'yaml';

import { ConfigError } from './errors.js';
import { SOURCE_KEYS } from './types.js';
import type { ClimaCanConfig, ProviderCredential, Source } from './types.js';

export type Env = Record<string, string | undefined>;

// ajv-formats is CommonJS; from ESM its plugin sits on `default`
const addFormats = formatsModule.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const repoRoot = path.resolve(__dirname, '../../..');

export function getRepoRoot(): string {
  return repoRoot;
}

export function getDefaultConfigPath(env: Env = process.env): string {
  return env.CLIMACAN_CONFIG ?? path.join(repoRoot, 'config', 'climacan.yaml');
}

export async function parseConfigYaml(configPath: string): Promise<unknown> {
  const raw = await readFile(configPath, 'utf8');
  return YAML.parse(raw);
}

export async function loadConfigSchema(): Promise<SchemaObject> {
  const schemaPath = path.join(repoRoot, 'config', 'climacan.schema.json');
  const raw = await readFile(schemaPath, 'utf8');
  const schema: SchemaObject = JSON.parse(raw);
  return schema;
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

export async function validateConfigObject(config: unknown): Promise<ClimaCanConfig> {
  const schema = await loadConfigSchema();
  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);
  const validate = ajv.compile<ClimaCanConfig>(schema);
  if (!validate(config)) {
    throw new ConfigError(`Config schema validation failed: ${formatSchemaErrors(validate.errors)}`);
  }

  const sources = [config.sources.aemet, config.sources.grafcan];
  if (!sources.some((source) => source.enabled)) {
    throw new ConfigError('Config semantic validation failed: at least 1 source must be enabled');
  }

  for (const [key, source] of Object.entries(config.sources)) {
    if (source.backoff.baseDelaySeconds > source.backoff.maxDelaySeconds) {
      throw new ConfigError(
        `Config semantic validation failed: sources.${key}.backoff.baseDelaySeconds must be <= maxDelaySeconds`
      );
    }
    if (source.pollIntervalSeconds < 60) {
      throw new ConfigError(`Config semantic validation failed: sources.${key}.pollIntervalSeconds must be >= 60 seconds`);
    }
  }

  return config;
}

export async function loadValidatedConfig(configPath = getDefaultConfigPath()): Promise<ClimaCanConfig> {
  const parsed = await parseConfigYaml(configPath);
  return validateConfigObject(parsed);
}

export function loadCredential(config: ClimaCanConfig, source: Source, env: Env = process.env): ProviderCredential {
  const tokenEnv = config.sources[SOURCE_KEYS[source]].tokenEnv;
  const token = env[tokenEnv]?.trim();
  if (!token) {
    throw new ConfigError(`${tokenEnv} is not set; the ${source} collector cannot authenticate`);
  }
  return Object.freeze({ source, token });
}

export type StoreConnection = {
  url: string;
  token: string;
  bucket: string;
  timeoutMs: number;
};

export function resolveStoreConnection(store: ClimaCanConfig['store'], env: Env = process.env): StoreConnection {
  const host = env[store.hostEnv]?.trim() || store.defaultHost;
  const rawPort = env[store.portEnv]?.trim();
  const port = rawPort ? Number(rawPort) : store.defaultPort;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`${store.portEnv} must be a TCP port, got '${rawPort ?? ''}'`);
  }

  const username = env[store.usernameEnv]?.trim();
  const password = env[store.passwordEnv] ?? '';

  return {
    url: `http://${host}:${port}`,
    // InfluxDB 1.8 reads the v2 token as "username:password"
    token: username ? `${username}:${password}` : '',
    bucket: `${store.database}/${store.retentionPolicy}`,
    timeoutMs: store.timeoutMs
  };
}
