import 'dotenv/config';

import { getDefaultConfigPath, loadValidatedConfig } from './config.js';
import { describeError } from './errors.js';
import { SOURCE_KEYS, SOURCES } from './types.js';

async function main(): Promise<void> {
  try {
    const config = await loadValidatedConfig(getDefaultConfigPath());
    console.log(`Config valid: ${config.project.name}`);
    for (const source of SOURCES) {
      const sourceConfig = config.sources[SOURCE_KEYS[source]];
      if (!sourceConfig.enabled) continue;
      if (!process.env[sourceConfig.tokenEnv]) {
        console.warn(`${source}: ${sourceConfig.tokenEnv} is not set; this worker will stop at startup`);
      }
    }
  } catch (error) {
    console.error(describeError(error));
    process.exitCode = 1;
  }
}

void main();
