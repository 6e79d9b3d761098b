import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigSchema, ConfigFileSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadWithSchema } from '../../utils/schema.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { isLogLevel } from '../../utils/logger.js';

export const STORE_ROOT_ENV = 'MATRIX_BRAIN_HOME';
export const LOG_LEVEL_ENV = 'MATRIX_BRAIN_LOG_LEVEL';
export const CONFIG_FILE = 'config.yaml';

/**
 * Directory holding every matrix. `MATRIX_BRAIN_HOME` wins over `~/.claude/matrix-brain`.
 */
export function resolveStoreRoot(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STORE_ROOT_ENV];
  if (override && override.trim()) {
    return path.resolve(override.trim());
  }
  return path.join(os.homedir(), '.claude', 'matrix-brain');
}

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function getConfigPath(storeRoot: string): string {
  return path.join(storeRoot, CONFIG_FILE);
}

/**
 * Load the store configuration. Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  storeRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fullPath = getConfigPath(storeRoot);
  let config: Config;

  if (!(await fileExists(fullPath))) {
    config = getDefaultConfig();
  } else {
    try {
      config = await loadWithSchema(fullPath, ConfigFileSchema, 'yaml');
    } catch (error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${getErrorMessage(error)}`,
        { path: fullPath }
      );
    }
  }

  const levelOverride = env[LOG_LEVEL_ENV];
  if (levelOverride && isLogLevel(levelOverride)) {
    config = { ...config, log_level: levelOverride };
  }
  return config;
}
