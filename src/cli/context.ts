/**
 * Opens the store the way every command needs it: root from the environment,
 * config.yaml applied, log level settled.
 */
import { MatrixStore } from '../core/matrix/store.js';
import { loadConfig, resolveStoreRoot } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { logger, type LogLevel } from '../utils/logger.js';

export interface StoreContext {
  root: string;
  config: Config;
  store: MatrixStore;
}

/** Set from --verbose / --quiet; wins over config.yaml. */
let cliLogLevel: LogLevel | undefined;

export function setCliLogLevel(level: LogLevel | undefined): void {
  cliLogLevel = level;
}

export interface OpenStoreOptions {
  /** The command prints JSON: keep diagnostics off stdout */
  json?: boolean;
}

export async function openStore(options: OpenStoreOptions = {}): Promise<StoreContext> {
  logger.setOutput(options.json ? 'stderr' : 'stdout');
  const root = resolveStoreRoot();
  const config = await loadConfig(root);
  logger.setLevel(cliLogLevel ?? config.log_level);
  logger.debug(`Store root: ${root}`);

  const store = new MatrixStore(root, { defaultVerticals: config.default_verticals });
  return { root, config, store };
}
