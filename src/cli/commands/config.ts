import { Command } from 'commander';
import chalk from 'chalk';
import { openStore } from '../context.js';
import { getConfigPath } from '../../core/config/loader.js';
import { stringifyYaml } from '../../utils/schema.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the config command: print the effective store configuration.
 */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the store root and effective configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { root, config } = await openStore({ json: options.json });
        if (options.json) {
          console.log(JSON.stringify({ root, config }, null, 2));
          return;
        }
        console.log(chalk.dim(`# store root: ${root}`));
        console.log(chalk.dim(`# config file: ${getConfigPath(root)}`));
        console.log(stringifyYaml(config).trimEnd());
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
