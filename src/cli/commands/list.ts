import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List all matrices')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { store } = await openStore({ json: options.json });
        console.log(createFormatter({ json: options.json }).formatMatrixList(await store.listMatrices()));
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
