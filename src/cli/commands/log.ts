import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the log command: add an entry to a matrix changelog.
 */
export function createLogCommand(): Command {
  return new Command('log')
    .description('Add a changelog entry to a matrix')
    .argument('<matrix>', 'Matrix name')
    .argument('<message...>', 'Entry text')
    .action(async (matrix: string, words: string[]) => {
      try {
        const message = words.join(' ').trim();
        if (!message) {
          log.error('Changelog message is empty');
          process.exit(1);
        }
        const { store } = await openStore();
        await store.log(matrix, message);
        log.success('Logged.');
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
