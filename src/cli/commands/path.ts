import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the path command. Prints the directory whether or not the matrix exists yet.
 */
export function createPathCommand(): Command {
  return new Command('path')
    .description('Print the brain directory of a matrix')
    .argument('<matrix>', 'Matrix name')
    .action(async (matrix: string) => {
      try {
        const { store } = await openStore();
        console.log(store.matrixDir(matrix));
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
