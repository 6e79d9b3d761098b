import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the unregister command.
 */
export function createUnregisterCommand(): Command {
  return new Command('unregister')
    .description('Remove a project from a matrix')
    .argument('<matrix>', 'Matrix name')
    .argument('<project>', 'Project name')
    .action(async (matrix: string, project: string) => {
      try {
        const { store } = await openStore();
        const result = await store.unregister(matrix, project);

        if (result.foreignMarker) {
          log.warn(
            `Left the marker in ${result.path}: it points at '${result.foreignMarker.project}' in '${result.foreignMarker.matrix}'`
          );
        }
        log.success(`Project '${project}' removed from '${matrix}'`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
