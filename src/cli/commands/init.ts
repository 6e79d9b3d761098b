import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a new matrix')
    .argument('<matrix>', 'Matrix name')
    .action(async (matrix: string) => {
      try {
        await runInit(matrix);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runInit(matrix: string): Promise<void> {
  const { store } = await openStore();
  const result = await store.init(matrix);

  if (!result.created) {
    log.warn(`Matrix '${matrix}' already exists at ${result.dir}`);
    return;
  }

  log.success(`Matrix '${matrix}' initialized at ${result.dir}`);
  if (result.verticals.length > 0) {
    log.info(`Seeded verticals: ${result.verticals.join(', ')}`);
  }
}
