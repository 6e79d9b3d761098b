import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the projects command.
 */
export function createProjectsCommand(): Command {
  return new Command('projects')
    .description('List the projects of a matrix')
    .argument('<matrix>', 'Matrix name')
    .option('--json', 'Output as JSON')
    .action(async (matrix: string, options: { json?: boolean }) => {
      try {
        const { store } = await openStore({ json: options.json });
        const projects = await store.listProjects(matrix);
        console.log(createFormatter({ json: options.json }).formatProjects(matrix, projects));
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
