import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

interface RegisterCommandOptions {
  path?: string;
  force?: boolean;
}

/**
 * Create the register command.
 */
export function createRegisterCommand(): Command {
  return new Command('register')
    .description('Register a project directory under a matrix')
    .argument('<matrix>', 'Matrix name')
    .argument('<project>', 'Project name')
    .option('--path <path>', 'Project root (default: current directory)')
    .option('--force', 'Take over a directory registered elsewhere')
    .action(async (matrix: string, project: string, options: RegisterCommandOptions) => {
      try {
        const { store } = await openStore();
        const result = await store.register(matrix, project, {
          path: options.path,
          force: options.force,
        });

        if (result.takenOver) {
          log.warn(`Took over ${result.path} from '${result.takenOver.project}' in '${result.takenOver.matrix}'`);
        }
        if (result.previousPath) {
          log.info(`Moved from ${result.previousPath}`);
        }
        log.success(`Project '${project}' registered under '${matrix}'`);
        log.info(`Marker written to ${result.markerFile}`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
