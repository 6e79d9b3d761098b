import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { MARKER_FILE } from '../../core/matrix/marker.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the detect command: which matrix and project the current directory belongs to.
 */
export function createDetectCommand(): Command {
  return new Command('detect')
    .description(`Detect the registered project from ${MARKER_FILE} in this directory or a parent`)
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const cwd = process.cwd();
        const { store } = await openStore({ json: options.json });
        const result = await store.detect(cwd);

        if (!result) {
          if (options.json) {
            console.log('null');
          } else {
            log.info(`No ${MARKER_FILE} found in ${cwd} or its parents.`);
          }
          return;
        }

        console.log(createFormatter({ json: options.json }).formatDetect(result));
        // JSON output already carries `dir`
        if (!options.json && result.dir !== cwd) {
          log.info(`Found in ${result.dir}`);
        }
        if (!result.matrixExists) {
          log.warn(`Matrix '${result.marker.matrix}' is not in the store at ${store.root}`);
        }
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
