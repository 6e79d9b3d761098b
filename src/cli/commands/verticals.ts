/**
 * Vertical management commands: add-vertical, remove-vertical, list-verticals.
 */
import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

export function createAddVerticalCommand(): Command {
  return new Command('add-vertical')
    .description('Add a vertical to a matrix')
    .argument('<matrix>', 'Matrix name')
    .argument('<vertical>', 'Vertical name, e.g. branding or env-variables')
    .action(async (matrix: string, vertical: string) => {
      try {
        const { store } = await openStore();
        const result = await store.addVertical(matrix, vertical);

        if (!result.added) {
          log.info(`Vertical '${vertical}' already exists in '${matrix}'.`);
          return;
        }
        log.success(`Vertical '${vertical}' added to '${matrix}'`);
        log.info(`File: ${result.file}`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

export function createRemoveVerticalCommand(): Command {
  return new Command('remove-vertical')
    .description('Remove a vertical and its document from a matrix')
    .argument('<matrix>', 'Matrix name')
    .argument('<vertical>', 'Vertical name')
    .action(async (matrix: string, vertical: string) => {
      try {
        const { store } = await openStore();
        await store.removeVertical(matrix, vertical);
        log.success(`Vertical '${vertical}' removed from '${matrix}'`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

export function createListVerticalsCommand(): Command {
  return new Command('list-verticals')
    .description('List the verticals of a matrix with their content status')
    .argument('<matrix>', 'Matrix name')
    .option('--json', 'Output as JSON')
    .action(async (matrix: string, options: { json?: boolean }) => {
      try {
        const { store } = await openStore({ json: options.json });
        const verticals = await store.listVerticals(matrix);
        console.log(createFormatter({ json: options.json }).formatVerticals(matrix, verticals));
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
