import { Command } from 'commander';
import { openStore } from '../context.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the read command: print one vertical document, or all of them.
 */
export function createReadCommand(): Command {
  return new Command('read')
    .description('Print the shared brain of a matrix (one vertical or all)')
    .argument('<matrix>', 'Matrix name')
    .argument('[vertical]', 'Vertical to print')
    .action(async (matrix: string, vertical: string | undefined) => {
      try {
        await runRead(matrix, vertical);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runRead(matrix: string, vertical: string | undefined): Promise<void> {
  const { store } = await openStore();

  if (vertical) {
    console.log((await store.readVertical(matrix, vertical)).trimEnd());
    return;
  }

  const documents = await store.readAll(matrix);
  if (documents.length === 0) {
    log.info(`No verticals in '${matrix}'.`);
    return;
  }
  documents.forEach((doc, index) => {
    if (index > 0) console.log();
    console.log(doc.content.trimEnd());
  });
}
