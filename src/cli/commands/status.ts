import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import { ErrorCodes, SystemError, getErrorMessage } from '../../utils/errors.js';
import type { MatrixStore } from '../../core/matrix/store.js';
import type { DetectResult } from '../../core/matrix/types.js';

interface StatusCommandOptions {
  json?: boolean;
}

/**
 * Create the status command.
 * Without a matrix argument, the matrix is detected from the current directory;
 * when nothing is detected every matrix is listed instead.
 */
export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show a matrix (detected from the current directory when omitted)')
    .argument('[matrix]', 'Matrix name')
    .option('--json', 'Output as JSON')
    .action(async (matrix: string | undefined, options: StatusCommandOptions) => {
      try {
        await runStatus(matrix, options);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runStatus(matrix: string | undefined, options: StatusCommandOptions): Promise<void> {
  const { store } = await openStore({ json: options.json });
  const formatter = createFormatter({ json: options.json });

  let target = matrix;
  if (!target) {
    const detected = await detectOrWarn(store);
    if (detected && !detected.matrixExists) {
      log.warn(`Marker in ${detected.dir} points at missing matrix '${detected.marker.matrix}'`);
    }
    if (!detected || !detected.matrixExists) {
      console.log(formatter.formatMatrixList(await store.listMatrices()));
      return;
    }
    target = detected.marker.matrix;
  }

  console.log(formatter.formatStatus(await store.status(target)));
}

/**
 * A malformed marker only costs the detection; status still lists matrices.
 */
async function detectOrWarn(store: MatrixStore): Promise<DetectResult | null> {
  try {
    return await store.detect(process.cwd());
  } catch (error) {
    if (error instanceof SystemError && error.code === ErrorCodes.PARSE_ERROR) {
      log.warn(error.message);
      return null;
    }
    throw error;
  }
}
