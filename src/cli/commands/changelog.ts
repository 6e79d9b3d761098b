import { Command } from 'commander';
import { z } from 'zod';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/** Whole string must be a positive integer: `2abc` and `1.5` are rejected. */
const LimitSchema = z.coerce.number().int().min(1);

interface ChangelogCommandOptions {
  limit?: string;
  json?: boolean;
}

/**
 * Create the changelog command: newest entries first.
 */
export function createChangelogCommand(): Command {
  return new Command('changelog')
    .description('Show recent changelog entries of a matrix')
    .argument('<matrix>', 'Matrix name')
    .option('--limit <n>', 'Number of entries to show (default: changelog.limit from config)')
    .option('--json', 'Output as JSON')
    .action(async (matrix: string, options: ChangelogCommandOptions) => {
      try {
        const { store, config } = await openStore({ json: options.json });
        let limit = config.changelog.limit;
        if (options.limit !== undefined) {
          const parsed = LimitSchema.safeParse(options.limit);
          if (!parsed.success) {
            log.error(`Invalid --limit '${options.limit}'`);
            process.exit(1);
          }
          limit = parsed.data;
        }
        const entries = await store.changelogEntries(matrix, limit);
        console.log(createFormatter({ json: options.json }).formatChangelog(matrix, entries));
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}
