import { Command } from 'commander';
import { openStore } from '../context.js';
import { createFormatter } from '../formatters/index.js';
import { diagnose, type DoctorReport } from '../../core/matrix/doctor.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Create the doctor command. Exits with 1 when any issue is found.
 */
export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check manifests, vertical files and project markers for inconsistencies')
    .argument('[matrix]', 'Matrix to check (default: all)')
    .option('--json', 'Output as JSON')
    .action(async (matrix: string | undefined, options: { json?: boolean }) => {
      let report: DoctorReport;
      try {
        const { store } = await openStore({ json: options.json });
        report = await diagnose(store, matrix);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }

      console.log(createFormatter({ json: options.json }).formatDoctor(report));
      if (report.issues.length > 0) {
        process.exit(1);
      }
    });
}
