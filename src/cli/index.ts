import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { setCliLogLevel } from './context.js';
import { createInitCommand } from './commands/init.js';
import { createRegisterCommand } from './commands/register.js';
import { createUnregisterCommand } from './commands/unregister.js';
import { createStatusCommand } from './commands/status.js';
import { createListCommand } from './commands/list.js';
import { createProjectsCommand } from './commands/projects.js';
import {
  createAddVerticalCommand,
  createRemoveVerticalCommand,
  createListVerticalsCommand,
} from './commands/verticals.js';
import { createReadCommand } from './commands/read.js';
import { createLogCommand } from './commands/log.js';
import { createDetectCommand } from './commands/detect.js';
import { createPathCommand } from './commands/path.js';
import { createChangelogCommand } from './commands/changelog.js';
import { createDoctorCommand } from './commands/doctor.js';
import { createSkillCommand } from './commands/skill.js';
import { createConfigCommand } from './commands/config.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('matrix-brain')
    .description('Shared context for groups of sibling projects')
    .version(VERSION)
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show warnings and errors')
    .hook('preAction', (thisCommand) => {
      const { verbose, quiet } = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
      setCliLogLevel(verbose ? 'debug' : quiet ? 'warn' : undefined);
    });

  [createInitCommand, createRegisterCommand, createUnregisterCommand, createStatusCommand, createListCommand,
   createProjectsCommand, createAddVerticalCommand, createRemoveVerticalCommand, createListVerticalsCommand,
   createReadCommand, createLogCommand, createDetectCommand, createPathCommand, createChangelogCommand,
   createDoctorCommand, createSkillCommand, createConfigCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
