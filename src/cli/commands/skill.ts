/**
 * Install the assistant instructions (skill/SKILL.md) where the assistant loads skills from.
 */
import { Command } from 'commander';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { ErrorCodes, StoreError, getErrorMessage } from '../../utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Same relative location from src/cli/commands and dist/cli/commands. */
export const SKILL_SOURCE = path.resolve(__dirname, '../../../skill/SKILL.md');

export function defaultSkillDir(): string {
  return path.join(os.homedir(), '.claude', 'skills', 'matrix-brain');
}

interface SkillInstallOptions {
  dir?: string;
  force?: boolean;
}

export async function installSkill(options: SkillInstallOptions = {}): Promise<string> {
  const target = path.join(path.resolve(options.dir ?? defaultSkillDir()), 'SKILL.md');

  if (!options.force && (await fileExists(target))) {
    throw new StoreError(
      ErrorCodes.SKILL_EXISTS,
      `${target} already exists. Use --force to overwrite.`,
      { target }
    );
  }

  await writeFile(target, await readFile(SKILL_SOURCE));
  return target;
}

export function createSkillCommand(): Command {
  const cmd = new Command('skill')
    .description('Manage the assistant skill document');

  cmd
    .command('install')
    .description('Copy SKILL.md into the assistant skills directory')
    .option('--dir <dir>', 'Target directory (default: ~/.claude/skills/matrix-brain)')
    .option('--force', 'Overwrite an existing SKILL.md')
    .action(async (options: SkillInstallOptions) => {
      try {
        const target = await installSkill(options);
        log.success(`Installed ${target}`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });

  cmd
    .command('show')
    .description('Print SKILL.md')
    .action(async () => {
      try {
        console.log((await readFile(SKILL_SOURCE)).trimEnd());
        log.debug(`Read from ${SKILL_SOURCE}`);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}
