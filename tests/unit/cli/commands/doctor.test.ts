/**
 * Tests for the doctor command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createDoctorCommand } from '../../../../src/cli/commands/doctor.js';
import { MatrixStore } from '../../../../src/core/matrix/store.js';
import { logger } from '../../../../src/utils/logger.js';
import { createTempStore, printed, runCommand, type TempStore } from '../../../helpers/store.js';

vi.mock('../../../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../../src/utils/logger.js')>()),
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
    setLevel: vi.fn(),
    setOutput: vi.fn(),
  },
}));

const mockExit = vi.spyOn(process, 'exit').mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

describe('doctor command', () => {
  let tmp: TempStore;
  let store: MatrixStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await createTempStore('doctor');
    store = new MatrixStore(tmp.root);
    await store.init('acme');
    await store.addVertical('acme', 'branding');
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should pass a consistent store', async () => {
    await runCommand(createDoctorCommand(), []);

    expect(printed(consoleSpy)).toBe('No issues found (1 matrix checked)');
    expect(mockExit).not.toHaveBeenCalled();
  });

  it('should print issues and exit with 1', async () => {
    await fs.rm(path.join(tmp.root, 'acme', 'branding.md'));

    await expect(runCommand(createDoctorCommand(), ['acme', '--json'])).rejects.toThrow('process.exit(1)');

    expect(JSON.parse(printed(consoleSpy))).toEqual({
      matrices: ['acme'],
      ok: false,
      issues: [
        {
          matrix: 'acme',
          kind: 'vertical-file-missing',
          subject: 'branding',
          message: "Vertical 'branding' has no branding.md",
        },
      ],
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should exit with 1 for an unknown matrix', async () => {
    await expect(runCommand(createDoctorCommand(), ['nope'])).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith("Matrix 'nope' does not exist. Run init first.");
    expect(consoleSpy).not.toHaveBeenCalled();
  });
});
