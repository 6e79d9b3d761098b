/**
 * Tests for the detect command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createDetectCommand } from '../../../../src/cli/commands/detect.js';
import { MatrixStore } from '../../../../src/core/matrix/store.js';
import { MARKER_FILE, writeMarker } from '../../../../src/core/matrix/marker.js';
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

vi.spyOn(process, 'exit').mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});

const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

describe('detect command', () => {
  let tmp: TempStore;
  let store: MatrixStore;
  let projectDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await createTempStore('detect');
    store = new MatrixStore(tmp.root, { now: () => new Date('2026-01-15T08:30:00.000Z') });
    await store.init('acme');
    projectDir = path.join(tmp.dir, 'web');
    await fs.mkdir(projectDir);
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should print the marker of the current directory as JSON', async () => {
    await store.register('acme', 'web', { path: projectDir });
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    await runCommand(createDetectCommand(), ['--json']);

    expect(JSON.parse(printed(consoleSpy))).toEqual({
      matrix: 'acme',
      project: 'web',
      registered: '2026-01-15T08:30:00.000Z',
      dir: projectDir,
      matrix_exists: true,
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should find the marker of a parent directory', async () => {
    await store.register('acme', 'web', { path: projectDir });
    const nested = path.join(projectDir, 'src', 'lib');
    await fs.mkdir(nested, { recursive: true });
    vi.spyOn(process, 'cwd').mockReturnValue(nested);

    await runCommand(createDetectCommand(), []);

    expect(JSON.parse(printed(consoleSpy))).toMatchObject({ matrix: 'acme', project: 'web' });
    expect(logger.info).toHaveBeenCalledWith(`Found in ${projectDir}`);
  });

  it('should print null with --json when nothing is registered', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    await runCommand(createDetectCommand(), ['--json']);

    expect(printed(consoleSpy)).toBe('null');
  });

  it('should say so without --json when nothing is registered', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    await runCommand(createDetectCommand(), []);

    expect(consoleSpy).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(`No ${MARKER_FILE} found in ${projectDir} or its parents.`);
  });

  it('should warn when the matrix is not in the store', async () => {
    await writeMarker(projectDir, { matrix: 'gone', project: 'web' });
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    await runCommand(createDetectCommand(), []);

    expect(logger.warn).toHaveBeenCalledWith(`Matrix 'gone' is not in the store at ${tmp.root}`);
  });

  it('should exit with 1 on a malformed marker', async () => {
    await fs.writeFile(path.join(projectDir, MARKER_FILE), '{"matrix": 1}');
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    await expect(runCommand(createDetectCommand(), [])).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining(`Marker ${path.join(projectDir, MARKER_FILE)} is invalid`));
  });
});
