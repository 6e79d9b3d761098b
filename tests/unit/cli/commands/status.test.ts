/**
 * Tests for the status, list and projects commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createStatusCommand } from '../../../../src/cli/commands/status.js';
import { createListCommand } from '../../../../src/cli/commands/list.js';
import { createProjectsCommand } from '../../../../src/cli/commands/projects.js';
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

describe('status command', () => {
  let tmp: TempStore;
  let store: MatrixStore;
  let projectDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await createTempStore('status');
    store = new MatrixStore(tmp.root);
    await store.init('acme');
    await store.init('beta');
    await store.addVertical('acme', 'branding');
    projectDir = path.join(tmp.dir, 'web');
    await fs.mkdir(projectDir);
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should show the named matrix', async () => {
    await runCommand(createStatusCommand(), ['acme', '--json']);

    const status = JSON.parse(printed(consoleSpy));
    expect(status.name).toBe('acme');
    expect(status.verticals).toEqual([
      {
        name: 'branding',
        file: path.join(tmp.root, 'acme', 'branding.md'),
        state: 'empty',
        lines: 0,
        summary: 'empty',
      },
    ]);
  });

  it('should detect the matrix from the current directory', async () => {
    await store.register('beta', 'web', { path: projectDir });

    await runCommand(createStatusCommand(), ['--json']);

    expect(JSON.parse(printed(consoleSpy)).name).toBe('beta');
  });

  it('should list matrices when nothing is detected', async () => {
    await runCommand(createStatusCommand(), []);

    expect(printed(consoleSpy)).toContain('acme (0 projects, 1 vertical)');
  });

  it('should warn and list matrices when the detected matrix is missing', async () => {
    await writeMarker(projectDir, { matrix: 'gone', project: 'web' });

    await runCommand(createStatusCommand(), ['--json']);

    expect(logger.warn).toHaveBeenCalledWith(`Marker in ${projectDir} points at missing matrix 'gone'`);
    expect(JSON.parse(printed(consoleSpy))).toEqual([
      { name: 'acme', project_count: 0, vertical_count: 1 },
      { name: 'beta', project_count: 0, vertical_count: 0 },
    ]);
  });

  it('should warn and list matrices when the nearest marker is malformed', async () => {
    const markerFile = path.join(projectDir, MARKER_FILE);
    await fs.writeFile(markerFile, '{ broken');

    await runCommand(createStatusCommand(), ['--json']);

    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining(`Marker ${markerFile} is invalid`));
    expect(logger.error).not.toHaveBeenCalled();
    expect(JSON.parse(printed(consoleSpy)).map((m: { name: string }) => m.name)).toEqual(['acme', 'beta']);
  });

  it('should exit with 1 for an unknown matrix', async () => {
    await expect(runCommand(createStatusCommand(), ['nope'])).rejects.toThrow('process.exit(1)');

    expect(logger.error).toHaveBeenCalledWith("Matrix 'nope' does not exist. Run init first.");
  });
});

describe('list command', () => {
  let tmp: TempStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await createTempStore('list');
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should say when the store is empty', async () => {
    await runCommand(createListCommand(), []);

    expect(printed(consoleSpy)).toBe('No matrices found.');
  });

  it('should print matrices as JSON', async () => {
    await new MatrixStore(tmp.root).init('acme');

    await runCommand(createListCommand(), ['--json']);

    expect(JSON.parse(printed(consoleSpy))).toEqual([{ name: 'acme', project_count: 0, vertical_count: 0 }]);
  });
});

describe('projects command', () => {
  let tmp: TempStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await createTempStore('projects');
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should list registered projects', async () => {
    const store = new MatrixStore(tmp.root, { now: () => new Date('2026-01-15T08:30:00.000Z') });
    await store.init('acme');
    const dir = path.join(tmp.dir, 'web');
    await store.register('acme', 'web', { path: dir });

    await runCommand(createProjectsCommand(), ['acme', '--json']);

    expect(JSON.parse(printed(consoleSpy))).toEqual([
      { name: 'web', path: dir, registered: '2026-01-15T08:30:00.000Z' },
    ]);
  });

  it('should say when there are no projects', async () => {
    await new MatrixStore(tmp.root).init('acme');

    await runCommand(createProjectsCommand(), ['acme']);

    expect(printed(consoleSpy)).toBe("No projects in 'acme'.");
  });
});
