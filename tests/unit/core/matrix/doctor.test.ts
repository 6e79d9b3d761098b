/**
 * Tests for store consistency checks.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { MatrixStore } from '../../../../src/core/matrix/store.js';
import { diagnose, diagnoseMatrix } from '../../../../src/core/matrix/doctor.js';
import { MARKER_FILE, writeMarker } from '../../../../src/core/matrix/marker.js';
import { captureError } from '../../../helpers/errors.js';

vi.mock('../../../../src/utils/logger.js', () => ({
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

describe('doctor', () => {
  let tmpDir: string;
  let store: MatrixStore;
  let projectDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'matrix-brain-doctor-'));
    store = new MatrixStore(path.join(tmpDir, 'store'));
    projectDir = path.join(tmpDir, 'web');
    await fs.mkdir(projectDir);
    await store.init('acme');
    await store.addVertical('acme', 'branding');
    await store.register('acme', 'web', { path: projectDir });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should report nothing for a consistent matrix', async () => {
    expect(await diagnoseMatrix(store, 'acme')).toEqual([]);
  });

  it('should report a vertical without its document', async () => {
    await fs.rm(store.verticalPath('acme', 'branding'));

    expect(await diagnoseMatrix(store, 'acme')).toEqual([
      {
        matrix: 'acme',
        kind: 'vertical-file-missing',
        subject: 'branding',
        message: "Vertical 'branding' has no branding.md",
      },
    ]);
  });

  it('should report markdown files that are not registered verticals', async () => {
    await fs.writeFile(path.join(store.matrixDir('acme'), 'notes.md'), '# Notes\n');

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues).toEqual([
      {
        matrix: 'acme',
        kind: 'orphan-vertical-file',
        subject: 'notes',
        message: 'notes.md is not a registered vertical',
      },
    ]);
  });

  it('should report a project directory that is gone', async () => {
    await fs.rm(projectDir, { recursive: true });

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues.map((i) => i.kind)).toEqual(['project-path-missing']);
    expect(issues[0].message).toBe(`Project 'web' path no longer exists: ${projectDir}`);
  });

  it('should report a missing marker', async () => {
    await fs.rm(path.join(projectDir, MARKER_FILE));

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues.map((i) => i.kind)).toEqual(['marker-missing']);
    expect(issues[0].message).toBe(`Project 'web' has no marker in ${projectDir}`);
  });

  it('should report an unreadable marker', async () => {
    await fs.writeFile(path.join(projectDir, MARKER_FILE), 'oops');

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues.map((i) => i.kind)).toEqual(['marker-invalid']);
  });

  it('should report a marker pointing at another registration', async () => {
    await writeMarker(projectDir, { matrix: 'other', project: 'site' });

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues).toEqual([
      {
        matrix: 'acme',
        kind: 'marker-mismatch',
        subject: 'web',
        message: "Project 'web' marker points at 'site' in 'other'",
      },
    ]);
  });

  it('should report an invalid manifest and stop there', async () => {
    await fs.writeFile(store.manifestPath('acme'), '{');

    const issues = await diagnoseMatrix(store, 'acme');

    expect(issues).toHaveLength(1);
    expect(issues[0].kind).toBe('invalid-manifest');
    expect(issues[0].message).toContain('Failed to parse JSON');
  });

  describe('diagnose', () => {
    it('should check every matrix when none is named', async () => {
      await store.init('beta');
      await fs.writeFile(path.join(store.matrixDir('beta'), 'stray.md'), '');

      const report = await diagnose(store);

      expect(report.matrices).toEqual(['acme', 'beta']);
      expect(report.issues.map((i) => `${i.matrix}:${i.kind}`)).toEqual(['beta:orphan-vertical-file']);
    });

    it('should check only the named matrix', async () => {
      await store.init('beta');

      const report = await diagnose(store, 'acme');

      expect(report).toEqual({ matrices: ['acme'], issues: [] });
    });

    it('should fail for an unknown matrix', async () => {
      const error = await captureError(() => diagnose(store, 'nope'));

      expect(error.code).toBe('MATRIX_NOT_FOUND');
    });
  });
});
