/**
 * Consistency checks between manifests, vertical files and project markers.
 * Reports problems; never repairs them.
 */
import * as path from 'node:path';
import type { MatrixStore } from './store.js';
import type { Manifest } from './schema.js';
import { inspectMarker, markerMatches } from './marker.js';
import { CHANGELOG_FILE } from './changelog.js';
import { VERTICAL_EXTENSION } from './vertical.js';
import { isDirectory, listFiles } from '../../utils/file-system.js';
import { getErrorMessage } from '../../utils/errors.js';

export type IssueKind =
  | 'invalid-manifest'
  | 'vertical-file-missing'
  | 'orphan-vertical-file'
  | 'project-path-missing'
  | 'marker-missing'
  | 'marker-invalid'
  | 'marker-mismatch';

export interface DoctorIssue {
  matrix: string;
  kind: IssueKind;
  /** Vertical or project the issue is about */
  subject: string;
  message: string;
}

export interface DoctorReport {
  matrices: string[];
  issues: DoctorIssue[];
}

export async function diagnoseMatrix(store: MatrixStore, matrix: string): Promise<DoctorIssue[]> {
  const issues: DoctorIssue[] = [];
  const add = (kind: IssueKind, subject: string, message: string): void => {
    issues.push({ matrix, kind, subject, message });
  };

  let manifest: Manifest;
  try {
    manifest = await store.loadManifest(matrix);
  } catch (error) {
    add('invalid-manifest', matrix, getErrorMessage(error));
    return issues;
  }

  const verticalFiles = await listFiles(store.matrixDir(matrix), VERTICAL_EXTENSION);
  const onDisk = new Set(
    verticalFiles
      .filter((file) => file !== CHANGELOG_FILE)
      .map((file) => path.basename(file, VERTICAL_EXTENSION))
  );

  for (const vertical of manifest.verticals) {
    if (!onDisk.has(vertical)) {
      add('vertical-file-missing', vertical, `Vertical '${vertical}' has no ${vertical}${VERTICAL_EXTENSION}`);
    }
  }
  for (const name of [...onDisk].sort()) {
    if (!manifest.verticals.includes(name)) {
      add('orphan-vertical-file', name, `${name}${VERTICAL_EXTENSION} is not a registered vertical`);
    }
  }

  for (const [project, entry] of Object.entries(manifest.projects)) {
    if (!(await isDirectory(entry.path))) {
      add('project-path-missing', project, `Project '${project}' path no longer exists: ${entry.path}`);
      continue;
    }
    const marker = await inspectMarker(entry.path);
    switch (marker.state) {
      case 'absent':
        add('marker-missing', project, `Project '${project}' has no marker in ${entry.path}`);
        break;
      case 'invalid':
        add('marker-invalid', project, `Project '${project}' marker is invalid: ${marker.reason}`);
        break;
      case 'valid':
        if (!markerMatches(marker.marker, matrix, project)) {
          add(
            'marker-mismatch',
            project,
            `Project '${project}' marker points at '${marker.marker.project}' in '${marker.marker.matrix}'`
          );
        }
        break;
    }
  }

  return issues;
}

/**
 * Diagnose one matrix, or every matrix in the store.
 */
export async function diagnose(store: MatrixStore, matrix?: string): Promise<DoctorReport> {
  if (matrix) {
    await store.requireMatrix(matrix);
  }
  const matrices = matrix ? [matrix] : (await store.listMatrices()).map((m) => m.name);
  const issues: DoctorIssue[] = [];
  for (const name of matrices) {
    issues.push(...(await diagnoseMatrix(store, name)));
  }
  return { matrices, issues };
}
