/**
 * Project marker file: `.matrix-brain.json` in a project root records which
 * matrix and project name the directory is registered as.
 */
import * as path from 'node:path';
import { ProjectMarkerSchema, type ProjectMarker } from './schema.js';
import { fileExists, removeFile } from '../../utils/file-system.js';
import { loadWithSchema, writeJson } from '../../utils/schema.js';
import { getErrorMessage } from '../../utils/errors.js';

export const MARKER_FILE = '.matrix-brain.json';

export type MarkerState =
  | { state: 'absent'; file: string }
  | { state: 'valid'; file: string; marker: ProjectMarker }
  | { state: 'invalid'; file: string; reason: string };

export function markerPath(projectDir: string): string {
  return path.join(projectDir, MARKER_FILE);
}

/**
 * Look at the marker in a directory without throwing on a malformed file.
 */
export async function inspectMarker(projectDir: string): Promise<MarkerState> {
  const file = markerPath(projectDir);
  if (!(await fileExists(file))) {
    return { state: 'absent', file };
  }
  try {
    const marker = await loadWithSchema(file, ProjectMarkerSchema, 'json');
    return { state: 'valid', file, marker };
  } catch (error) {
    return { state: 'invalid', file, reason: getErrorMessage(error) };
  }
}

export async function writeMarker(projectDir: string, marker: ProjectMarker): Promise<string> {
  const file = markerPath(projectDir);
  await writeJson(file, marker);
  return file;
}

export async function removeMarker(projectDir: string): Promise<boolean> {
  return removeFile(markerPath(projectDir));
}

export function markerMatches(marker: ProjectMarker, matrix: string, project: string): boolean {
  return marker.matrix === matrix && marker.project === project;
}

/**
 * Find the nearest marker, starting at `startDir` and walking up to the filesystem root.
 * Stops at the first marker file found, valid or not.
 */
export async function findMarker(startDir: string): Promise<MarkerState | null> {
  let dir = path.resolve(startDir);
  for (;;) {
    const found = await inspectMarker(dir);
    if (found.state !== 'absent') {
      return found;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}
