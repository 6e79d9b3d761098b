/**
 * MatrixStore - filesystem-backed registry of matrices.
 *
 * Each matrix is a directory under the store root holding manifest.json,
 * changelog.md and one markdown document per vertical. Registered projects
 * carry a marker file pointing back at their matrix.
 */
import * as path from 'node:path';
import { ManifestSchema, type Manifest, type ProjectEntry, type ProjectMarker } from './schema.js';
import { assertValidName, isValidName } from './names.js';
import { Changelog, CHANGELOG_FILE, type ChangelogEntry } from './changelog.js';
import { findMarker, inspectMarker, markerMatches, removeMarker, writeMarker } from './marker.js';
import { verticalFileName, verticalSeed, verticalStatus } from './vertical.js';
import type {
  AddVerticalResult,
  DetectResult,
  InitResult,
  MatrixStatus,
  MatrixStoreOptions,
  MatrixSummary,
  ProjectSummary,
  RegisterOptions,
  RegisterResult,
  RemoveVerticalResult,
  UnregisterResult,
  VerticalDocument,
  VerticalSummary,
} from './types.js';
import {
  ensureDir,
  fileExists,
  listSubdirectories,
  readFile,
  removeFile,
  writeFile,
} from '../../utils/file-system.js';
import { loadWithSchema, writeJson } from '../../utils/schema.js';
import { ErrorCodes, StoreError, SystemError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const MANIFEST_FILE = 'manifest.json';

function getProject(manifest: Manifest, project: string): ProjectEntry | undefined {
  return Object.hasOwn(manifest.projects, project) ? manifest.projects[project] : undefined;
}

async function readOptional(filePath: string): Promise<string | null> {
  return (await fileExists(filePath)) ? readFile(filePath) : null;
}

export class MatrixStore {
  private readonly now: () => Date;
  private readonly defaultVerticals: string[];

  constructor(
    public readonly root: string,
    options: MatrixStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.defaultVerticals = options.defaultVerticals ?? [];
  }

  matrixDir(matrix: string): string {
    assertValidName('matrix', matrix);
    return path.join(this.root, matrix);
  }

  manifestPath(matrix: string): string {
    return path.join(this.matrixDir(matrix), MANIFEST_FILE);
  }

  verticalPath(matrix: string, vertical: string): string {
    assertValidName('vertical', vertical);
    return path.join(this.matrixDir(matrix), verticalFileName(vertical));
  }

  changelog(matrix: string): Changelog {
    return new Changelog(path.join(this.matrixDir(matrix), CHANGELOG_FILE), this.now);
  }

  async exists(matrix: string): Promise<boolean> {
    return fileExists(this.manifestPath(matrix));
  }

  async loadManifest(matrix: string): Promise<Manifest> {
    await this.requireMatrix(matrix);
    return loadWithSchema(this.manifestPath(matrix), ManifestSchema, 'json', ErrorCodes.INVALID_MANIFEST);
  }

  private async saveManifest(matrix: string, manifest: Manifest): Promise<void> {
    await writeJson(this.manifestPath(matrix), manifest);
  }

  async requireMatrix(matrix: string): Promise<void> {
    if (!(await this.exists(matrix))) {
      throw new StoreError(
        ErrorCodes.MATRIX_NOT_FOUND,
        `Matrix '${matrix}' does not exist. Run init first.`,
        { matrix }
      );
    }
  }

  /**
   * Create a matrix. An existing matrix is left untouched.
   */
  async init(matrix: string): Promise<InitResult> {
    const dir = this.matrixDir(matrix);

    if (await this.exists(matrix)) {
      const manifest = await this.loadManifest(matrix);
      return { created: false, dir, verticals: manifest.verticals };
    }

    // Fail before anything is written
    for (const vertical of this.defaultVerticals) {
      assertValidName('vertical', vertical);
    }

    await ensureDir(dir);
    const manifest: Manifest = {
      name: matrix,
      created: this.now().toISOString(),
      projects: {},
      verticals: [],
    };
    await this.saveManifest(matrix, manifest);
    await this.changelog(matrix).create(`Matrix '${matrix}' created`);

    for (const vertical of this.defaultVerticals) {
      await this.addVertical(matrix, vertical);
    }

    const saved = await this.loadManifest(matrix);
    return { created: true, dir, verticals: saved.verticals };
  }

  /**
   * Register a directory as a project of the matrix and write its marker.
   */
  async register(matrix: string, project: string, options: RegisterOptions = {}): Promise<RegisterResult> {
    assertValidName('project', project);
    const manifest = await this.loadManifest(matrix);
    const target = path.resolve(options.cwd ?? process.cwd(), options.path ?? '.');

    const current = await inspectMarker(target);
    let takenOver: ProjectMarker | undefined;

    if (current.state === 'invalid' && !options.force) {
      throw new StoreError(
        ErrorCodes.MARKER_CONFLICT,
        `${current.file} is unreadable (${current.reason}). Use --force to overwrite it.`,
        { file: current.file }
      );
    }

    if (current.state === 'valid' && !markerMatches(current.marker, matrix, project)) {
      if (!options.force) {
        throw new StoreError(
          ErrorCodes.MARKER_CONFLICT,
          `${target} is already registered as '${current.marker.project}' in matrix '${current.marker.matrix}'. Use --force to move it.`,
          { path: target, marker: current.marker }
        );
      }
      takenOver = current.marker;
      await this.release(current.marker, target, { matrix, project, manifest });
    }

    const registered = this.now().toISOString();
    const previous = getProject(manifest, project);
    manifest.projects[project] = { path: target, registered };
    await this.saveManifest(matrix, manifest);

    let previousPath: string | undefined;
    if (previous && previous.path !== target) {
      previousPath = previous.path;
      const old = await inspectMarker(previous.path);
      if (old.state === 'valid' && markerMatches(old.marker, matrix, project)) {
        await removeMarker(previous.path);
      }
    }

    const markerFile = await writeMarker(target, { matrix, project, registered });
    await this.changelog(matrix).append(`Project '${project}' registered (${target})`);

    return { path: target, markerFile, previousPath, takenOver };
  }

  /**
   * Drop the registration a directory's marker points at, when the owning manifest
   * still records that directory.
   */
  private async release(
    owner: ProjectMarker,
    dir: string,
    next: { matrix: string; project: string; manifest: Manifest }
  ): Promise<void> {
    if (owner.matrix === next.matrix) {
      // Saved by the caller along with the new entry
      if (getProject(next.manifest, owner.project)?.path === dir) {
        delete next.manifest.projects[owner.project];
        await this.changelog(next.matrix).append(
          `Project '${owner.project}' unregistered (replaced by '${next.project}')`
        );
      }
      return;
    }

    if (!isValidName(owner.matrix) || !(await this.exists(owner.matrix))) {
      logger.debug(`Marker pointed at missing matrix '${owner.matrix}'`, { dir });
      return;
    }

    const other = await this.loadManifest(owner.matrix);
    if (getProject(other, owner.project)?.path !== dir) {
      return;
    }
    delete other.projects[owner.project];
    await this.saveManifest(owner.matrix, other);
    await this.changelog(owner.matrix).append(
      `Project '${owner.project}' unregistered (moved to '${next.matrix}')`
    );
  }

  async unregister(matrix: string, project: string): Promise<UnregisterResult> {
    const manifest = await this.loadManifest(matrix);
    const entry = getProject(manifest, project);

    if (!entry) {
      throw new StoreError(
        ErrorCodes.PROJECT_NOT_FOUND,
        `Project '${project}' not found in '${matrix}'.`,
        { matrix, project }
      );
    }

    delete manifest.projects[project];
    await this.saveManifest(matrix, manifest);

    let markerRemoved = false;
    let foreignMarker: ProjectMarker | undefined;
    const marker = await inspectMarker(entry.path);
    if (marker.state === 'valid') {
      if (markerMatches(marker.marker, matrix, project)) {
        markerRemoved = await removeMarker(entry.path);
      } else {
        foreignMarker = marker.marker;
      }
    }

    await this.changelog(matrix).append(`Project '${project}' unregistered`);
    return { path: entry.path, markerRemoved, foreignMarker };
  }

  async addVertical(matrix: string, vertical: string): Promise<AddVerticalResult> {
    const file = this.verticalPath(matrix, vertical);
    const manifest = await this.loadManifest(matrix);

    if (manifest.verticals.includes(vertical)) {
      return { added: false, file };
    }

    manifest.verticals.push(vertical);
    await this.saveManifest(matrix, manifest);

    // Keep content written before the vertical was registered
    if (!(await fileExists(file))) {
      await writeFile(file, verticalSeed(vertical));
    }

    await this.changelog(matrix).append(`Vertical '${vertical}' added`);
    return { added: true, file };
  }

  async removeVertical(matrix: string, vertical: string): Promise<RemoveVerticalResult> {
    const file = this.verticalPath(matrix, vertical);
    const manifest = await this.loadManifest(matrix);

    if (!manifest.verticals.includes(vertical)) {
      throw new StoreError(
        ErrorCodes.VERTICAL_NOT_FOUND,
        `Vertical '${vertical}' not found in '${matrix}'.`,
        { matrix, vertical }
      );
    }

    manifest.verticals = manifest.verticals.filter((v) => v !== vertical);
    await this.saveManifest(matrix, manifest);

    const fileRemoved = await removeFile(file);
    await this.changelog(matrix).append(`Vertical '${vertical}' removed`);
    return { fileRemoved };
  }

  async listVerticals(matrix: string): Promise<VerticalSummary[]> {
    const manifest = await this.loadManifest(matrix);
    return this.summarizeVerticals(matrix, manifest);
  }

  private async summarizeVerticals(matrix: string, manifest: Manifest): Promise<VerticalSummary[]> {
    const summaries: VerticalSummary[] = [];
    for (const name of manifest.verticals) {
      const file = this.verticalPath(matrix, name);
      summaries.push({ name, file, status: verticalStatus(await readOptional(file)) });
    }
    return summaries;
  }

  /**
   * Every directory under the root that holds a manifest, sorted by name.
   * A matrix whose manifest cannot be read is skipped with a warning.
   */
  async listMatrices(): Promise<MatrixSummary[]> {
    const summaries: MatrixSummary[] = [];
    const dirs = (await listSubdirectories(this.root)).filter(isValidName).sort();

    for (const name of dirs) {
      if (!(await this.exists(name))) continue;
      try {
        const manifest = await this.loadManifest(name);
        summaries.push({
          name,
          projectCount: Object.keys(manifest.projects).length,
          verticalCount: manifest.verticals.length,
        });
      } catch (error) {
        logger.warn(`Skipping matrix '${name}': ${getErrorMessage(error)}`);
      }
    }

    return summaries;
  }

  async listProjects(matrix: string): Promise<ProjectSummary[]> {
    const manifest = await this.loadManifest(matrix);
    return Object.entries(manifest.projects).map(([name, entry]) => ({
      name,
      path: entry.path,
      registered: entry.registered,
    }));
  }

  async status(matrix: string): Promise<MatrixStatus> {
    const manifest = await this.loadManifest(matrix);
    return {
      name: manifest.name,
      created: manifest.created,
      dir: this.matrixDir(matrix),
      projects: Object.entries(manifest.projects).map(([name, entry]) => ({
        name,
        path: entry.path,
        registered: entry.registered,
      })),
      verticals: await this.summarizeVerticals(matrix, manifest),
    };
  }

  async readVertical(matrix: string, vertical: string): Promise<string> {
    const file = this.verticalPath(matrix, vertical);
    const manifest = await this.loadManifest(matrix);

    if (!manifest.verticals.includes(vertical)) {
      const available = manifest.verticals.length > 0 ? manifest.verticals.join(', ') : '(none)';
      throw new StoreError(
        ErrorCodes.VERTICAL_NOT_FOUND,
        `Vertical '${vertical}' not registered in '${matrix}'. Available: ${available}`,
        { matrix, vertical, available: manifest.verticals }
      );
    }

    const content = await readOptional(file);
    if (content === null) {
      throw new StoreError(
        ErrorCodes.VERTICAL_FILE_MISSING,
        `File for vertical '${vertical}' not found.`,
        { matrix, vertical, file }
      );
    }
    return content;
  }

  /**
   * All vertical documents that have a file, in manifest order.
   */
  async readAll(matrix: string): Promise<VerticalDocument[]> {
    const manifest = await this.loadManifest(matrix);
    const documents: VerticalDocument[] = [];
    for (const name of manifest.verticals) {
      const content = await readOptional(this.verticalPath(matrix, name));
      if (content !== null) {
        documents.push({ name, content });
      }
    }
    return documents;
  }

  async log(matrix: string, message: string): Promise<void> {
    await this.requireMatrix(matrix);
    await this.changelog(matrix).append(message);
  }

  async changelogEntries(matrix: string, limit?: number): Promise<ChangelogEntry[]> {
    await this.requireMatrix(matrix);
    return this.changelog(matrix).entries(limit);
  }

  /**
   * Find the registration of `cwd` or its nearest registered ancestor.
   */
  async detect(cwd: string = process.cwd()): Promise<DetectResult | null> {
    const found = await findMarker(cwd);
    if (!found || found.state === 'absent') {
      return null;
    }
    if (found.state === 'invalid') {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Marker ${found.file} is invalid: ${found.reason}`,
        { file: found.file }
      );
    }
    const matrixExists = isValidName(found.marker.matrix) && (await this.exists(found.marker.matrix));
    return {
      dir: path.dirname(found.file),
      file: found.file,
      marker: found.marker,
      matrixExists,
    };
  }
}
