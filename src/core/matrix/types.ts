import type { ProjectMarker } from './schema.js';
import type { VerticalStatus } from './vertical.js';

export interface MatrixStoreOptions {
  /** Clock used for manifest and changelog timestamps */
  now?: () => Date;
  /** Verticals added to every matrix created by init */
  defaultVerticals?: string[];
}

export interface InitResult {
  created: boolean;
  dir: string;
  verticals: string[];
}

export interface RegisterOptions {
  /** Project root; relative paths resolve against `cwd` */
  path?: string;
  cwd?: string;
  /** Take over a directory whose marker names another registration */
  force?: boolean;
}

export interface RegisterResult {
  path: string;
  markerFile: string;
  /** Path of an earlier registration under the same name, when it differed */
  previousPath?: string;
  /** Registration the directory's marker pointed at before --force */
  takenOver?: ProjectMarker;
}

export interface UnregisterResult {
  path: string;
  markerRemoved: boolean;
  /** Set when a marker exists at the path but names something else */
  foreignMarker?: ProjectMarker;
}

export interface AddVerticalResult {
  added: boolean;
  file: string;
}

export interface RemoveVerticalResult {
  fileRemoved: boolean;
}

export interface MatrixSummary {
  name: string;
  projectCount: number;
  verticalCount: number;
}

export interface ProjectSummary {
  name: string;
  path: string;
  registered: string;
}

export interface VerticalSummary {
  name: string;
  file: string;
  status: VerticalStatus;
}

export interface VerticalDocument {
  name: string;
  content: string;
}

export interface MatrixStatus {
  name: string;
  created: string;
  dir: string;
  projects: ProjectSummary[];
  verticals: VerticalSummary[];
}

export interface DetectResult {
  /** Directory holding the marker */
  dir: string;
  file: string;
  marker: ProjectMarker;
  /** False when the marker names a matrix that is not in the store */
  matrixExists: boolean;
}
