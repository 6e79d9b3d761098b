/**
 * Formatter type definitions.
 */
import type {
  DetectResult,
  MatrixStatus,
  MatrixSummary,
  ProjectSummary,
  VerticalSummary,
} from '../../core/matrix/types.js';
import type { ChangelogEntry } from '../../core/matrix/changelog.js';
import type { DoctorReport } from '../../core/matrix/doctor.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Renders store query results for stdout.
 */
export interface IFormatter {
  formatMatrixList(matrices: MatrixSummary[]): string;
  formatStatus(status: MatrixStatus): string;
  formatProjects(matrix: string, projects: ProjectSummary[]): string;
  formatVerticals(matrix: string, verticals: VerticalSummary[]): string;
  formatChangelog(matrix: string, entries: ChangelogEntry[]): string;
  formatDetect(result: DetectResult): string;
  formatDoctor(report: DoctorReport): string;
}
