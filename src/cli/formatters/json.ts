import type { IFormatter } from './types.js';
import type {
  DetectResult,
  MatrixStatus,
  MatrixSummary,
  ProjectSummary,
  VerticalSummary,
} from '../../core/matrix/types.js';
import type { ChangelogEntry } from '../../core/matrix/changelog.js';
import type { DoctorReport } from '../../core/matrix/doctor.js';
import { describeVerticalStatus } from '../../core/matrix/vertical.js';

/**
 * JSON output formatter for the assistant and other scripts.
 * Keys are snake_case like the on-disk manifest.
 */
export class JsonFormatter implements IFormatter {
  private stringify(value: unknown): string {
    return JSON.stringify(value, null, 2);
  }

  private transformVertical(v: VerticalSummary): Record<string, unknown> {
    return {
      name: v.name,
      file: v.file,
      state: v.status.state,
      lines: v.status.state === 'content' ? v.status.lines : 0,
      summary: describeVerticalStatus(v.status),
    };
  }

  formatMatrixList(matrices: MatrixSummary[]): string {
    return this.stringify(
      matrices.map((m) => ({
        name: m.name,
        project_count: m.projectCount,
        vertical_count: m.verticalCount,
      }))
    );
  }

  formatStatus(status: MatrixStatus): string {
    return this.stringify({
      name: status.name,
      created: status.created,
      dir: status.dir,
      projects: status.projects,
      verticals: status.verticals.map((v) => this.transformVertical(v)),
    });
  }

  formatProjects(_matrix: string, projects: ProjectSummary[]): string {
    return this.stringify(projects);
  }

  formatVerticals(_matrix: string, verticals: VerticalSummary[]): string {
    return this.stringify(verticals.map((v) => this.transformVertical(v)));
  }

  formatChangelog(_matrix: string, entries: ChangelogEntry[]): string {
    return this.stringify(entries);
  }

  formatDetect(result: DetectResult): string {
    return this.stringify({
      ...result.marker,
      dir: result.dir,
      matrix_exists: result.matrixExists,
    });
  }

  formatDoctor(report: DoctorReport): string {
    return this.stringify({
      matrices: report.matrices,
      ok: report.issues.length === 0,
      issues: report.issues,
    });
  }
}
