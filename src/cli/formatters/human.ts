import chalk from 'chalk';
import type { IFormatter, FormatOptions } from './types.js';
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
import { formatDay, pluralize } from '../../utils/format.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatMatrixList(matrices: MatrixSummary[]): string {
    if (matrices.length === 0) {
      return 'No matrices found.';
    }
    return matrices
      .map((m) =>
        `  ${this.colorize(m.name, 'cyan')} (${pluralize(m.projectCount, 'project')}, ${pluralize(m.verticalCount, 'vertical')})`
      )
      .join('\n');
  }

  formatStatus(status: MatrixStatus): string {
    const lines: string[] = [];

    lines.push(`${this.colorize('Matrix:', 'bold')} ${status.name}`);
    lines.push(`${this.colorize('Created:', 'bold')} ${this.formatCreated(status.created)}`);

    lines.push('');
    lines.push(this.colorize(`Projects (${status.projects.length}):`, 'bold'));
    for (const project of status.projects) {
      lines.push(`  - ${project.name}: ${project.path}`);
    }
    if (status.projects.length === 0) {
      lines.push(`  ${this.colorize('(none)', 'dim')}`);
    }

    lines.push('');
    lines.push(this.colorize(`Verticals (${status.verticals.length}):`, 'bold'));
    for (const vertical of status.verticals) {
      lines.push(`  - ${vertical.name}: ${this.formatVerticalStatus(vertical)}`);
    }
    if (status.verticals.length === 0) {
      lines.push(`  ${this.colorize('(none)', 'dim')}`);
    }

    return lines.join('\n');
  }

  formatProjects(matrix: string, projects: ProjectSummary[]): string {
    if (projects.length === 0) {
      return `No projects in '${matrix}'.`;
    }
    return projects.map((p) => `  ${this.colorize(p.name, 'cyan')}: ${p.path}`).join('\n');
  }

  formatVerticals(matrix: string, verticals: VerticalSummary[]): string {
    if (verticals.length === 0) {
      return `No verticals in '${matrix}'.`;
    }
    return verticals
      .map((v) => `  ${this.colorize(v.name, 'cyan')}: ${this.formatVerticalStatus(v)}`)
      .join('\n');
  }

  formatChangelog(matrix: string, entries: ChangelogEntry[]): string {
    if (entries.length === 0) {
      return `No changelog entries in '${matrix}'.`;
    }
    return entries
      .map((e) => `  ${this.colorize(e.timestamp, 'dim')}  ${e.message}`)
      .join('\n');
  }

  formatDetect(result: DetectResult): string {
    return JSON.stringify(result.marker, null, 2);
  }

  formatDoctor(report: DoctorReport): string {
    const checked = pluralize(report.matrices.length, 'matrix', 'matrices');
    if (report.issues.length === 0) {
      return this.colorize(`No issues found (${checked} checked)`, 'green');
    }

    const lines = report.issues.map(
      (issue) => `  ${this.colorize(issue.kind, 'yellow')} [${issue.matrix}] ${issue.message}`
    );
    lines.push('');
    lines.push(this.colorize(`${pluralize(report.issues.length, 'issue')} found (${checked} checked)`, 'red'));
    return lines.join('\n');
  }

  /**
   * Local calendar day, matching the changelog headings. Unparseable values print as stored.
   */
  private formatCreated(created: string): string {
    const date = new Date(created);
    return Number.isNaN(date.getTime()) ? created : formatDay(date);
  }

  private formatVerticalStatus(vertical: VerticalSummary): string {
    const text = describeVerticalStatus(vertical.status);
    return vertical.status.state === 'content' ? text : this.colorize(text, 'dim');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
