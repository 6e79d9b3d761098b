import { titleCase, pluralize } from '../../utils/format.js';

export const VERTICAL_EXTENSION = '.md';

export type VerticalStatus =
  | { state: 'missing' }
  | { state: 'empty' }
  | { state: 'content'; lines: number };

export function verticalFileName(vertical: string): string {
  return `${vertical}${VERTICAL_EXTENSION}`;
}

/**
 * Seed document for a new vertical: just its heading.
 */
export function verticalSeed(vertical: string): string {
  return `# ${titleCase(vertical)}\n`;
}

/**
 * Lines that carry content: not blank and not a markdown heading.
 */
export function countContentLines(content: string): number {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#')).length;
}

export function verticalStatus(content: string | null): VerticalStatus {
  if (content === null) {
    return { state: 'missing' };
  }
  const lines = countContentLines(content);
  return lines === 0 ? { state: 'empty' } : { state: 'content', lines };
}

export function describeVerticalStatus(status: VerticalStatus): string {
  switch (status.state) {
    case 'missing':
      return 'no file';
    case 'empty':
      return 'empty';
    case 'content':
      return pluralize(status.lines, 'line');
  }
}
