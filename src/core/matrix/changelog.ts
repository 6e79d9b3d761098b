/**
 * Per-matrix changelog. Entries are inserted right below the `# Changelog`
 * heading, so the file reads newest first.
 */
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { formatMinute } from '../../utils/format.js';

export const CHANGELOG_FILE = 'changelog.md';
export const CHANGELOG_HEADER = '# Changelog';

export interface ChangelogEntry {
  /** `YYYY-MM-DD HH:MM`, local time */
  timestamp: string;
  message: string;
}

export function formatEntry(message: string, at: Date): string {
  return `\n## ${formatMinute(at)}\n- ${message}\n`;
}

/**
 * Insert an entry after the first line of an existing changelog.
 */
export function insertEntry(content: string, entry: string): string {
  const newline = content.indexOf('\n');
  if (newline === -1) {
    return `${content}\n${entry}`;
  }
  return `${content.slice(0, newline)}\n${entry}${content.slice(newline + 1)}`;
}

/**
 * Parse entries in file order. A heading with several bullets yields one entry per bullet.
 */
export function parseChangelog(content: string): ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  let timestamp: string | null = null;

  for (const line of content.split('\n')) {
    if (line.startsWith('## ')) {
      timestamp = line.slice(3).trim();
    } else if (timestamp !== null && line.startsWith('- ')) {
      entries.push({ timestamp, message: line.slice(2).trim() });
    }
  }

  return entries;
}

export class Changelog {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Start a fresh changelog with its first entry.
   */
  async create(message: string): Promise<void> {
    await writeFile(this.filePath, `${CHANGELOG_HEADER}\n${formatEntry(message, this.now())}`);
  }

  async append(message: string): Promise<void> {
    const entry = formatEntry(message, this.now());
    if (!(await fileExists(this.filePath))) {
      await writeFile(this.filePath, `${CHANGELOG_HEADER}\n${entry}`);
      return;
    }
    const content = await readFile(this.filePath);
    await writeFile(this.filePath, insertEntry(content, entry));
  }

  async entries(limit?: number): Promise<ChangelogEntry[]> {
    if (!(await fileExists(this.filePath))) {
      return [];
    }
    const entries = parseChangelog(await readFile(this.filePath));
    return limit === undefined ? entries : entries.slice(0, limit);
  }
}
