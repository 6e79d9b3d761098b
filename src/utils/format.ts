/**
 * Formatting helpers for timestamps and display strings.
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local date and minute, e.g. `2026-01-15 09:30`.
 */
export function formatMinute(date: Date): string {
  return `${formatDay(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Local calendar day, e.g. `2026-01-15`.
 */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * `1 project`, `3 projects`.
 */
export function pluralize(count: number, noun: string, plural: string = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : plural}`;
}

/**
 * Turn a slug into a heading: hyphens become spaces and every letter that follows
 * a non-letter is capitalized, so `env-variables` -> `Env Variables` and
 * `env_variables` -> `Env_Variables`.
 */
export function titleCase(slug: string): string {
  return slug
    .replace(/-/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => `${before}${letter.toUpperCase()}`);
}
