import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { IFormatter, FormatOptions } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { IFormatter, FormatOptions, OutputFormat } from './types.js';

/**
 * Pick the formatter for a command's --json flag.
 */
export function createFormatter(options: Partial<FormatOptions> & { json?: boolean } = {}): IFormatter {
  if (options.json || options.format === 'json') {
    return new JsonFormatter();
  }
  return new HumanFormatter({ colors: options.colors });
}
