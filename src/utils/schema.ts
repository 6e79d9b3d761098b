/**
 * Schema-validated loading of JSON and YAML files.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile, writeFile } from './file-system.js';

export type FileFormat = 'json' | 'yaml';

function parseContent(content: string, format: FileFormat): unknown {
  try {
    return format === 'json' ? JSON.parse(content) : parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse ${format.toUpperCase()}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Parse and validate content with a Zod schema.
 * Schema failures carry `invalidCode` so callers can tell a bad manifest from a bad config.
 */
export function parseWithSchema<T extends z.ZodType>(
  content: string,
  schema: T,
  format: FileFormat,
  invalidCode: string = ErrorCodes.PARSE_ERROR
): z.infer<T> {
  const parsed = parseContent(content, format);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      invalidCode,
      `${format.toUpperCase()} validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load a file and validate it. Errors are re-thrown with the file path attached.
 */
export async function loadWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T,
  format: FileFormat,
  invalidCode?: string
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { filePath }
    );
  }

  try {
    return parseWithSchema(content, schema, format, invalidCode);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod issues into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const issuePath = e.path.map(String).join('.');
      return issuePath ? `${issuePath}: ${e.message}` : e.message;
    })
    .join('; ');
}
