import { SecurityError, ErrorCodes } from '../../utils/errors.js';

export type NameKind = 'matrix' | 'project' | 'vertical';

/** One path segment; no separators, no leading dot. */
const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Vertical files share the matrix directory with the changelog. */
const RESERVED_VERTICALS = new Set(['changelog']);

export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Matrix and vertical names become directory and file names under the store root,
 * so they are held to a single safe path segment. Project names follow the same rule.
 */
export function assertValidName(kind: NameKind, name: string): void {
  if (!isValidName(name)) {
    throw new SecurityError(
      ErrorCodes.INVALID_NAME,
      `Invalid ${kind} name '${name}': use letters, digits, '.', '_' or '-', starting with a letter or digit`,
      { kind, name }
    );
  }
  if (kind === 'vertical' && RESERVED_VERTICALS.has(name.toLowerCase())) {
    throw new SecurityError(
      ErrorCodes.INVALID_NAME,
      `Vertical name '${name}' is reserved`,
      { kind, name }
    );
  }
}
