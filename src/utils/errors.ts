/**
 * Error types and codes for matrix-brain.
 * Every error raised by the store extends MatrixBrainError so the CLI can
 * report it uniformly.
 */

/**
 * Base error class for all matrix-brain errors.
 */
export class MatrixBrainError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MatrixBrainError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Store configuration errors (config.yaml loading and validation).
 */
export class ConfigError extends MatrixBrainError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Registry state errors: unknown matrices, projects, verticals, marker conflicts.
 */
export class StoreError extends MatrixBrainError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StoreError';
  }
}

/**
 * System errors (unreadable or malformed files).
 */
export class SystemError extends MatrixBrainError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Names that would escape the store root.
 */
export class SecurityError extends MatrixBrainError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Store errors
  MATRIX_NOT_FOUND: 'MATRIX_NOT_FOUND',
  PROJECT_NOT_FOUND: 'PROJECT_NOT_FOUND',
  VERTICAL_NOT_FOUND: 'VERTICAL_NOT_FOUND',
  VERTICAL_FILE_MISSING: 'VERTICAL_FILE_MISSING',
  MARKER_CONFLICT: 'MARKER_CONFLICT',
  SKILL_EXISTS: 'SKILL_EXISTS',

  // System errors
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_MANIFEST: 'INVALID_MANIFEST',

  // Config errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',

  // Security errors
  INVALID_NAME: 'INVALID_NAME',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
