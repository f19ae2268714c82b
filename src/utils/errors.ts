/**
 * Error types and codes for the installer.
 * Every error raised by an installer operation extends InstallerError.
 */

/**
 * Base error class for all installer errors.
 */
export class InstallerError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InstallerError';
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
 * Configuration errors (loading, parsing, schema validation of adopt.yaml).
 */
export class ConfigError extends InstallerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid user input that is not a security concern (unknown component, bad menu choice).
 */
export class ValidationError extends InstallerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Lookups against the live catalog that found nothing.
 */
export class CatalogError extends InstallerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CatalogError';
  }
}

/**
 * Environment and filesystem errors.
 */
export class SystemError extends InstallerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Item names that would escape the catalog directory.
 */
export class SecurityError extends InstallerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Validation
  INVALID_COMPONENT_NAME: 'INVALID_COMPONENT_NAME',
  INVALID_MENU_CHOICE: 'INVALID_MENU_CHOICE',

  // Security
  INVALID_ITEM_NAME: 'INVALID_ITEM_NAME',

  // Catalog
  COMPONENT_NOT_FOUND: 'COMPONENT_NOT_FOUND',

  // System
  NOT_A_GIT_REPOSITORY: 'NOT_A_GIT_REPOSITORY',
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',
  SAME_SOURCE_AND_TARGET: 'SAME_SOURCE_AND_TARGET',

  // Config
  PARSE_ERROR: 'PARSE_ERROR',
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code of a thrown filesystem error, if any.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
