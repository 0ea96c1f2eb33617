/**
 * Error types and codes for csproj-forge.
 * Every fatal condition raised by the generator extends GeneratorError.
 */

/**
 * Base error class for all generator errors.
 * Carries a stable code so callers can branch without parsing messages.
 */
export class GeneratorError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeneratorError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends GeneratorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Module declaration errors (duplicate names, unreadable declarations).
 */
export class OwnershipError extends GeneratorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OwnershipError';
  }
}

/**
 * Template errors (missing project or solution templates).
 */
export class TemplateError extends GeneratorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Project registry errors (missing or malformed registry).
 */
export class RegistryError extends GeneratorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends GeneratorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Module declarations (M001-M004)
  DUPLICATE_MODULE: 'M001',
  NO_DECLARATIONS: 'M002',
  MISSING_DECLARATION: 'M003',
  INVALID_DECLARATION: 'M004',

  // Templates (T001-T003)
  MISSING_TEMPLATE: 'T001',
  MISSING_SOLUTION_TEMPLATE: 'T002',
  INVALID_EDITOR_VERSION: 'T003',

  // Registry and solution (R001-R005)
  MISSING_REGISTRY: 'R001',
  INVALID_REGISTRY: 'R002',
  NO_SOLUTION: 'R003',
  NO_PROJECTS_IN_SOLUTION: 'R004',
  MISSING_DESCRIPTOR: 'R005',

  // System (S001-S003)
  PARSE_ERROR: 'S001',
  CONFIG_LOAD_ERROR: 'S002',
  INVALID_ARGUMENT: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
