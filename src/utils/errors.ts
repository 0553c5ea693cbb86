/**
 * Standard error classes for schema-derive
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  INVALID_NAME = "INVALID_NAME",
  RANGE_ERROR = "RANGE_ERROR",
  TYPE_CONFLICT = "TYPE_CONFLICT",
  INVALID_STRUCTURE = "INVALID_STRUCTURE",
  DEPTH_LIMIT_EXCEEDED = "DEPTH_LIMIT_EXCEEDED",
  NO_SCHEMA_DERIVED = "NO_SCHEMA_DERIVED",
}

export class SchemaDeriveError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SchemaDeriveError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/** Empty field or record name */
export class InvalidNameError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.INVALID_NAME, message, details, options);
    this.name = "InvalidNameError";
  }
}

/** Integer literal outside the signed 64-bit range in strict mode */
export class IntegerRangeError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.RANGE_ERROR, message, details, options);
    this.name = "IntegerRangeError";
  }
}

export class TypeConflictError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.TYPE_CONFLICT, message, details, options);
    this.name = "TypeConflictError";
  }
}

/** Record shapes that can be neither merged nor turned into a union */
export class InvalidStructureError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.INVALID_STRUCTURE, message, details, options);
    this.name = "InvalidStructureError";
  }
}

export class DepthLimitError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.DEPTH_LIMIT_EXCEEDED, message, details, options);
    this.name = "DepthLimitError";
  }
}

export class NoSchemaDerivedError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.NO_SCHEMA_DERIVED, message, details, options);
    this.name = "NoSchemaDerivedError";
  }
}

export class InputReadError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

export class ConfigError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends SchemaDeriveError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * Wrap an unknown thrown value, keeping errors that already carry a code
 */
export function toSchemaDeriveError(error: unknown): SchemaDeriveError {
  if (error instanceof SchemaDeriveError) {
    return error;
  }
  return new SchemaDeriveError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
