/**
 * Standard error classes for Seedsmith
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  SCHEMA_LOAD_ERROR = "SCHEMA_LOAD_ERROR",
  INTROSPECTION_ERROR = "INTROSPECTION_ERROR",
  GENERATION_ERROR = "GENERATION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class SeedsmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SeedsmithError";
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

export class ConfigError extends SeedsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends SeedsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class SchemaLoadError extends SeedsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_LOAD_ERROR, message, details, options);
    this.name = "SchemaLoadError";
  }
}

export class IntrospectionError extends SeedsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INTROSPECTION_ERROR, message, details, options);
    this.name = "IntrospectionError";
  }
}

export class GenerationError extends SeedsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.GENERATION_ERROR, message, details, options);
    this.name = "GenerationError";
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
