/**
 * Standard error classes for flatcol
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  UNSUPPORTED_TYPE = "UNSUPPORTED_TYPE",
  MISSING_FIELD = "MISSING_FIELD",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class FlatcolError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FlatcolError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * A declared type token has no concrete storage type
 */
export class UnsupportedTypeError extends FlatcolError {
  constructor(
    public readonly field: string,
    public readonly declaredTypes: unknown,
  ) {
    super(
      ErrorCode.UNSUPPORTED_TYPE,
      `Data types ${JSON.stringify(declaredTypes)} for field ${field} are not supported`,
      { field, declaredTypes },
    );
    this.name = "UnsupportedTypeError";
  }
}

/**
 * The column order names a field the flattened schema does not have
 */
export class MissingFieldError extends FlatcolError {
  constructor(public readonly field: string) {
    super(
      ErrorCode.MISSING_FIELD,
      `Field ${field} is not present in the flattened schema`,
      { field },
    );
    this.name = "MissingFieldError";
  }
}

export class ConfigError extends FlatcolError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends FlatcolError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ProtocolError extends FlatcolError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.PROTOCOL_ERROR, message, details, options);
    this.name = "ProtocolError";
  }
}

/**
 * Wrap anything thrown into a FlatcolError, keeping flatcol errors as they are
 */
export function toFlatcolError(error: unknown): FlatcolError {
  if (error instanceof FlatcolError) {
    return error;
  }
  return new FlatcolError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
