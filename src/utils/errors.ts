/**
 * Standard error classes for typesmith
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
  INFERENCE_ERROR = "INFERENCE_ERROR",
  NAMING_COLLISION = "NAMING_COLLISION",
  UNSUPPORTED_CONSTRUCT = "UNSUPPORTED_CONSTRUCT",
  UNREGISTERED_TARGET = "UNREGISTERED_TARGET",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class TypesmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TypesmithError";
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

export class ParseError extends TypesmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.PARSE_ERROR, message, details, options);
    this.name = "ParseError";
  }
}

export type InferenceFailure = "EMPTY_INPUT";

export class InferenceError extends TypesmithError {
  constructor(
    public readonly reason: InferenceFailure,
    message: string,
    details?: ErrorDetails,
  ) {
    super(ErrorCode.INFERENCE_ERROR, message, { reason, ...details });
    this.name = "InferenceError";
  }
}

export class NamingCollisionError extends TypesmithError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.NAMING_COLLISION, message, details);
    this.name = "NamingCollisionError";
  }
}

export class UnsupportedConstructError extends TypesmithError {
  constructor(
    public readonly target: string,
    message: string,
    details?: ErrorDetails,
  ) {
    super(ErrorCode.UNSUPPORTED_CONSTRUCT, message, { target, ...details });
    this.name = "UnsupportedConstructError";
  }
}

export class UnregisteredTargetError extends TypesmithError {
  constructor(
    public readonly target: string,
    available: string[],
  ) {
    super(
      ErrorCode.UNREGISTERED_TARGET,
      `No renderer registered for target "${target}"`,
      { target, available },
    );
    this.name = "UnregisteredTargetError";
  }
}

export class ConfigError extends TypesmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends TypesmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Wrap anything thrown into a TypesmithError, keeping the original as cause
 */
export function toTypesmithError(error: unknown): TypesmithError {
  if (error instanceof TypesmithError) {
    return error;
  }
  return new TypesmithError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
