/**
 * Error classes shared by the inference engine and the HTTP layer
 */

export enum ErrorCode {
  GENERAL_ERROR = 'GENERAL_ERROR',
  SHAPE_ERROR = 'SHAPE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  INGEST_ERROR = 'INGEST_ERROR',
  STATE_ERROR = 'STATE_ERROR'
}

export type ErrorDetails = Record<string, unknown>;

export type ErrorResponse = {
  code: string;
  message: string;
  details?: ErrorDetails;
  cause?: string;
};

export class EngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'EngineError';
  }

  /**
   * Shape used in HTTP error bodies and per-dataset status entries.
   */
  toResponse(): ErrorResponse {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
      ...(this.cause ? { cause: String(this.cause) } : {})
    };
  }
}

/** Structurally invalid input, fatal for one dataset only. */
export class ShapeError extends EngineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SHAPE_ERROR, message, details, options);
    this.name = 'ShapeError';
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = 'ConfigError';
  }
}

export class IngestError extends EngineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INGEST_ERROR, message, details, options);
    this.name = 'IngestError';
  }
}

export class StateError extends EngineError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.STATE_ERROR, message, details, options);
    this.name = 'StateError';
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/** Wraps anything thrown so callers can always report a code. */
export const toEngineError = (err: unknown, code: ErrorCode = ErrorCode.GENERAL_ERROR): EngineError =>
  err instanceof EngineError ? err : new EngineError(code, errorMessage(err), undefined, { cause: err });
