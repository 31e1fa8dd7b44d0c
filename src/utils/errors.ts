// Error taxonomy for admission, dependency gating, tool dispatch and streaming
// HTTP-facing errors share one response shape via AppError

export enum ErrorCode {
  INVALID_INPUT = 'invalid_input',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
  ) {
    super(message);
    this.name = 'AppError';
  }

  static badRequest(message: string = 'Bad request'): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400);
  }

  static internal(message: string = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
}

export function formatErrorResponse(error: AppError): ErrorResponse {
  return {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };
}

// ---------------------------------------------------------------------------
// Admission

export type AdmissionErrorKind = 'Empty' | 'TooLong' | 'InvalidEncoding';

export class AdmissionError extends Error {
  override readonly name = 'AdmissionError';

  constructor(
    readonly kind: AdmissionErrorKind,
    message: string,
  ) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Dependencies

export type Dependency = 'ToolBackend' | 'ReasoningBackend';

/**
 * Thrown synchronously by a breaker that refuses a call.
 * The guarded dependency was not invoked.
 */
export class CircuitOpenError extends Error {
  override readonly name = 'CircuitOpenError';

  constructor(
    readonly dependency: Dependency,
    readonly retryAfterMs: number,
  ) {
    super(`Circuit breaker for ${dependency} is open. Service temporarily unavailable.`);
  }
}

export class DependencyTimeoutError extends Error {
  override readonly name = 'DependencyTimeoutError';

  constructor(
    readonly dependency: Dependency,
    readonly timeoutMs: number,
  ) {
    super(`${dependency} did not respond within ${timeoutMs}ms`);
  }
}

// ---------------------------------------------------------------------------
// Tool dispatch

export type ToolErrorKind = 'NotFound' | 'InvalidArguments' | 'Timeout' | 'DependencyUnavailable';

/** Domain error reported by the Tool Backend for a single operation. */
export class ToolBackendError extends Error {
  override readonly name = 'ToolBackendError';

  constructor(
    readonly kind: Extract<ToolErrorKind, 'NotFound' | 'InvalidArguments'>,
    message: string,
  ) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Orchestration

export type OrchestratorErrorKind = 'DependencyUnavailable' | 'UpstreamFailure';

export class OrchestratorError extends Error {
  override readonly name = 'OrchestratorError';

  constructor(
    readonly kind: OrchestratorErrorKind,
    message: string,
    readonly recoverable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The request's stream was cancelled while a call was pending. */
export class RequestCancelledError extends Error {
  override readonly name = 'RequestCancelledError';

  constructor(readonly reason: unknown = 'cancelled') {
    super(`Request cancelled: ${String(reason)}`);
  }
}

/** Emitting after a terminal event. Never user-facing. */
export class StreamContractError extends Error {
  override readonly name = 'StreamContractError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
