/**
 * Gateway Errors
 *
 * Every error carries a stable code and the HTTP status it maps to.
 * The global error handler in middleware/errorHandler.ts turns them
 * into the `{ error, timestamp }` envelope.
 */

export type GatewayErrorCode =
  | 'VALIDATION_ERROR'
  | 'BACKEND_UNAVAILABLE'
  | 'MALFORMED_ACL'
  | 'UPSTREAM_GENERATION_FAILURE'
  | 'PDF_PROCESSING_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNAUTHENTICATED';

export class GatewayError extends Error {
  constructor(
    readonly code: GatewayErrorCode,
    message: string,
    readonly status: 400 | 401 | 500 | 502 | 503,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

/** Client error; never retried */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

/** A single backend call failed or timed out. Recovered inside the fan-out. */
export class BackendUnavailableError extends GatewayError {
  constructor(
    readonly backend: string,
    message: string,
    readonly timedOut = false,
    options?: { cause?: unknown },
  ) {
    super('BACKEND_UNAVAILABLE', message, 503, options);
    this.name = 'BackendUnavailableError';
  }
}

/** Access-control attributes could not be parsed. Recovered with an empty policy. */
export class MalformedAclError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_ACL', message, 500, options);
    this.name = 'MalformedAclError';
  }
}

export class UpstreamGenerationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_GENERATION_FAILURE', message, 500, options);
    this.name = 'UpstreamGenerationError';
  }
}

export class PdfProcessingError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PDF_PROCESSING_FAILED', message, 500, options);
    this.name = 'PdfProcessingError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message, 500);
    this.name = 'ConfigurationError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
