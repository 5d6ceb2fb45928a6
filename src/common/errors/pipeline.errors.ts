/**
 * Pipeline error taxonomy
 *
 * - CONFIGURATION / CREDENTIALS: fatal, the operator must fix files or env
 * - TRANSPORT / UNEXPECTED_RESPONSE: fatal for the current collection step
 * - ENTITY_PROCESSING: caught per entity, logged and skipped
 */
export enum ErrorCodes {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  CREDENTIALS_MISSING = 'CREDENTIALS_MISSING',

  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',

  ENTITY_PROCESSING_ERROR = 'ENTITY_PROCESSING_ERROR',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCodes = ErrorCodes.INTERNAL_ERROR,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    code:
      | ErrorCodes.CONFIGURATION_ERROR
      | ErrorCodes.CREDENTIALS_MISSING = ErrorCodes.CONFIGURATION_ERROR,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
  }
}

export class TransportError extends PipelineError {
  constructor(
    message: string,
    readonly status: number | null,
    readonly endpoint: string,
    code:
      | ErrorCodes.TRANSPORT_ERROR
      | ErrorCodes.UNEXPECTED_RESPONSE = ErrorCodes.TRANSPORT_ERROR,
  ) {
    super(message, code, { status, endpoint });
  }
}

export class EntityProcessingError extends PipelineError {
  constructor(
    message: string,
    readonly entity: string,
    cause?: unknown,
  ) {
    super(message, ErrorCodes.ENTITY_PROCESSING_ERROR, {
      entity,
      cause: cause instanceof Error ? cause.message : cause,
    });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
