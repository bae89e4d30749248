export type LookupErrorKind = 'not_found' | 'timeout' | 'upstream' | 'invalid_response' | 'invalid_record';

export class ExtractionError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single identifier could not be resolved. Retried by the orchestrator. */
export class LookupError extends ExtractionError {
  readonly kind: LookupErrorKind;

  constructor(kind: LookupErrorKind, message: string, options?: { cause?: unknown }) {
    super(`LOOKUP_${kind.toUpperCase()}`, message, options);
    this.kind = kind;
  }
}

export class DataSourceInitError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATA_SOURCE_INIT', message, options);
  }
}

export class CancelledError extends ExtractionError {
  constructor(message = 'Job was cancelled') {
    super('CANCELLED', message);
  }
}

export class JobStateError extends ExtractionError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export class ConfigError extends ExtractionError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ApiErrorBody {
  error: string;
  message: string;
  code: string;
  details?: unknown;
}

export function apiError(error: string, message: string, code: string, details?: unknown): ApiErrorBody {
  return details === undefined ? { error, message, code } : { error, message, code, details };
}
