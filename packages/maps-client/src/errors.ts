import { type ClassifiedError, permanent, transient } from './classified-error';

export type MapsClientErrorCode =
  | 'TRANSPORT'
  | 'SERVER_ERROR'
  | 'RATE_LIMITED'
  | 'CLIENT_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'APPLICATION_TRANSIENT'
  | 'APPLICATION_PERMANENT'
  | 'INVALID_REQUEST';

type ErrorOptions = {
  status?: number;
  apiStatus?: string;
  url?: string;
  cause?: unknown;
  attempt?: number;
  details?: unknown;
};

export class MapsClientError extends Error {
  readonly code: MapsClientErrorCode;
  readonly status?: number;
  readonly apiStatus?: string;
  readonly url?: string;
  readonly attempt?: number;
  readonly details?: unknown;

  constructor(message: string, code: MapsClientErrorCode, options: ErrorOptions = {}) {
    super(message);
    this.name = 'MapsClientError';
    this.code = code;
    this.status = options.status;
    this.apiStatus = options.apiStatus;
    this.url = options.url;
    this.attempt = options.attempt;
    this.details = options.details;

    if (options.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * Buckets a non-2xx HTTP status into an error code.
 */
export const classifyStatus = (status: number): MapsClientErrorCode => {
  if (status >= 500) {
    return 'SERVER_ERROR';
  }

  if (status === 429) {
    return 'RATE_LIMITED';
  }

  return 'CLIENT_ERROR';
};

export const isTransientCode = (code: MapsClientErrorCode): boolean => {
  switch (code) {
    case 'TRANSPORT':
    case 'SERVER_ERROR':
    case 'RATE_LIMITED':
    case 'APPLICATION_TRANSIENT':
      return true;
    case 'CLIENT_ERROR':
    case 'MALFORMED_RESPONSE':
    case 'APPLICATION_PERMANENT':
    case 'INVALID_REQUEST':
      return false;
  }
};

/**
 * Classifies anything thrown by an attempt. A bare `TypeError` is how fetch rejects on network failure.
 */
export const classifyMapsError = (error: unknown): ClassifiedError<MapsClientError> => {
  const normalized = toMapsClientError(error);
  return isTransientCode(normalized.code) ? transient(normalized) : permanent(normalized);
};

export const toMapsClientError = (error: unknown): MapsClientError => {
  if (error instanceof MapsClientError) {
    return error;
  }

  if (error instanceof TypeError) {
    return new MapsClientError(`Network request failed: ${error.message}`, 'TRANSPORT', { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new MapsClientError(`Unexpected failure: ${message}`, 'CLIENT_ERROR', { cause: error });
};

/**
 * A non-success status reported inside an otherwise successful response body.
 */
export type ApplicationFailure = {
  apiStatus: string;
  message?: string;
  retryable: boolean;
};
