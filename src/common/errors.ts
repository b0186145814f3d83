/**
 * Application error taxonomy.
 *
 * `retriable` marks failures the retry policy may attempt again; everything
 * else is final for the current step.
 */

import { AxiosError } from 'axios';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly retriable: boolean = false,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid request') {
    super(400, 'VALIDATION_ERROR', message);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication failed') {
    super(401, 'AUTHENTICATION_ERROR', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(404, 'NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(message = 'A trade is already in flight for this account') {
    super(409, 'TRADE_IN_FLIGHT', message);
  }
}

export class NoDataError extends AppError {
  constructor(message = 'No data available') {
    super(422, 'NO_DATA', message);
  }
}

export class ExternalApiError extends AppError {
  constructor(message = 'External API call failed', retriable = false) {
    super(502, 'EXTERNAL_API_ERROR', message, retriable);
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(message = 'Upstream service unavailable') {
    super(503, 'UPSTREAM_UNAVAILABLE', message, true);
  }
}

export class TimeoutError extends AppError {
  constructor(label: string, ms: number) {
    super(504, 'TIMEOUT', `${label} timed out after ${ms}ms`, true);
  }
}

export class PersistenceError extends AppError {
  constructor(message = 'Persistence operation failed') {
    super(500, 'PERSISTENCE_ERROR', message);
  }
}

/**
 * Transient = worth retrying: retriable AppErrors, network-level axios
 * failures, 429 and 5xx upstream responses.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof AppError) return err.retriable;

  if (err instanceof AxiosError) {
    if (!err.response) return true;
    const status = err.response.status;
    return status === 429 || status >= 500;
  }

  return false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
