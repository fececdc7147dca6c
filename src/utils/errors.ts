import { HTTP_STATUS } from '../config/constants';

export type ErrorType = 'validation' | 'authentication' | 'not_found' | 'downstream';

/**
 * Base error for failures that map to a specific HTTP response.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly errorType: ErrorType,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, HTTP_STATUS.BAD_REQUEST, 'validation', details);
  }
}

export class AuthenticationError extends GatewayError {
  constructor(message: string, statusCode: number = HTTP_STATUS.FORBIDDEN) {
    super(message, statusCode, 'authentication');
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, HTTP_STATUS.NOT_FOUND, 'not_found');
  }
}

/** A lead could not be captured; the caller must be told. */
export class IngestionError extends GatewayError {
  constructor(message: string, readonly originalError?: unknown) {
    super(message, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'downstream');
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
