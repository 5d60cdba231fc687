import { HttpException, HttpStatus } from '@nestjs/common';

export type PersistenceErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'STORAGE_UNAVAILABLE';

/**
 * Base class for errors raised by the URL registry and the analysis recorder.
 * `retryable` tells the caller whether repeating the same request may succeed.
 */
export abstract class PersistenceException extends HttpException {
  protected constructor(
    readonly errorCode: PersistenceErrorCode,
    readonly retryable: boolean,
    status: HttpStatus,
    error: string,
    message: string,
    details?: string[],
  ) {
    super(
      {
        statusCode: status,
        message,
        error,
        errorCode,
        retryable,
        ...(details && { details }),
      },
      status,
    );
  }
}

/**
 * Exception thrown when input is malformed or out of range
 */
export class ValidationFailedException extends PersistenceException {
  constructor(message: string, details?: string[]) {
    super(
      'VALIDATION_ERROR',
      false,
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      message,
      details,
    );
  }
}

/**
 * Exception thrown when a referenced URL or result does not exist
 */
export class RecordNotFoundException extends PersistenceException {
  constructor(message: string) {
    super('NOT_FOUND', false, HttpStatus.NOT_FOUND, 'Not Found', message);
  }
}

/**
 * Exception thrown when a concurrent insert violated a uniqueness constraint
 * and the surviving record could not be found again
 */
export class RecordConflictException extends PersistenceException {
  constructor(message: string) {
    super('CONFLICT', false, HttpStatus.CONFLICT, 'Conflict', message);
  }
}

/**
 * Exception thrown when the database cannot serve the request.
 * Callers may retry with backoff.
 */
export class StorageUnavailableException extends PersistenceException {
  constructor(message: string) {
    super(
      'STORAGE_UNAVAILABLE',
      true,
      HttpStatus.SERVICE_UNAVAILABLE,
      'Service Unavailable',
      message,
    );
  }
}
