import { HttpException, Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import {
  RecordConflictException,
  RecordNotFoundException,
  StorageUnavailableException,
  ValidationFailedException,
} from '../exceptions/persistence.exceptions';

/**
 * SQLSTATE codes the persistence layer reacts to
 */
export const PostgresErrorCode = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  CHECK_VIOLATION: '23514',
  NOT_NULL_VIOLATION: '23502',
  INVALID_TEXT_REPRESENTATION: '22P02',
  NUMERIC_VALUE_OUT_OF_RANGE: '22003',
} as const;

const INVALID_INPUT_CODES: ReadonlySet<string> = new Set<string>([
  PostgresErrorCode.CHECK_VIOLATION,
  PostgresErrorCode.NOT_NULL_VIOLATION,
  PostgresErrorCode.INVALID_TEXT_REPRESENTATION,
  PostgresErrorCode.NUMERIC_VALUE_OUT_OF_RANGE,
]);

/**
 * Extract the Postgres SQLSTATE from a failed TypeORM query
 */
export function getPostgresErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

/**
 * Map a repository failure onto the persistence error taxonomy.
 * Errors that already are HTTP exceptions pass through unchanged.
 */
export function translateStorageError(
  error: unknown,
  operation: string,
): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  const code = getPostgresErrorCode(error);
  if (code === PostgresErrorCode.UNIQUE_VIOLATION) {
    return new RecordConflictException(`${operation}: record already exists`);
  }
  if (code === PostgresErrorCode.FOREIGN_KEY_VIOLATION) {
    return new RecordNotFoundException(
      `${operation}: referenced record does not exist`,
    );
  }
  if (code !== undefined && INVALID_INPUT_CODES.has(code)) {
    return new ValidationFailedException(
      `${operation}: rejected by database constraint (${code})`,
    );
  }

  return new StorageUnavailableException(
    `${operation} failed: storage unavailable`,
  );
}

/**
 * Run a repository call and rethrow its failure as a persistence exception.
 * Storage outages are logged with the original stack.
 */
export async function withStorageErrors<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const translated = translateStorageError(error, operation);
    if (translated instanceof StorageUnavailableException) {
      logger.error(
        `${operation} failed`,
        error instanceof Error ? error.stack : String(error),
      );
    }
    throw translated;
  }
}
