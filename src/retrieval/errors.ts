import { AppError } from '../logger.js';
import { ExecutionErrorCategory } from './types.js';

export type FailureCategory = ExecutionErrorCategory | 'NotFound';

const ERROR_CODES: Record<FailureCategory, { code: string; statusCode: number }> = {
  AuthenticationFailed: { code: 'AUTHENTICATION_FAILED', statusCode: 401 },
  NotFound: { code: 'REMOTE_NOT_FOUND', statusCode: 404 },
  NetworkError: { code: 'NETWORK_ERROR', statusCode: 503 },
  ProtocolError: { code: 'PROTOCOL_ERROR', statusCode: 502 },
  NotificationFailed: { code: 'NOTIFICATION_FAILED', statusCode: 502 },
  Cancelled: { code: 'CANCELLED', statusCode: 499 },
  InternalError: { code: 'INTERNAL_ERROR', statusCode: 500 },
};

/**
 * Categorized failure raised by adapters, credential resolution and emission
 */
export class RetrievalError extends AppError {
  constructor(
    message: string,
    public readonly category: FailureCategory,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, ERROR_CODES[category].code, ERROR_CODES[category].statusCode, context);
    this.name = 'RetrievalError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  get retryable(): boolean {
    return this.category === 'NetworkError';
  }
}

export class ValidationError extends AppError {
  constructor(public readonly problems: string[]) {
    super(
      problems.length === 1 ? problems[0] : `Validation failed: ${problems.join('; ')}`,
      'VALIDATION_ERROR',
      400,
      { problems }
    );
    this.name = 'ValidationError';
  }
}

export class ConcurrencyConflictError extends AppError {
  constructor(entity: string, id: string, expectedVersion: number) {
    super(
      `${entity} ${id} was modified concurrently (expected version ${expectedVersion})`,
      'CONCURRENCY_CONFLICT',
      409,
      { id, expectedVersion }
    );
    this.name = 'ConcurrencyConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Map anything thrown during an execution onto a failure category
 */
export function toRetrievalError(error: unknown): RetrievalError {
  if (error instanceof RetrievalError) {
    return error;
  }
  if (isAbortError(error)) {
    return new RetrievalError('Execution was cancelled', 'Cancelled', undefined, { cause: error });
  }
  return new RetrievalError(errorMessage(error), 'InternalError', undefined, { cause: error });
}

/**
 * Category recorded on an execution; NotFound never terminates an execution
 */
export function toExecutionCategory(category: FailureCategory): ExecutionErrorCategory {
  return category === 'NotFound' ? 'ProtocolError' : category;
}
