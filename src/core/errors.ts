/**
 * Query bus error types with error code integration.
 *
 * Every failure the bus surfaces is a QueryBusError subclass so callers can
 * branch on `code` without string matching.
 */

import {
  QueryErrorCode,
  getErrorCodeName,
  isRecoverableCode,
  toErrorCodeString,
} from '../types/error-codes.js';

/**
 * Structured error class for query bus operations.
 * Carries an error code, human-readable message, and optional details.
 */
export class QueryBusError extends Error {
  readonly code: QueryErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: QueryErrorCode,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'QueryBusError';
    this.code = code;
    this.details = options?.details;
  }

  /** True when sending the same query again may succeed. */
  get recoverable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for logs. */
  toJSON(): Record<string, unknown> {
    return {
      code: toErrorCodeString(this.code),
      name: getErrorCodeName(this.code),
      message: this.message,
      ...(this.details && { details: this.details }),
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    };
  }
}

/** No subscription exists for the query name and response type. */
export class NoHandlerForQueryError extends QueryBusError {
  constructor(queryName: string, responseType: string) {
    super(
      QueryErrorCode.NO_HANDLER,
      `No handler found for ${queryName} with response type ${responseType}`,
      { details: { queryName, responseType } },
    );
    this.name = 'NoHandlerForQueryError';
  }
}

/** Handlers exist, but every one of them declined this query instance. */
export class NoSuitableHandlerError extends QueryBusError {
  constructor(queryName: string, responseType: string, candidates: number) {
    super(
      QueryErrorCode.NO_SUITABLE_HANDLER,
      `No suitable handler was found for ${queryName} with response type ${responseType}`,
      { details: { queryName, responseType, candidates } },
    );
    this.name = 'NoSuitableHandlerError';
  }
}

/**
 * Thrown by a handler (or an interceptor on its behalf) that cannot answer
 * this particular query instance. The bus moves on to the next candidate;
 * callers never see this error from `query()`.
 */
export class HandlerDeclinedError extends QueryBusError {
  constructor(reason = 'Handler declined the query') {
    super(QueryErrorCode.HANDLER_DECLINED, reason);
    this.name = 'HandlerDeclinedError';
  }
}

/** A chosen handler (or its interceptors) threw. */
export class QueryHandlerExecutionError extends QueryBusError {
  constructor(queryName: string, cause: unknown) {
    super(
      QueryErrorCode.HANDLER_FAILED,
      `Handler for ${queryName} failed: ${describeCause(cause)}`,
      { details: { queryName }, cause },
    );
    this.name = 'QueryHandlerExecutionError';
  }
}

/** The promise returned by a handler rejected. */
export class QueryExecutionError extends QueryBusError {
  constructor(queryName: string, cause: unknown) {
    super(
      QueryErrorCode.QUERY_EXECUTION,
      `Error happened while trying to execute query handler for ${queryName}: ${describeCause(cause)}`,
      { details: { queryName }, cause },
    );
    this.name = 'QueryExecutionError';
  }
}

/** A scatter-gather handler did not answer within the remaining deadline. */
export class QueryTimeoutError extends QueryBusError {
  constructor(queryName: string, remainingMs: number) {
    super(
      QueryErrorCode.QUERY_TIMEOUT,
      remainingMs <= 0
        ? `Deadline for ${queryName} passed before the handler was invoked`
        : `Handler for ${queryName} did not answer within ${remainingMs}ms`,
      { details: { queryName, remainingMs } },
    );
    this.name = 'QueryTimeoutError';
  }
}

/** The response type could not convert a handler result or an update. */
export class ResponseConversionError extends QueryBusError {
  constructor(expected: string, issues: string[]) {
    super(
      QueryErrorCode.RESPONSE_CONVERSION,
      `Cannot convert value to ${expected}${issues.length > 0 ? `: ${issues.join('; ')}` : ''}`,
      { details: { expected, issues } },
    );
    this.name = 'ResponseConversionError';
  }
}

/** Pushing an update to one subscriber failed. Only that subscriber's stream ends. */
export class UpdateDeliveryError extends QueryBusError {
  constructor(message: string, cause?: unknown) {
    super(QueryErrorCode.UPDATE_DELIVERY, message, { cause });
    this.name = 'UpdateDeliveryError';
  }
}

/** An update stream accepts exactly one consumer. */
export class StreamAlreadyConsumedError extends QueryBusError {
  constructor(queryName: string) {
    super(
      QueryErrorCode.STREAM_ALREADY_CONSUMED,
      `Update stream for ${queryName} already has a consumer`,
      { details: { queryName } },
    );
    this.name = 'StreamAlreadyConsumedError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
