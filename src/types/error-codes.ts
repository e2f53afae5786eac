/**
 * Query bus error codes.
 * Ranges: 1-9 = routing, 10-19 = handler execution, 20-29 = update streams,
 * 30+ = configuration.
 */

export enum QueryErrorCode {
  // === ROUTING (1-9) ===
  NO_HANDLER = 1,
  NO_SUITABLE_HANDLER = 2,
  HANDLER_DECLINED = 3,
  INVALID_INTERCEPTION = 4,

  // === HANDLER EXECUTION (10-19) ===
  HANDLER_FAILED = 10,
  QUERY_EXECUTION = 11,
  QUERY_TIMEOUT = 12,
  RESPONSE_CONVERSION = 13,

  // === UPDATE STREAMS (20-29) ===
  UPDATE_DELIVERY = 20,
  STREAM_ALREADY_CONSUMED = 21,
  INVALID_DEMAND = 22,

  // === CONFIGURATION (30-39) ===
  CONFIG_INVALID = 30,
}

/** Check if a code belongs to the routing range (no handler was run to completion). */
export function isRoutingCode(code: QueryErrorCode): boolean {
  return code >= 1 && code < 10;
}

/** Check if a failure with this code may succeed when the query is sent again. */
export function isRecoverableCode(code: QueryErrorCode): boolean {
  return code === QueryErrorCode.QUERY_TIMEOUT || code === QueryErrorCode.NO_SUITABLE_HANDLER;
}

/** Human-readable name for an error code. */
export function getErrorCodeName(code: QueryErrorCode): string {
  return QueryErrorCode[code] ?? 'UNKNOWN';
}

/** String form used in logs and serialized errors, e.g. `E_NO_HANDLER`. */
export function toErrorCodeString(code: QueryErrorCode): string {
  return `E_${getErrorCodeName(code)}`;
}
