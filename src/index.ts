/**
 * query-bus - in-process query bus with direct dispatch, scatter-gather and
 * subscription queries.
 */

// Types
export {
  QueryErrorCode,
  getErrorCodeName,
  isRecoverableCode,
  isRoutingCode,
  toErrorCodeString,
} from './types/error-codes.js';

// Core
export {
  QueryBusError,
  NoHandlerForQueryError,
  NoSuitableHandlerError,
  HandlerDeclinedError,
  QueryHandlerExecutionError,
  QueryExecutionError,
  QueryTimeoutError,
  ResponseConversionError,
  UpdateDeliveryError,
  StreamAlreadyConsumedError,
} from './core/errors.js';
export { initLogger, getLogger, closeLogger, type LoggerConfig } from './core/logger.js';
export {
  loadConfig,
  validateConfig,
  ConfigValidationError,
  DEFAULTS,
  CONFIG_FILE_NAME,
  type LoadConfigOptions,
  type QueryBusConfig,
} from './core/config.js';

// Dispatch
export * from './dispatch/index.js';
