/**
 * Query Bus Dispatch Layer -- Public API
 *
 * Single entry point for the dispatch layer: the bus, its message model,
 * response type negotiation, interceptors and subscription query streams.
 */

export {
  SimpleQueryBus,
  DEFAULT_SCATTER_GATHER_TIMEOUT_MS,
  type QueryBus,
  type SimpleQueryBusOptions,
} from './query-bus.js';
export { createQueryBus } from './factory.js';
export { DefaultQueryGateway, type QueryGateway } from './gateway.js';
export {
  createQueryMessage,
  createSubscriptionQueryMessage,
  createResponseMessage,
  createUpdateMessage,
  defaultQueryName,
  GenericQueryMessage,
  GenericSubscriptionQueryMessage,
  GenericSubscriptionQueryUpdateMessage,
  type MetaData,
  type QueryMessage,
  type QueryResponseMessage,
  type SubscriptionQueryMessage,
  type SubscriptionQueryUpdateMessage,
} from './messages.js';
export {
  defineType,
  returns,
  returnsOptional,
  returnsMany,
  instanceOf,
  optionalInstanceOf,
  multipleInstancesOf,
  describeDeclaredType,
  type CheckResult,
  type Cardinality,
  type DeclaredType,
  type ResponseType,
  type TypeToken,
} from './response-types.js';
export type { QuerySubscription } from './registry.js';
export { compose, applyDispatchInterceptors } from './middleware/pipeline.js';
export { createCorrelationInterceptor, type CorrelationOptions } from './middleware/correlation.js';
export { createLoggingInterceptor } from './middleware/logging.js';
export {
  createTransactionInterceptor,
  TRANSACTION_RESOURCE,
  type Transaction,
  type TransactionManager,
} from './middleware/transaction.js';
export {
  createErrorHandler,
  LoggingQueryInvocationErrorHandler,
  IgnoringQueryInvocationErrorHandler,
  RethrowingQueryInvocationErrorHandler,
  type ErrorPolicy,
} from './lib/error-handlers.js';
export { noOpMessageMonitor } from './monitor.js';
export {
  DefaultUnitOfWork,
  defaultUnitOfWorkFactory,
  type UnitOfWork,
  type UnitOfWorkFactory,
  type UnitOfWorkPhase,
} from './unit-of-work.js';
export type { QueryUpdateEmitter, SessionFilter } from './subscription/channel.js';
export { DefaultSubscriptionQueryResult, type SubscriptionQueryResult } from './subscription/result.js';
export {
  UpdateStream,
  DEFAULT_BACKPRESSURE,
  type OverflowStrategy,
  type StreamSubscription,
  type SubscriptionQueryBackpressure,
  type UpdateSubscriber,
} from './subscription/update-stream.js';
export type {
  DispatchInterceptor,
  HandlerInterceptor,
  HandlerNext,
  MessageMonitor,
  MonitorCallback,
  QueryHandler,
  QueryInvocationErrorHandler,
  Registration,
  TimeUnit,
} from './types.js';
