/**
 * Builds a SimpleQueryBus from the loaded configuration.
 */

import type { QueryBusConfig } from '../core/config.js';
import { createErrorHandler } from './lib/error-handlers.js';
import { SimpleQueryBus, type SimpleQueryBusOptions } from './query-bus.js';

/**
 * Create a bus whose scatter-gather timeout, error policy and default
 * backpressure come from `config`. Explicit `overrides` win.
 *
 * @example
 * const config = await loadConfig();
 * initLogger(config.logging);
 * const bus = createQueryBus(config);
 */
export function createQueryBus(
  config: QueryBusConfig,
  overrides: SimpleQueryBusOptions = {},
): SimpleQueryBus {
  return new SimpleQueryBus({
    errorHandler: createErrorHandler(config.scatterGather.errorPolicy),
    defaultScatterGatherTimeoutMs: config.scatterGather.defaultTimeoutMs,
    defaultBackpressure: {
      overflow: config.updates.overflow,
      bufferSize: config.updates.bufferSize === 'unbounded' ? Infinity : config.updates.bufferSize,
    },
    ...overrides,
  });
}
