/**
 * Default message monitors.
 */

import type { MessageMonitor, MonitorCallback } from './types.js';

const NO_OP_CALLBACK: MonitorCallback = {
  reportSuccess: () => {},
  reportFailure: () => {},
  reportIgnored: () => {},
};

/** Monitor that records nothing. Used when the bus is built without one. */
export const noOpMessageMonitor: MessageMonitor<unknown> = {
  onIngested: () => NO_OP_CALLBACK,
};
