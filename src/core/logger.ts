/**
 * Centralized pino logger factory for the query bus.
 *
 * Singleton pattern. Uses pino-roll for file rotation when a log file is
 * configured, stderr otherwise. Uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: string;
  /** Log file path. Empty string logs to stderr. */
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
}

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging section of the bus configuration
 * @param baseDir - Directory a relative `filePath` resolves against
 */
export function initLogger(config: LoggerConfig, baseDir: string = process.cwd()): pino.Logger {
  if (!config.filePath) {
    rootLogger = pino(
      { level: config.level, formatters, timestamp: pino.stdTimeFunctions.isoTime },
      pino.destination(2),
    );
    return rootLogger;
  }

  const dest = resolve(baseDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    { level: config.level, formatters, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a child of a shared warn-level
 * stderr logger so library consumers that never configure logging still see
 * warnings. Bus components call this at log time, so initLogger also applies
 * to buses built before it.
 *
 * @param subsystem - Logical subsystem name (e.g. 'query-bus', 'scatter-gather')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino({ level: 'warn', formatters }, pino.destination(2));
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
