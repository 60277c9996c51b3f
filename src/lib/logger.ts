/**
 * Production-safe logging utility
 *
 * - Outside production: All logs are visible
 * - NODE_ENV=production: Only errors and warnings (no debug noise)
 *
 * Usage:
 *   import { log } from './lib/logger';
 *   log.debug('Detailed info', data);  // Silent in production
 *   log.info('Important info');        // Silent in production
 *   log.warn('Warning');               // Always visible
 *   log.error('Error', err);           // Always visible
 */

const isDev = process.env.NODE_ENV !== "production";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (isDev) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (isDev) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },
  };
}

// Pre-configured loggers for common modules
export const log = createLogger("App");
export const pipelineLog = createLogger("Pipeline");
export const parserLog = createLogger("Parser");
export const serialLog = createLogger("Serial");
export const driverLog = createLogger("Driver");
export const configLog = createLogger("Config");
export const sourceLog = createLogger("Source");
export const streamLog = createLogger("Stream");

// Factory for custom loggers
export { createLogger };
