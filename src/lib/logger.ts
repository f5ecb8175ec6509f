// Path: src/lib/logger.ts
// Centralized Pino logger for env-resolver

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for interactive terminals.
 * stdout is reserved for `--stdout` and `--json` output, so every log line goes to stderr.
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (!process.stderr.isTTY) {
    return undefined;
  }

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:HH:MM:ss',
      ignore: 'pid,hostname,service',
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: warn)
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'warn',
    transport,
    base: {
      service: 'env-resolver',
      pid: process.pid,
    },
    // Resolved values are secrets more often than not
    redact: {
      paths: ['value', 'stdout', 'stderr', 'entry.value', 'entries[*].value'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : pino.destination(2)
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'resolver' });
 * log.info({ key: 'DB_HOST' }, 'Entry resolved');
 */
function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const configLogger = createLogger({ module: 'config' });
export const templateLogger = createLogger({ module: 'template' });
export const resolverLogger = createLogger({ module: 'resolver' });
export const commandLogger = createLogger({ module: 'command' });
export const outputLogger = createLogger({ module: 'output' });
