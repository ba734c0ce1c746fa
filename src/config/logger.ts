import pino from 'pino';
import { getEnvironmentConfig, type EnvironmentConfig } from './env.js';

// Venue credentials and bridge tokens, wherever they appear one level down
const REDACTED_PATHS = ['*.apiKey', '*.secretKey', '*.passphrase', '*.token', '*.Authorization'];

export function buildLoggerOptions(env: EnvironmentConfig): pino.LoggerOptions {
  const options: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: 'execution-core', pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  if (env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,service',
      },
    };
  }

  return options;
}

let logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!logger) {
    logger = pino(buildLoggerOptions(getEnvironmentConfig()));
  }
  return logger;
}

/**
 * Child logger tagged with the owning component, e.g. `connection-manager`.
 */
export function getComponentLogger(
  component: string,
  bindings: Record<string, unknown> = {}
): pino.Logger {
  return getLogger().child({ component, ...bindings });
}
