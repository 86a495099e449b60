/**
 * Logger
 *
 * Pino-based structured logger shared by every reelgraph package.
 * Graph rendering logs at debug level, command execution at info.
 * Logs go to stderr: the CLI prints commands and JSON on stdout.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

const options = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'reelgraph',
    env: NODE_ENV,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,service,env',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export type Logger = typeof logger;

/** Bindings of a package logger; `module` names the emitting module */
export interface LoggerContext {
  module: string;
  [key: string]: unknown;
}

/**
 * Create a child logger for one module, e.g. `createLogger({ module: 'filter-graph' })`
 */
export function createLogger(context: LoggerContext): Logger {
  return logger.child(context);
}
