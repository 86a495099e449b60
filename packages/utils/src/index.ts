/**
 * @reelgraph/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - Type guards
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  splitLines,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// Type guards
export { isObject } from './guards.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatSeconds,
} from './time.js';

// Logger
export { logger, createLogger, type Logger, type LoggerContext } from './logger.js';
