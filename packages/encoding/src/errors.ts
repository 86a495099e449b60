/**
 * Encoding Errors
 */

import { ReelgraphError } from '@reelgraph/graph';

/**
 * ffmpeg exited with a non-zero code or reported errors on stderr
 */
export class CommandExecutionError extends ReelgraphError {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly errors: string[],
    details?: Record<string, unknown>
  ) {
    super(message, 'COMMAND_EXECUTION_ERROR', { exitCode, errors, ...details });
    this.name = 'CommandExecutionError';
  }
}

export class ConfigError extends ReelgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}
