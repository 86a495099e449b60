/**
 * Command Execution Wrapper
 *
 * Runs an external binary with:
 * - Timeout handling
 * - Output capture with a size cap
 * - Abort signal forwarding
 * - Optional per-line stderr callback (ffmpeg reports everything on stderr)
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  onStderrLine?: (line: string) => void;
}

/**
 * Split a chunk into complete lines, keeping the unterminated tail.
 * ffmpeg progress lines end with CR only, so both CR and LF terminate a line.
 */
export function splitLines(buffer: string): { lines: string[]; rest: string } {
  const parts = buffer.split(/\r\n|\r|\n/);
  const rest = parts.pop() ?? '';
  return { lines: parts.filter(line => line.length > 0), rest };
}

/**
 * Execute an external command
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @returns Promise resolving to CommandResult; rejects only when the process
 * could not be spawned
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    onStderrLine,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let pendingLine = '';

    let killTimer: NodeJS.Timeout | undefined;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    const abort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', abort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        stderrSize += data.length;
      }
      if (onStderrLine) {
        const { lines, rest } = splitLines(pendingLine + chunk);
        pendingLine = rest;
        lines.forEach(onStderrLine);
      }
    });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', abort);
    };

    child.on('close', (code, exitSignal) => {
      cleanup();
      if (onStderrLine && pendingLine.length > 0) {
        onStderrLine(pendingLine);
      }

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
