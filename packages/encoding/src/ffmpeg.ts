/**
 * FFmpeg Program
 *
 * Collects inputs and outputs, renders the filter graph connecting them and
 * turns everything into an ffmpeg argument list. Execution goes through
 * `executeCommand`; stderr is scanned for error markers, which ffmpeg prints
 * with `-loglevel level+...` even when it exits with code 0.
 */

import {
  Codec,
  ConnectionError,
  FilterGraph,
  KIND_TAG,
  Source,
  UnresolvedReferenceError,
  analyzeBuffering,
  type BufferingOptions,
  type BufferingReport,
} from '@reelgraph/graph';
import { createLogger, executeCommand, formatDuration } from '@reelgraph/utils';
import { CommandExecutionError } from './errors.js';
import type { Input } from './inputs.js';
import type { Output } from './outputs.js';
import { parseProgressLine, type FFmpegProgress } from './progress.js';

const log = createLogger({ module: 'ffmpeg' });

const ERROR_MARKERS = ['[error]', '[fatal]'];

export interface FFmpegOptions {
  ffmpegPath?: string;
  /** `-loglevel` value; error scanning needs the `level+` prefix */
  loglevel?: string;
  overwrite?: boolean;
  timeout?: number;
  globalArgs?: string[];
}

export interface RunOptions {
  cwd?: string;
  signal?: AbortSignal;
  onProgress?: (progress: FFmpegProgress) => void;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

/**
 * Quote an argument for display in a POSIX shell
 */
export function quoteArg(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Lines of ffmpeg output carrying an error or fatal level marker
 */
export function findErrors(lines: string[]): string[] {
  return lines.filter(line => ERROR_MARKERS.some(marker => line.includes(marker)));
}

export class FFmpeg {
  private readonly inputs: Input[] = [];
  private readonly outputs: Output[] = [];
  private readonly ffmpegPath: string;
  private readonly loglevel: string | undefined;
  private readonly overwrite: boolean;
  private readonly timeout: number;
  private readonly globalArgs: string[];

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.loglevel = options.loglevel ?? 'level+info';
    this.overwrite = options.overwrite ?? true;
    this.timeout = options.timeout ?? 3600000; // 1 hour default
    this.globalArgs = options.globalArgs ?? [];
  }

  addInput(input: Input): Input {
    if (this.inputs.includes(input)) {
      return input;
    }
    const reads = this.inputs.filter(other => other.file === input.file).length;
    this.inputs.push(input);
    if (reads > 0) {
      input.markReread(reads + 1);
    }
    return input;
  }

  addOutput(output: Output): Output {
    if (!this.outputs.includes(output)) {
      this.outputs.push(output);
    }
    return output;
  }

  /** Codecs of every output, in output order */
  get codecs(): Codec[] {
    return this.outputs.flatMap(output => [...output.codecs]);
  }

  /**
   * Build the argument list (without the binary)
   */
  render(): string[] {
    const args: string[] = [...this.globalArgs];

    if (this.loglevel) {
      args.push('-loglevel', this.loglevel);
    }
    if (this.overwrite) {
      args.push('-y');
    }

    for (const input of this.inputs) {
      args.push(...input.renderArgs());
    }

    const codecs = this.codecs;
    this.checkCopyCodecs(codecs);
    const graph = new FilterGraph(this.inputs, codecs).render();
    if (graph.form === 'full') {
      args.push('-filter_complex', graph.text);
    }

    for (const output of this.outputs) {
      for (const codec of output.codecs) {
        const map = graph.maps.get(codec);
        if (!map) {
          throw new UnresolvedReferenceError(`${codec} of ${output.file} has no stream`, {
            output: output.file,
          });
        }
        args.push('-map', map);
        args.push(...codec.renderArgs());

        const chain = graph.chains.get(codec);
        if (chain) {
          args.push(`-filter:${KIND_TAG[codec.kind]}:${codec.index}`, chain);
        }
      }
      args.push(...output.renderArgs());
    }

    return args;
  }

  /**
   * Full command line, quoted for a shell
   */
  getCommand(): string {
    return [this.ffmpegPath, ...this.render()].map(quoteArg).join(' ');
  }

  /**
   * Predict whether ffmpeg will have to buffer decoded frames of a source
   * read in different orders by different codecs
   */
  checkBuffering(options: BufferingOptions = {}): BufferingReport {
    return analyzeBuffering(this.codecs, options);
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    const args = this.render();

    const report = this.checkBuffering();
    for (const [stream, hazards] of report.hazards) {
      for (const hazard of hazards) {
        log.warn(
          {
            stream,
            held: String(hazard.held.codec),
            ahead: String(hazard.ahead.codec),
            lag: hazard.lag,
          },
          'Source is read in diverging orders, ffmpeg will buffer decoded frames'
        );
      }
    }

    log.info({ command: this.getCommand() }, 'Running ffmpeg');

    const duration = this.expectedDuration();
    const stderrLines: string[] = [];
    const result = await executeCommand(this.ffmpegPath, args, {
      cwd: options.cwd,
      signal: options.signal,
      timeout: this.timeout,
      onStderrLine: line => {
        const progress = parseProgressLine(line, duration);
        if (progress) {
          options.onProgress?.(progress);
          return;
        }
        stderrLines.push(line);
        log.debug({ line }, 'ffmpeg output');
      },
    });

    const errors = findErrors(stderrLines);

    if (result.timedOut) {
      throw new CommandExecutionError(
        `ffmpeg timed out after ${formatDuration(this.timeout)}`,
        result.exitCode,
        errors,
        { timeout: this.timeout }
      );
    }
    if (result.exitCode !== 0 || errors.length > 0) {
      throw new CommandExecutionError(
        `ffmpeg failed with exit code ${result.exitCode}${errors.length > 0 ? `: ${errors[0]}` : ''}`,
        result.exitCode,
        errors
      );
    }

    log.info({ duration: result.duration }, 'ffmpeg finished');

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      duration: result.duration,
    };
  }

  /**
   * Longest known duration among the encoded streams
   */
  private expectedDuration(): number | undefined {
    const durations = this.codecs.map(codec => codec.input?.meta?.duration ?? 0);
    const longest = Math.max(0, ...durations);
    return longest > 0 ? longest : undefined;
  }

  private checkCopyCodecs(codecs: Codec[]): void {
    for (const codec of codecs) {
      const input = codec.input;
      if (codec.codecName === 'copy' && input && !(input.owner instanceof Source)) {
        throw new ConnectionError(`${codec} cannot read filtered stream ${input}`, {
          codec: String(codec),
          stream: String(input),
        });
      }
    }
  }
}
