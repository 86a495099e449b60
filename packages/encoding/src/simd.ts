/**
 * SIMD Helper
 *
 * Processes one input into several outputs at once: `video` and `audio`
 * are stream vectors with one element per output, and `program()` wires
 * every codec left untouched straight to the source.
 */

import { InvalidParamsError, StreamVector, type Codec, type StreamKind } from '@reelgraph/graph';
import { FFmpeg, type FFmpegOptions } from './ffmpeg.js';
import type { Input } from './inputs.js';
import type { Output } from './outputs.js';

export class Simd {
  private readonly inputs: Input[];

  constructor(
    public readonly source: Input,
    public readonly outputs: Output[],
    private readonly options: FFmpegOptions = {}
  ) {
    Simd.validateInput(source);
    const issues = outputs
      .filter(output => output.codecs.length === 0)
      .map(output => `${output.file}: codecs must be set for output file`);
    if (issues.length > 0) {
      throw new InvalidParamsError('simd', issues);
    }
    this.inputs = [source];
  }

  /**
   * Register an additional input, such as a logo to overlay
   */
  addInput(input: Input): Input {
    Simd.validateInput(input);
    if (!this.inputs.includes(input)) {
      this.inputs.push(input);
    }
    return input;
  }

  get video(): StreamVector {
    return this.vector('video');
  }

  get audio(): StreamVector {
    return this.vector('audio');
  }

  /**
   * First codec of `kind` of every output
   */
  codecs(kind: StreamKind): Codec[] {
    return this.outputs.map(output => {
      const codec = output.codecs.find(c => c.kind === kind);
      if (!codec) {
        throw new InvalidParamsError('simd', [`${output.file}: no ${kind} codec`]);
      }
      return codec;
    });
  }

  /**
   * Connect the vector's elements to the matching codec of every output
   */
  finalize(vector: StreamVector): void {
    const [first] = vector.streams;
    if (!first) {
      return;
    }
    vector.finalize(this.codecs(first.kind));
  }

  /**
   * Program reading every registered input into every output
   */
  program(): FFmpeg {
    for (const kind of ['video', 'audio'] as const) {
      if (!this.source.streams.some(stream => stream.kind === kind)) {
        continue;
      }
      const stream = this.source.stream(kind);
      for (const output of this.outputs) {
        for (const codec of output.codecs) {
          if (codec.kind === kind && !codec.input) {
            stream.pipe(codec);
          }
        }
      }
    }

    const ffmpeg = new FFmpeg(this.options);
    this.inputs.forEach(input => ffmpeg.addInput(input));
    this.outputs.forEach(output => ffmpeg.addOutput(output));
    return ffmpeg;
  }

  private vector(kind: StreamKind): StreamVector {
    const stream = this.source.stream(kind);
    return new StreamVector(this.outputs.map(() => stream));
  }

  private static validateInput(input: Input): void {
    const issues = input.streams
      .filter(stream => stream.meta === null)
      .map(stream => `${stream}: stream metadata must be set for input file`);
    if (input.streams.length === 0) {
      issues.push(`${input.file}: streams must be set for input file`);
    }
    if (issues.length > 0) {
      throw new InvalidParamsError('simd', issues);
    }
  }
}
