/**
 * @reelgraph/encoding
 *
 * Input and output files, codecs and the ffmpeg program built from a
 * filter graph.
 */

export { CommandExecutionError, ConfigError } from './errors.js';
export { loadConfig, type EncodingConfig } from './config.js';
export { Input, type InputOptions } from './inputs.js';
export { Output, type OutputOptions } from './outputs.js';
export {
  VideoCodec,
  AudioCodec,
  copyCodec,
  videoCodecSchema,
  audioCodecSchema,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './codecs.js';
export {
  FFmpeg,
  quoteArg,
  findErrors,
  type FFmpegOptions,
  type RunOptions,
  type RunResult,
} from './ffmpeg.js';
export { Simd } from './simd.js';
export { parseProgressLine, type FFmpegProgress } from './progress.js';
