/**
 * Output Codecs
 *
 * Encoder selection and parameters for one output stream. Every option is
 * rendered with the stream specifier of the codec (`-b:v:0`), so several
 * codecs of one kind can share an output file.
 */

import { Codec, KIND_TAG, parseParams } from '@reelgraph/graph';
import { z } from 'zod';

const bitrate = z.union([z.string().regex(/^\d+(\.\d+)?[kKmM]?$/), z.number().int().positive()]);

export const videoCodecSchema = z.object({
  codec: z.string().min(1).default('libx264'),
  bitrate: bitrate.optional(),
  maxrate: bitrate.optional(),
  bufsize: bitrate.optional(),
  preset: z.string().optional(),
  crf: z.number().min(0).max(63).optional(),
  profile: z.string().optional(),
  level: z.string().optional(),
  tune: z.string().optional(),
  pixFmt: z.string().optional(),
  gop: z.number().int().positive().optional(),
  // Device the encoder reads frames from (h264_nvenc on cuda frames)
  hardware: z.string().optional(),
  extraArgs: z.array(z.string()).default([]),
});

export const audioCodecSchema = z.object({
  codec: z.string().min(1).default('aac'),
  bitrate: bitrate.optional(),
  sampleRate: z.number().int().positive().optional(),
  channels: z.number().int().positive().optional(),
  channelLayout: z.string().optional(),
  extraArgs: z.array(z.string()).default([]),
});

export type VideoCodecOptions = z.input<typeof videoCodecSchema>;
export type AudioCodecOptions = z.input<typeof audioCodecSchema>;

/**
 * `[-flag:v:0, value]` when the value is set
 */
function option(flag: string, spec: string, value: string | number | undefined): string[] {
  return value === undefined ? [] : [`-${flag}:${spec}`, String(value)];
}

export class VideoCodec extends Codec {
  public readonly options: z.output<typeof videoCodecSchema>;

  constructor(options: VideoCodecOptions = {}) {
    const parsed = parseParams(videoCodecSchema, options, 'video codec');
    super('video', parsed.codec);
    this.options = parsed;
  }

  override get hardware(): string | null | undefined {
    return this.options.hardware;
  }

  override renderArgs(): string[] {
    const args = super.renderArgs();
    if (this.codecName === 'copy') {
      return args;
    }
    const spec = `${KIND_TAG[this.kind]}:${this.index}`;
    const o = this.options;
    return [
      ...args,
      ...option('b', spec, o.bitrate),
      ...option('maxrate', spec, o.maxrate),
      ...option('bufsize', spec, o.bufsize),
      ...option('preset', spec, o.preset),
      ...option('crf', spec, o.crf),
      ...option('profile', spec, o.profile),
      ...option('level', spec, o.level),
      ...option('tune', spec, o.tune),
      ...option('pix_fmt', spec, o.pixFmt),
      ...option('g', spec, o.gop),
      ...o.extraArgs,
    ];
  }
}

export class AudioCodec extends Codec {
  public readonly options: z.output<typeof audioCodecSchema>;

  constructor(options: AudioCodecOptions = {}) {
    const parsed = parseParams(audioCodecSchema, options, 'audio codec');
    super('audio', parsed.codec);
    this.options = parsed;
  }

  override renderArgs(): string[] {
    const args = super.renderArgs();
    if (this.codecName === 'copy') {
      return args;
    }
    const spec = `${KIND_TAG[this.kind]}:${this.index}`;
    const o = this.options;
    return [
      ...args,
      ...option('b', spec, o.bitrate),
      ...option('ar', spec, o.sampleRate),
      ...option('ac', spec, o.channels),
      ...option('channel_layout', spec, o.channelLayout),
      ...o.extraArgs,
    ];
  }
}

/**
 * Stream copy codec. ffmpeg cannot copy a filtered stream, so it must read
 * a source stream directly.
 */
export function copyCodec(kind: 'video' | 'audio'): Codec {
  return new Codec(kind, 'copy');
}
