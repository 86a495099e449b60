/**
 * Stream Metadata from ffprobe
 *
 * Turns an ffprobe report into the metadata graph sources start from.
 * Scenes are left unnamed; `Input` names them after its file.
 */

import {
  audioMeta,
  videoMeta,
  type AudioMeta,
  type SourceStreamInit,
  type VideoMeta,
} from '@reelgraph/graph';
import type { FFProbeResult, FFProbeStream } from './probes/ffprobe.js';

/**
 * Parse `30000/1001`, `16:9` or a plain number. Unparseable and
 * zero-denominator values give undefined.
 */
export function parseRational(value: string | undefined, precision?: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parts = value.split(/[:/]/);
  const parsed =
    parts.length === 2 ? Number(parts[0]) / Number(parts[1]) : Number(value);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  if (precision === undefined) {
    return parsed;
  }
  const factor = 10 ** precision;
  return Math.round(parsed * factor) / factor;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function videoFromProbe(stream: FFProbeStream, duration: number): VideoMeta {
  const width = stream.width ?? 0;
  const height = stream.height ?? 0;
  const sar = parseRational(stream.sample_aspect_ratio, 3);
  // 0:1 means "unknown" in ffprobe output
  const par = sar !== undefined && sar > 0 ? sar : 1;
  const dar = parseRational(stream.display_aspect_ratio, 3);

  return videoMeta({
    start: parseNumber(stream.start_time) ?? 0,
    duration,
    bitrate: parseNumber(stream.bit_rate) ?? 0,
    width,
    height,
    par,
    dar: dar !== undefined && dar > 0 ? dar : undefined,
    frameRate: parseRational(stream.r_frame_rate) || parseRational(stream.avg_frame_rate) || undefined,
    frames: parseNumber(stream.nb_frames),
    pixelFormat: stream.pix_fmt ?? null,
  });
}

function audioFromProbe(stream: FFProbeStream, duration: number): AudioMeta {
  return audioMeta({
    start: parseNumber(stream.start_time) ?? 0,
    duration,
    bitrate: parseNumber(stream.bit_rate) ?? 0,
    sampleRate: parseNumber(stream.sample_rate) ?? 0,
    channels: stream.channels ?? 0,
  });
}

/**
 * Video and audio streams of a probed file, in file order. Streams without
 * a duration of their own take the container's.
 */
export function metadataFromProbe(result: FFProbeResult): SourceStreamInit[] {
  const containerDuration = parseNumber(result.format.duration) ?? 0;
  const streams: SourceStreamInit[] = [];

  for (const stream of result.streams) {
    const duration = parseNumber(stream.duration) ?? containerDuration;
    if (stream.codec_type === 'video') {
      streams.push({ kind: 'video', meta: videoFromProbe(stream, duration) });
    } else if (stream.codec_type === 'audio') {
      streams.push({ kind: 'audio', meta: audioFromProbe(stream, duration) });
    }
  }

  return streams;
}
