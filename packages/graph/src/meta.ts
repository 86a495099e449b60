/**
 * Stream Metadata
 *
 * Describes what a stream carries: kind, dimensions, duration and the
 * ordered list of source intervals (scenes) it is assembled from.
 * Metadata is optional on every stream; `null` means "unknown" and is
 * propagated as such by every filter.
 */

export type StreamKind = 'video' | 'audio';

export type KindTag = 'v' | 'a';

export const KIND_TAG: Record<StreamKind, KindTag> = {
  video: 'v',
  audio: 'a',
};

/**
 * Contiguous span `[start, end]` of source stream `stream`, placed at
 * `position` in the timeline of the stream that carries this scene.
 */
export interface Scene {
  stream: string | null;
  start: number;
  end: number;
  position: number;
}

/**
 * Hardware device a stream was uploaded to
 */
export interface Device {
  hardware: string;
  name: string;
}

interface BaseMeta {
  /** First timestamp of the stream, seconds */
  start: number;
  duration: number;
  /** Bits per second, 0 when unknown */
  bitrate: number;
  scenes: Scene[];
  /** Source stream ids read to produce this stream, no contiguous duplicates */
  streams: string[];
}

export interface VideoMeta extends BaseMeta {
  kind: 'video';
  width: number;
  height: number;
  /** Pixel aspect ratio */
  par: number;
  /** Display aspect ratio, NaN for zero height */
  dar: number;
  frameRate: number;
  frames: number;
  device: Device | null;
  pixelFormat: string | null;
}

export interface AudioMeta extends BaseMeta {
  kind: 'audio';
  sampleRate: number;
  channels: number;
  samples: number;
}

export type Metadata = VideoMeta | AudioMeta;

export interface VideoMetaInit {
  stream?: string | null;
  start?: number;
  duration?: number;
  bitrate?: number;
  width?: number;
  height?: number;
  par?: number;
  dar?: number;
  frameRate?: number;
  frames?: number;
  pixelFormat?: string | null;
}

export interface AudioMetaInit {
  stream?: string | null;
  start?: number;
  duration?: number;
  bitrate?: number;
  sampleRate?: number;
  channels?: number;
  samples?: number;
}

function singleScene(stream: string | null, start: number, duration: number): Scene {
  return { stream, start, end: start + duration, position: start };
}

/**
 * Build video metadata for a whole source stream
 */
export function videoMeta(init: VideoMetaInit = {}): VideoMeta {
  const stream = init.stream ?? null;
  const start = init.start ?? 0;
  const duration = init.duration ?? 0;
  const width = init.width ?? 0;
  const height = init.height ?? 0;
  const par = init.par ?? 1;
  const dar = init.dar ?? (height === 0 ? NaN : (width / height) * par);

  let frameRate = init.frameRate ?? 0;
  let frames = init.frames ?? 0;
  if (init.frameRate === undefined && duration > 0) {
    frameRate = frames / duration;
  }
  if (init.frames === undefined) {
    frames = Math.round(duration * frameRate);
  }

  return {
    kind: 'video',
    start,
    duration,
    bitrate: init.bitrate ?? 0,
    scenes: [singleScene(stream, start, duration)],
    streams: stream ? [stream] : [],
    width,
    height,
    par,
    dar,
    frameRate,
    frames,
    device: null,
    pixelFormat: init.pixelFormat ?? null,
  };
}

/**
 * Build audio metadata for a whole source stream
 */
export function audioMeta(init: AudioMetaInit = {}): AudioMeta {
  const stream = init.stream ?? null;
  const start = init.start ?? 0;
  const duration = init.duration ?? 0;
  const sampleRate = init.sampleRate ?? 0;

  return {
    kind: 'audio',
    start,
    duration,
    bitrate: init.bitrate ?? 0,
    scenes: [singleScene(stream, start, duration)],
    streams: stream ? [stream] : [],
    sampleRate,
    channels: init.channels ?? 0,
    samples: init.samples ?? Math.round(duration * sampleRate),
  };
}

/**
 * Concatenate stream id lists, dropping contiguous duplicates
 */
export function joinStreams(lists: string[][]): string[] {
  const result: string[] = [];
  for (const list of lists) {
    for (const id of list) {
      if (result[result.length - 1] !== id) {
        result.push(id);
      }
    }
  }
  return result;
}

/**
 * Copy of `meta` with a new duration; frame and sample counts follow it
 */
export function withDuration(meta: Metadata, duration: number): Metadata {
  if (meta.kind === 'video') {
    return { ...meta, duration, frames: Math.round(duration * meta.frameRate) };
  }
  return { ...meta, duration, samples: Math.round(duration * meta.sampleRate) };
}
