/**
 * Buffering Analysis
 *
 * ffmpeg reads every input once, in source time order, and hands frames
 * to all branches that need them. When one codec needs a source instant
 * later in its output than another codec needs a later instant, the
 * earlier frames wait in memory until the first codec catches up. This
 * module predicts such waits from stream metadata.
 */

import { Filter, type Codec, type Stream } from './base.js';
import { MetadataRequiredError } from './errors.js';
import type { Scene } from './meta.js';

export interface TimelineEntry {
  codec: Codec;
  /** Source time span */
  start: number;
  end: number;
  /** Output position of `start` for this codec */
  position: number;
}

export interface SceneUse {
  codec: Codec;
  scene: Scene;
}

export interface BufferingHazard {
  stream: string;
  /** Scene whose frames are decoded before its codec needs them */
  held: SceneUse;
  /** Scene read later in source time but needed earlier */
  ahead: SceneUse;
  /** Seconds the held frames stay in memory */
  lag: number;
}

export interface BufferingReport {
  hazards: Map<string, BufferingHazard[]>;
  timelines: Map<string, TimelineEntry[]>;
  /** Codecs without metadata; nothing is asserted about them */
  skipped: Codec[];
}

export interface BufferingOptions {
  /** Throw MetadataRequiredError instead of skipping codecs without metadata */
  requireMetadata?: boolean;
  /** Lag in seconds below which no hazard is reported */
  tolerance?: number;
}

const DEFAULT_TOLERANCE = 0.001;

/**
 * Scenes read for a codec: its own stream's scenes plus the scenes of
 * inputs that filters consume without passing on. Null when some of that
 * metadata is unknown.
 */
function consumedScenes(codec: Codec): Scene[] | null {
  const input = codec.input;
  if (!input?.meta) {
    return null;
  }
  const scenes = [...input.meta.scenes];
  const seen = new Set<Filter>();

  const visit = (stream: Stream): boolean => {
    const owner = stream.owner;
    if (!(owner instanceof Filter) || seen.has(owner)) {
      return true;
    }
    seen.add(owner);
    return owner.inputs.every((upstream, slot) => {
      if (!upstream) {
        return false;
      }
      if (owner.hiddenInputs.includes(slot)) {
        if (!upstream.meta) {
          return false;
        }
        scenes.push(...upstream.meta.scenes);
      }
      return visit(upstream);
    });
  };

  return visit(input) ? scenes : null;
}

/**
 * Largest time the frames of `a` wait for `b`, reading both from the same
 * source. Picks the latest instant of `a` not after the earliest usable
 * instant of `b`.
 */
export function sceneLag(a: TimelineEntry, b: TimelineEntry): number | null {
  const t2 = Math.max(b.start, a.start);
  if (t2 > b.end) {
    return null;
  }
  const t1 = Math.min(a.end, t2);
  return a.position + t1 - a.start - (b.position + t2 - b.start);
}

function toScene(stream: string, entry: TimelineEntry): Scene {
  return { stream, start: entry.start, end: entry.end, position: entry.position };
}

function findHazards(
  stream: string,
  entries: TimelineEntry[],
  tolerance: number
): BufferingHazard[] {
  // strongest hazard per codec pair, in discovery order
  const byPair = new Map<string, BufferingHazard>();
  const codecIds = new Map<Codec, number>();
  const idOf = (codec: Codec): number => {
    const known = codecIds.get(codec);
    if (known !== undefined) {
      return known;
    }
    codecIds.set(codec, codecIds.size);
    return codecIds.size - 1;
  };

  entries.forEach((a, i) => {
    entries.forEach((b, j) => {
      if (i === j) {
        return;
      }
      const lag = sceneLag(a, b);
      if (lag === null || lag <= tolerance) {
        return;
      }
      const ids = [idOf(a.codec), idOf(b.codec)].sort((x, y) => x - y);
      const key = ids.join(':');
      const current = byPair.get(key);
      if (!current || current.lag < lag) {
        byPair.set(key, {
          stream,
          held: { codec: a.codec, scene: toScene(stream, a) },
          ahead: { codec: b.codec, scene: toScene(stream, b) },
          lag,
        });
      }
    });
  });

  return [...byPair.values()];
}

/**
 * Predict buffering hazards for the given codecs. The graph is not
 * modified.
 */
export function analyzeBuffering(
  codecs: Codec[],
  options: BufferingOptions = {}
): BufferingReport {
  const { requireMetadata = false, tolerance = DEFAULT_TOLERANCE } = options;
  const timelines = new Map<string, TimelineEntry[]>();
  const skipped: Codec[] = [];

  for (const codec of codecs) {
    const scenes = consumedScenes(codec);
    if (!scenes) {
      if (requireMetadata) {
        throw new MetadataRequiredError(String(codec));
      }
      skipped.push(codec);
      continue;
    }
    for (const scene of scenes) {
      if (scene.stream === null) {
        continue;
      }
      const timeline = timelines.get(scene.stream) ?? [];
      timeline.push({ codec, start: scene.start, end: scene.end, position: scene.position });
      timelines.set(scene.stream, timeline);
    }
  }

  const hazards = new Map<string, BufferingHazard[]>();
  for (const [stream, timeline] of timelines) {
    timeline.sort((a, b) => a.start - b.start || a.position - b.position);
    const found = findHazards(stream, timeline, tolerance);
    if (found.length > 0) {
      hazards.set(stream, found);
    }
  }

  return { hazards, timelines, skipped };
}
