/**
 * Filters
 *
 * Each filter validates its parameters with a zod schema at construction
 * and describes its effect on stream metadata in `transform`.
 */

import { z } from 'zod';
import { formatSeconds } from '@reelgraph/utils';
import { Filter, type Stream } from './base.js';
import { IncompatibleStreamsError, InvalidParamsError } from './errors.js';
import {
  joinStreams,
  withDuration,
  type Metadata,
  type Scene,
  type VideoMeta,
} from './meta.js';

/** Seconds; spans shorter than this are empty */
export const TIME_EPSILON = 1e-6;

const kindSchema = z.enum(['video', 'audio']);
const dimension = z.number().int().positive();
const offset = z.number().int().nonnegative();
const seconds = z.number().nonnegative().finite();

const splitShape = z.object({
  kind: kindSchema,
  outputCount: z.number().int().min(1).default(2),
});

const concatShape = z.object({
  kind: kindSchema,
  inputCount: z.number().int().min(1).default(2),
});

const overlayShape = z.object({
  x: offset.default(0),
  y: offset.default(0),
});

const scaleShape = z.object({
  width: dimension.optional(),
  height: dimension.optional(),
  hardware: z.string().min(1).optional(),
});

const cropShape = z.object({
  width: dimension,
  height: dimension,
  x: offset.default(0),
  y: offset.default(0),
});

const trimShape = z.object({
  kind: kindSchema,
  start: seconds,
  end: seconds,
});

const setPtsShape = z.object({
  kind: kindSchema,
  expr: z.string().min(1).default('PTS-STARTPTS'),
});

const formatShape = z.object({
  pixelFormat: z.string().min(1),
});

const uploadShape = z.object({
  hardware: z.string().min(1),
  device: z.string().min(1),
  extraHwFrames: z.number().int().nonnegative().default(64),
});

const volumeShape = z.object({
  volume: z.number().nonnegative().finite(),
});

const scaleSchema = scaleShape.refine(
  params => params.width !== undefined || params.height !== undefined,
  { message: 'width or height is required' }
);

const trimSchema = trimShape.refine(params => params.end > params.start, {
  message: 'end must be greater than start',
  path: ['end'],
});

export type SplitParams = z.input<typeof splitShape>;
export type ConcatParams = z.input<typeof concatShape>;
export type OverlayParams = z.input<typeof overlayShape>;
export type ScaleParams = z.input<typeof scaleSchema>;
export type CropParams = z.input<typeof cropShape>;
export type TrimParams = z.input<typeof trimSchema>;
export type SetPTSParams = z.input<typeof setPtsShape>;
export type FormatParams = z.input<typeof formatShape>;
export type UploadParams = z.input<typeof uploadShape>;
export type VolumeParams = z.input<typeof volumeShape>;

/**
 * Validate parameters against a schema, raising InvalidParamsError
 */
export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  params: unknown,
  target: string
): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new InvalidParamsError(
      target,
      result.error.issues.map(issue => `${issue.path.join('.') || 'params'}: ${issue.message}`)
    );
  }
  return result.data;
}

function streamIds(scenes: Scene[]): string[] {
  return joinStreams([scenes.flatMap(scene => (scene.stream ? [scene.stream] : []))]);
}

export class Split extends Filter {
  readonly params: z.output<typeof splitShape>;

  constructor(params: SplitParams) {
    const parsed = parseParams(splitShape, params, 'split');
    super([parsed.kind], Array.from({ length: parsed.outputCount }, () => parsed.kind));
    this.params = parsed;
  }

  get name(): string {
    return this.params.kind === 'video' ? 'split' : 'asplit';
  }

  get args(): string {
    return this.params.outputCount === 2 ? '' : String(this.params.outputCount);
  }

  transform(inputs: Metadata[]): Metadata[] {
    const [meta] = inputs;
    if (!meta) {
      return [];
    }
    return this.outputs.map(() => meta);
  }
}

export class Concat extends Filter {
  readonly params: z.output<typeof concatShape>;

  constructor(params: ConcatParams) {
    const parsed = parseParams(concatShape, params, 'concat');
    super(Array.from({ length: parsed.inputCount }, () => parsed.kind), [parsed.kind]);
    this.params = parsed;
  }

  get name(): string {
    return 'concat';
  }

  get args(): string {
    const { kind, inputCount } = this.params;
    if (kind === 'audio') {
      return `v=0:a=1:n=${inputCount}`;
    }
    return inputCount === 2 ? '' : `n=${inputCount}`;
  }

  override checkInput(stream: Stream): void {
    if (stream.kind !== this.params.kind) {
      throw new IncompatibleStreamsError(this.name, this.params.kind, stream.kind);
    }
  }

  transform(inputs: Metadata[]): Metadata[] {
    const [first] = inputs;
    if (!first) {
      return [];
    }
    const mixed = inputs.find(meta => meta.kind !== this.params.kind);
    if (mixed) {
      throw new IncompatibleStreamsError(this.name, this.params.kind, mixed.kind);
    }

    // every segment is placed right after the previous one, starting at zero
    const scenes: Scene[] = [];
    let cursor = 0;
    for (const meta of inputs) {
      for (const scene of meta.scenes) {
        scenes.push({ ...scene, position: cursor + scene.position - meta.start });
      }
      cursor += meta.duration;
    }

    const merged = {
      start: 0,
      scenes,
      streams: joinStreams(inputs.map(meta => meta.streams)),
    };
    if (first.kind === 'video') {
      const frames = inputs.reduce((sum, meta) => sum + (meta.kind === 'video' ? meta.frames : 0), 0);
      return [{ ...first, ...merged, duration: cursor, frames }];
    }
    const samples = inputs.reduce((sum, meta) => sum + (meta.kind === 'audio' ? meta.samples : 0), 0);
    return [{ ...first, ...merged, duration: cursor, samples }];
  }
}

/**
 * Top layer (second input) drawn over the bottom layer (first input)
 */
export class Overlay extends Filter {
  readonly params: z.output<typeof overlayShape>;

  constructor(params: OverlayParams = {}) {
    const parsed = parseParams(overlayShape, params, 'overlay');
    super(['video', 'video'], ['video']);
    this.params = parsed;
  }

  get name(): string {
    return 'overlay';
  }

  get args(): string {
    return `x=${this.params.x}:y=${this.params.y}`;
  }

  override get hardware(): string | null {
    return null;
  }

  override get hiddenInputs(): number[] {
    return [1];
  }

  transform([bottom]: Metadata[]): Metadata[] {
    return bottom ? [bottom] : [];
  }
}

/**
 * Resize. With one dimension given the other keeps the input's storage
 * aspect ratio, rendered as `-1` for ffmpeg to compute.
 */
export class Scale extends Filter {
  readonly params: z.output<typeof scaleSchema>;

  constructor(params: ScaleParams) {
    const parsed = parseParams(scaleSchema, params, 'scale');
    super(['video'], ['video']);
    this.params = parsed;
  }

  get name(): string {
    return this.params.hardware ? `scale_${this.params.hardware}` : 'scale';
  }

  get args(): string {
    return `w=${this.params.width ?? -1}:h=${this.params.height ?? -1}`;
  }

  override get hardware(): string | null {
    return this.params.hardware ?? null;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (meta?.kind !== 'video') {
      return [];
    }
    const { width, height } = scaledSize(meta, this.params.width, this.params.height);
    const par = Number.isFinite(meta.dar) && height > 0 ? meta.dar / (width / height) : meta.par;
    return [{ ...meta, width, height, par }];
  }
}

function scaledSize(
  meta: VideoMeta,
  width: number | undefined,
  height: number | undefined
): { width: number; height: number } {
  if (width !== undefined && height !== undefined) {
    return { width, height };
  }
  if (width !== undefined) {
    return {
      width,
      height: meta.width > 0 ? Math.round((width * meta.height) / meta.width) : 0,
    };
  }
  const h = height ?? 0;
  return {
    width: meta.height > 0 ? Math.round((h * meta.width) / meta.height) : 0,
    height: h,
  };
}

export class Crop extends Filter {
  readonly params: z.output<typeof cropShape>;

  constructor(params: CropParams) {
    const parsed = parseParams(cropShape, params, 'crop');
    super(['video'], ['video']);
    this.params = parsed;
  }

  get name(): string {
    return 'crop';
  }

  get args(): string {
    const { width, height, x, y } = this.params;
    return `w=${width}:h=${height}:x=${x}:y=${y}`;
  }

  override get hardware(): string | null {
    return null;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (meta?.kind !== 'video') {
      return [];
    }
    const width = Math.min(this.params.width, Math.max(meta.width - this.params.x, 0));
    const height = Math.min(this.params.height, Math.max(meta.height - this.params.y, 0));
    const dar = height > 0 ? (width / height) * meta.par : NaN;
    return [{ ...meta, width, height, dar }];
  }
}

/**
 * Keep `[start, end]` of the stream timeline. Timestamps are not shifted;
 * follow with SetPTS to start the result at zero.
 */
export class Trim extends Filter {
  readonly params: z.output<typeof trimSchema>;

  constructor(params: TrimParams) {
    const parsed = parseParams(trimSchema, params, 'trim');
    super([parsed.kind], [parsed.kind]);
    this.params = parsed;
  }

  get name(): string {
    return this.params.kind === 'video' ? 'trim' : 'atrim';
  }

  get args(): string {
    return `start=${formatSeconds(this.params.start)}:end=${formatSeconds(this.params.end)}`;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (!meta) {
      return [];
    }
    const { start, end } = this.params;
    const scenes: Scene[] = [];
    for (const scene of meta.scenes) {
      const from = Math.max(scene.position, start);
      const to = Math.min(scene.position + scene.end - scene.start, end);
      if (to - from > TIME_EPSILON) {
        scenes.push({
          stream: scene.stream,
          start: scene.start + from - scene.position,
          end: scene.start + to - scene.position,
          position: from,
        });
      }
    }
    return [withDuration({ ...meta, start, scenes, streams: streamIds(scenes) }, end - start)];
  }
}

/**
 * Timestamp rewrite. Only `PTS-STARTPTS` is reflected in metadata; any
 * other expression leaves it unchanged.
 */
export class SetPTS extends Filter {
  static readonly START_PTS = 'PTS-STARTPTS';

  readonly params: z.output<typeof setPtsShape>;

  constructor(params: SetPTSParams) {
    const parsed = parseParams(setPtsShape, params, 'setpts');
    super([parsed.kind], [parsed.kind]);
    this.params = parsed;
  }

  get name(): string {
    return this.params.kind === 'video' ? 'setpts' : 'asetpts';
  }

  get args(): string {
    return this.params.expr;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (!meta) {
      return [];
    }
    if (this.params.expr !== SetPTS.START_PTS) {
      return [meta];
    }
    const shift = meta.start;
    const scenes = meta.scenes.map(scene => ({ ...scene, position: scene.position - shift }));
    return [{ ...meta, start: 0, scenes }];
  }
}

export class Format extends Filter {
  readonly params: z.output<typeof formatShape>;

  constructor(params: FormatParams) {
    const parsed = parseParams(formatShape, params, 'format');
    super(['video'], ['video']);
    this.params = parsed;
  }

  get name(): string {
    return 'format';
  }

  get args(): string {
    return `pix_fmts=${this.params.pixelFormat}`;
  }

  override get hardware(): string | null {
    return null;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (meta?.kind !== 'video') {
      return [];
    }
    return [{ ...meta, pixelFormat: this.params.pixelFormat }];
  }
}

/**
 * Move frames to a hardware device
 */
export class Upload extends Filter {
  readonly params: z.output<typeof uploadShape>;

  constructor(params: UploadParams) {
    const parsed = parseParams(uploadShape, params, 'upload');
    super(['video'], ['video']);
    this.params = parsed;
  }

  get name(): string {
    return this.params.hardware === 'cuda' ? 'hwupload_cuda' : 'hwupload';
  }

  get args(): string {
    return `extra_hw_frames=${this.params.extraHwFrames}:device=${this.params.device}`;
  }

  override get hardware(): string | null {
    return null;
  }

  transform([meta]: Metadata[]): Metadata[] {
    if (meta?.kind !== 'video') {
      return [];
    }
    return [{ ...meta, device: { hardware: this.params.hardware, name: this.params.device } }];
  }
}

export class Volume extends Filter {
  readonly params: z.output<typeof volumeShape>;

  constructor(params: VolumeParams) {
    const parsed = parseParams(volumeShape, params, 'volume');
    super(['audio'], ['audio']);
    this.params = parsed;
  }

  get name(): string {
    return 'volume';
  }

  get args(): string {
    return `volume=${this.params.volume}`;
  }

  transform([meta]: Metadata[]): Metadata[] {
    return meta ? [meta] : [];
  }
}

export const filterSpecSchema = z.discriminatedUnion('type', [
  splitShape.extend({ type: z.literal('split') }),
  concatShape.extend({ type: z.literal('concat') }),
  overlayShape.extend({ type: z.literal('overlay') }),
  scaleShape.extend({ type: z.literal('scale') }),
  cropShape.extend({ type: z.literal('crop') }),
  trimShape.extend({ type: z.literal('trim') }),
  setPtsShape.extend({ type: z.literal('setpts') }),
  formatShape.extend({ type: z.literal('format') }),
  uploadShape.extend({ type: z.literal('upload') }),
  volumeShape.extend({ type: z.literal('volume') }),
]);

export type FilterSpec = z.input<typeof filterSpecSchema>;

export type FilterType = FilterSpec['type'];

/**
 * Build a filter from its tagged description
 */
export function createFilter(spec: FilterSpec): Filter {
  switch (spec.type) {
    case 'split':
      return new Split(spec);
    case 'concat':
      return new Concat(spec);
    case 'overlay':
      return new Overlay(spec);
    case 'scale':
      return new Scale(spec);
    case 'crop':
      return new Crop(spec);
    case 'trim':
      return new Trim(spec);
    case 'setpts':
      return new SetPTS(spec);
    case 'format':
      return new Format(spec);
    case 'upload':
      return new Upload(spec);
    case 'volume':
      return new Volume(spec);
  }
}

