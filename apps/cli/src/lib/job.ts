/**
 * Job Files
 *
 * A job is a JSON description of a program: input files, filter nodes
 * keyed by id, links between them and output files whose codecs name the
 * stream they encode.
 *
 * Stream references:
 * - `main:video`, `main:audio:1`: n-th stream of a kind of input `main`
 * - `scale`, `split:1`: n-th output of filter node `split`
 */

import { readFile } from 'node:fs/promises';
import {
  InvalidParamsError,
  UnresolvedReferenceError,
  connect,
  createFilter,
  filterSpecSchema,
  pipe,
  type Codec,
  type Filter,
  type SourceStreamInit,
  type Stream,
  type StreamKind,
} from '@reelgraph/graph';
import {
  AudioCodec,
  FFmpeg,
  Input,
  Output,
  VideoCodec,
  audioCodecSchema,
  videoCodecSchema,
  type FFmpegOptions,
} from '@reelgraph/encoding';
import { z } from 'zod';

const idSchema = z.string().regex(/^[\w.-]+$/, 'ids may only contain letters, digits, _, . and -');
const kindSchema = z.enum(['video', 'audio']);

const inputSchema = z.object({
  id: idSchema,
  file: z.string().min(1),
  // Used when the file cannot be probed
  streams: z.array(kindSchema).min(1).default(['video', 'audio']),
  probe: z.boolean().default(true),
  seekTo: z.number().nonnegative().optional(),
  duration: z.number().positive().optional(),
  format: z.string().optional(),
  hwaccel: z.string().optional(),
  hwaccelDevice: z.string().optional(),
  extraArgs: z.array(z.string()).optional(),
});

const filterNodeSchema = z.object({
  id: idSchema,
  filter: filterSpecSchema,
});

const linkSchema = z.object({
  from: z.string().min(1),
  to: idSchema,
  slot: z.number().int().nonnegative().optional(),
});

const codecSchema = z.discriminatedUnion('kind', [
  videoCodecSchema.extend({ kind: z.literal('video'), from: z.string().min(1) }),
  audioCodecSchema.extend({ kind: z.literal('audio'), from: z.string().min(1) }),
]);

const outputSchema = z.object({
  file: z.string().min(1),
  format: z.string().optional(),
  movflags: z.string().optional(),
  extraArgs: z.array(z.string()).optional(),
  codecs: z.array(codecSchema).min(1),
});

export const jobSchema = z.object({
  inputs: z.array(inputSchema).min(1),
  filters: z.array(filterNodeSchema).default([]),
  links: z.array(linkSchema).default([]),
  outputs: z.array(outputSchema).min(1),
});

export type Job = z.output<typeof jobSchema>;
export type JobInput = z.output<typeof inputSchema>;
type CodecSpec = z.output<typeof codecSchema>;

export interface StreamRef {
  node: string;
  kind?: StreamKind;
  index: number;
}

export interface BuiltJob {
  ffmpeg: FFmpeg;
  inputs: Map<string, Input>;
  filters: Map<string, Filter>;
}

export function parseJob(raw: unknown): Job {
  const result = jobSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidParamsError(
      'job',
      result.error.issues.map(issue => `${issue.path.join('.') || 'job'}: ${issue.message}`)
    );
  }
  return result.data;
}

export async function loadJob(path: string): Promise<Job> {
  const content = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new InvalidParamsError('job', [`${path} is not valid JSON`]);
  }
  return parseJob(raw);
}

function isKind(value: string | undefined): value is StreamKind {
  return value === 'video' || value === 'audio';
}

export function parseStreamRef(ref: string): StreamRef {
  const [node = '', ...rest] = ref.split(':');
  const kind = isKind(rest[0]) ? rest.shift() : undefined;
  const position = rest.shift();
  const index = position === undefined ? 0 : /^\d+$/.test(position) ? Number(position) : -1;

  if (!node || rest.length > 0 || index < 0) {
    throw new InvalidParamsError('job', [`invalid stream reference ${ref}`]);
  }
  return isKind(kind) ? { node, kind, index } : { node, index };
}

function createCodec(spec: CodecSpec): Codec {
  // the codec schemas strip `kind` and `from`
  return spec.kind === 'video' ? new VideoCodec(spec) : new AudioCodec(spec);
}

/**
 * Build the program a job describes. `metadata` holds probed streams per
 * input id; inputs missing from it get the declared stream kinds with
 * unknown metadata.
 */
export function buildProgram(
  job: Job,
  metadata: ReadonlyMap<string, SourceStreamInit[]> = new Map(),
  options: FFmpegOptions = {}
): BuiltJob {
  const ffmpeg = new FFmpeg(options);
  const inputs = new Map<string, Input>();
  const filters = new Map<string, Filter>();
  const ids = new Set<string>();

  const claim = (id: string): void => {
    if (ids.has(id)) {
      throw new InvalidParamsError('job', [`duplicate id ${id}`]);
    }
    ids.add(id);
  };

  for (const spec of job.inputs) {
    claim(spec.id);
    const probed = metadata.get(spec.id);
    const input = new Input({
      file: spec.file,
      streams: probed && probed.length > 0 ? probed : spec.streams.map(kind => ({ kind })),
      seekTo: spec.seekTo,
      duration: spec.duration,
      format: spec.format,
      hwaccel: spec.hwaccel,
      hwaccelDevice: spec.hwaccelDevice,
      extraArgs: spec.extraArgs,
    });
    inputs.set(spec.id, input);
    ffmpeg.addInput(input);
  }

  for (const node of job.filters) {
    claim(node.id);
    filters.set(node.id, createFilter(node.filter));
  }

  const resolve = (ref: string): Stream => {
    const { node, kind, index } = parseStreamRef(ref);
    const input = inputs.get(node);
    if (input) {
      if (!kind) {
        throw new InvalidParamsError('job', [`${ref}: input streams are referenced by kind`]);
      }
      return input.stream(kind, index);
    }
    const filter = filters.get(node);
    if (filter) {
      if (kind) {
        throw new InvalidParamsError('job', [`${ref}: filter outputs are referenced by number`]);
      }
      const output = filter.outputs[index];
      if (!output) {
        throw new UnresolvedReferenceError(`${node} has no output ${index}`, { ref });
      }
      return output;
    }
    throw new UnresolvedReferenceError(`Unknown node ${node}`, { ref });
  };

  for (const link of job.links) {
    const filter = filters.get(link.to);
    if (!filter) {
      throw new UnresolvedReferenceError(`Unknown filter ${link.to}`, { to: link.to });
    }
    const stream = resolve(link.from);
    if (link.slot === undefined) {
      pipe(stream, filter);
    } else {
      connect(stream, filter, link.slot);
    }
  }

  for (const spec of job.outputs) {
    const codecs = spec.codecs.map(createCodec);
    const output = new Output({
      file: spec.file,
      codecs,
      format: spec.format,
      movflags: spec.movflags,
      extraArgs: spec.extraArgs,
    });
    spec.codecs.forEach((codecSpec, i) => {
      const codec = codecs[i];
      if (codec) {
        pipe(resolve(codecSpec.from), codec);
      }
    });
    ffmpeg.addOutput(output);
  }

  return { ffmpeg, inputs, filters };
}
