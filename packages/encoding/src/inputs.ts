/**
 * Input Files
 *
 * An input file is a graph source whose streams are read by ffmpeg from a
 * single `-i` argument. Scenes of its metadata are named `{file}#{n}` unless
 * the caller named them already; further reads of the same file in one
 * program are renamed when added to it.
 */

import { Source, type Metadata, type SourceStreamInit, type StreamKind } from '@reelgraph/graph';
import { formatSeconds } from '@reelgraph/utils';

export interface InputOptions {
  file: string;
  streams?: SourceStreamInit[];
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
  format?: string;        // -f format
  hwaccel?: string;       // -hwaccel
  hwaccelDevice?: string; // -hwaccel_device
  extraArgs?: string[];   // Additional input args
}

const DEFAULT_STREAMS: StreamKind[] = ['video', 'audio'];

function identify(meta: Metadata, id: string): Metadata {
  return {
    ...meta,
    scenes: meta.scenes.map(scene => (scene.stream === null ? { ...scene, stream: id } : scene)),
    streams: meta.streams.length > 0 ? meta.streams : [id],
  };
}

export class Input extends Source {
  public readonly file: string;
  private readonly options: InputOptions;

  constructor(options: InputOptions) {
    const streams: SourceStreamInit[] = options.streams ?? DEFAULT_STREAMS.map(kind => ({ kind }));
    super(
      streams.map((init, n) => {
        if (!init.meta) {
          return { kind: init.kind, meta: null };
        }
        let meta = identify(init.meta, `${options.file}#${n}`);
        if (options.hwaccel && meta.kind === 'video') {
          meta = {
            ...meta,
            device: { hardware: options.hwaccel, name: options.hwaccelDevice ?? options.hwaccel },
          };
        }
        return { kind: init.kind, meta };
      }),
      options.file
    );
    this.file = options.file;
    this.options = options;
  }

  /**
   * Scene ids of a second read of the same file become `{file}@{read}#{n}`,
   * so the buffering analysis treats the reads as separate sources.
   */
  markReread(read: number): void {
    const prefix = `${this.file}#`;
    this.renameScenes(id =>
      id.startsWith(prefix) ? `${this.file}@${read}#${id.slice(prefix.length)}` : id
    );
  }

  /**
   * Input arguments, ending with `-i file`
   */
  renderArgs(): string[] {
    const args: string[] = [];
    const { hwaccel, hwaccelDevice, seekTo, duration, format, extraArgs } = this.options;

    if (hwaccel) {
      args.push('-hwaccel', hwaccel);
      if (hwaccelDevice) {
        args.push('-hwaccel_device', hwaccelDevice);
      }
    }
    if (seekTo !== undefined) {
      args.push('-ss', formatSeconds(seekTo));
    }
    if (duration !== undefined) {
      args.push('-t', formatSeconds(duration));
    }
    if (format) {
      args.push('-f', format);
    }
    if (extraArgs) {
      args.push(...extraArgs);
    }
    args.push('-i', this.file);

    return args;
  }
}
