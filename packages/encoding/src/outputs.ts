/**
 * Output Files
 */

import { Codec, type Destination, type Stream, type StreamKind } from '@reelgraph/graph';

export interface OutputOptions {
  file: string;
  codecs?: Codec[];
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];   // Additional output args
}

export class Output {
  public readonly file: string;
  private readonly codecList: Codec[];
  private readonly options: OutputOptions;

  constructor(options: OutputOptions) {
    this.file = options.file;
    this.codecList = [...(options.codecs ?? [])];
    this.options = options;
    this.reindex();
  }

  get codecs(): readonly Codec[] {
    return this.codecList;
  }

  addCodec(codec: Codec): this {
    this.codecList.push(codec);
    this.reindex();
    return this;
  }

  /**
   * First codec of `kind` not connected yet. A stream-copy codec is
   * appended when every codec of that kind is taken.
   */
  freeCodec(kind: StreamKind): Codec {
    const free = this.codecList.find(codec => codec.kind === kind && !codec.input);
    if (free) {
      return free;
    }
    const codec = new Codec(kind);
    this.addCodec(codec);
    return codec;
  }

  /**
   * Connect a stream to the first free codec of its kind
   */
  receive(stream: Stream): Destination {
    return stream.pipe(this.freeCodec(stream.kind));
  }

  /**
   * Output arguments after the codecs, ending with the file name
   */
  renderArgs(): string[] {
    const args: string[] = [];
    const { format, movflags, extraArgs } = this.options;

    if (!this.codecList.some(codec => codec.kind === 'video')) {
      args.push('-vn');
    }
    if (!this.codecList.some(codec => codec.kind === 'audio')) {
      args.push('-an');
    }
    if (format) {
      args.push('-f', format);
    }
    if (movflags) {
      args.push('-movflags', movflags);
    }
    if (extraArgs) {
      args.push(...extraArgs);
    }
    args.push(this.file);

    return args;
  }

  private reindex(): void {
    const counters: Record<StreamKind, number> = { video: 0, audio: 0 };
    for (const codec of this.codecList) {
      codec.index = counters[codec.kind]++;
    }
  }
}
