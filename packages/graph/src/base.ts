/**
 * Graph Nodes and Streams
 *
 * Sources expose typed output streams, filters transform N input streams
 * into M output streams, codecs terminate a single stream. A stream feeds
 * at most one filter, or any number of codecs, never both.
 */

import { ConnectionError, NoFreeSlotError } from './errors.js';
import { KIND_TAG, type Metadata, type StreamKind } from './meta.js';

// Orders filters by their first connection; only used to break ties
// between independent chains. Shared by every graph in the process:
// renders compare filters of one graph only, and the order among those
// does not depend on what other graphs were built in between.
let connectionSequence = 0;

export type Owner = Source | Filter;
export type Destination = Filter | Codec;

export abstract class GraphNode {
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Called by the assembler when a render pass starts. A frozen node
   * accepts no further connections.
   */
  freeze(): void {
    this.frozen = true;
  }
}

export class Stream {
  public meta: Metadata | null;
  private filterTarget: Filter | null = null;
  private readonly codecTargets: Codec[] = [];

  constructor(
    public readonly kind: StreamKind,
    public readonly owner: Owner,
    public readonly slot: number,
    meta: Metadata | null = null
  ) {
    this.meta = meta;
  }

  /** Filter reading this stream, if any */
  get consumer(): Filter | null {
    return this.filterTarget;
  }

  get codecs(): readonly Codec[] {
    return this.codecTargets;
  }

  get isConsumed(): boolean {
    return this.filterTarget !== null || this.codecTargets.length > 0;
  }

  connect<T extends Destination>(dest: T, slot?: number): T {
    connect(this, dest, slot);
    return dest;
  }

  pipe<T extends Destination>(dest: T): T {
    pipe(this, dest);
    return dest;
  }

  /** @internal */
  bindFilter(filter: Filter): void {
    this.filterTarget = filter;
  }

  /** @internal */
  bindCodec(codec: Codec): void {
    this.codecTargets.push(codec);
  }

  toString(): string {
    return `${this.owner}[${this.slot}]`;
  }
}

export interface SourceStreamInit {
  kind: StreamKind;
  meta?: Metadata | null;
}

export class Source extends GraphNode {
  public readonly streams: Stream[];
  private assignedIndex: number | null = null;

  constructor(streams: SourceStreamInit[], public readonly name: string = 'input') {
    super();
    this.streams = streams.map(
      (init, slot) => new Stream(init.kind, this, slot, init.meta ?? null)
    );
  }

  /** Position in the program's input list */
  get index(): number | null {
    return this.assignedIndex;
  }

  assignIndex(index: number): void {
    if (this.assignedIndex !== null && this.assignedIndex !== index) {
      throw new ConnectionError(
        `${this.name} is already input ${this.assignedIndex}`,
        { source: this.name, index: this.assignedIndex, requested: index }
      );
    }
    this.assignedIndex = index;
  }

  get video(): Stream {
    return this.stream('video');
  }

  get audio(): Stream {
    return this.stream('audio');
  }

  /**
   * n-th stream of the given kind
   */
  stream(kind: StreamKind, n = 0): Stream {
    const found = this.streams.filter(s => s.kind === kind)[n];
    if (!found) {
      throw new ConnectionError(`${this.name} has no ${kind} stream #${n}`, {
        source: this.name,
        kind,
        n,
      });
    }
    return found;
  }

  /**
   * Rename the scene ids carried by this source's streams and recompute
   * the metadata of every filter downstream. The buffering analysis tells
   * sources apart by these ids only.
   */
  renameScenes(rename: (id: string) => string): void {
    for (const stream of this.streams) {
      const meta = stream.meta;
      if (!meta) {
        continue;
      }
      stream.meta = {
        ...meta,
        scenes: meta.scenes.map(scene =>
          scene.stream === null ? scene : { ...scene, stream: rename(scene.stream) }
        ),
        streams: meta.streams.map(rename),
      };
      if (stream.consumer) {
        propagate(stream.consumer, new Set());
      }
    }
  }

  /**
   * Canonical stream specifier: `0:v`, or `0:v:1` for the second video stream
   */
  label(stream: Stream, index: number): string {
    const tag = KIND_TAG[stream.kind];
    const n = this.streams.filter(s => s.kind === stream.kind).indexOf(stream);
    return n > 0 ? `${index}:${tag}:${n}` : `${index}:${tag}`;
  }

  toString(): string {
    return this.name;
  }
}

export abstract class Filter extends GraphNode {
  public readonly inputs: Array<Stream | null>;
  public readonly outputs: Stream[];
  private connectedAt: number | null = null;

  constructor(
    public readonly inputKinds: StreamKind[],
    outputKinds: StreamKind[]
  ) {
    super();
    this.inputs = inputKinds.map(() => null);
    this.outputs = outputKinds.map((kind, slot) => new Stream(kind, this, slot));
  }

  /** ffmpeg filter name */
  abstract get name(): string;

  /** Rendered `k=v:k=v` parameters, empty when the defaults apply */
  abstract get args(): string;

  /**
   * Output metadata for fully known input metadata. Never called when an
   * input is unknown: the outputs are unknown then.
   */
  abstract transform(inputs: Metadata[]): Metadata[];

  /**
   * Hardware the filter runs on: null for CPU only, undefined when frames
   * from any device are accepted
   */
  get hardware(): string | null | undefined {
    return undefined;
  }

  /**
   * Input slots whose frames are read but whose scenes do not reach the
   * outputs (overlay's top layer).
   */
  get hiddenInputs(): number[] {
    return [];
  }

  get isComplete(): boolean {
    return this.inputs.every(input => input !== null);
  }

  get sequence(): number {
    return this.connectedAt ?? Number.MAX_SAFE_INTEGER;
  }

  /** First output stream */
  get output(): Stream {
    const [first] = this.outputs;
    if (!first) {
      throw new ConnectionError(`${this.name} has no outputs`, { filter: this.name });
    }
    return first;
  }

  render(): string {
    const args = this.args;
    return args ? `${this.name}=${args}` : this.name;
  }

  /**
   * Rejects a stream for an input slot. Kind-homogeneous filters override
   * this to raise their own error.
   */
  checkInput(stream: Stream, slot: number): void {
    const expected = this.inputKinds[slot];
    if (stream.kind !== expected) {
      throw new ConnectionError(
        `Input ${slot} of ${this.name} expects ${expected ?? 'nothing'}, got ${stream.kind}`,
        { filter: this.name, slot, expected, actual: stream.kind }
      );
    }
  }

  /** @internal */
  bindInput(slot: number, stream: Stream): void {
    this.inputs[slot] = stream;
    if (this.connectedAt === null) {
      this.connectedAt = ++connectionSequence;
    }
  }

  connect<T extends Destination>(dest: T, slot?: number): T {
    return this.freeOutput().connect(dest, slot);
  }

  pipe<T extends Destination>(dest: T): T {
    return this.freeOutput().pipe(dest);
  }

  private freeOutput(): Stream {
    const free = this.outputs.find(output => !output.isConsumed);
    if (!free) {
      throw new ConnectionError(`All outputs of ${this.name} are connected`, {
        filter: this.name,
      });
    }
    return free;
  }

  toString(): string {
    return this.name;
  }
}

export class Codec extends GraphNode {
  /** Position among the codecs of the same kind in its output */
  public index = 0;
  private bound: Stream | null = null;

  constructor(
    public readonly kind: StreamKind,
    public readonly codecName: string = 'copy'
  ) {
    super();
  }

  get input(): Stream | null {
    return this.bound;
  }

  /** Same contract as `Filter.hardware` */
  get hardware(): string | null | undefined {
    return undefined;
  }

  /** @internal */
  bindInput(stream: Stream): void {
    this.bound = stream;
  }

  /**
   * Encoder selection and parameters as argument tokens
   */
  renderArgs(): string[] {
    return [`-c:${KIND_TAG[this.kind]}:${this.index}`, this.codecName];
  }

  toString(): string {
    return `${this.codecName} codec`;
  }
}

function checkDevice(stream: Stream, dest: Destination): void {
  const meta = stream.meta;
  const hardware = dest.hardware;
  if (meta === null || meta.kind !== 'video' || hardware === undefined) {
    return;
  }
  const device = meta.device;
  if (hardware === null) {
    if (device !== null) {
      throw new ConnectionError(
        `${dest} cannot read frames from ${device.hardware} device ${device.name}`,
        { dest: String(dest), hardware: device.hardware }
      );
    }
  } else if (device === null || device.hardware !== hardware) {
    throw new ConnectionError(`${dest} requires a stream uploaded to ${hardware}`, {
      dest: String(dest),
      hardware,
    });
  }
}

function connectCodec(stream: Stream, codec: Codec, slot?: number): void {
  if (stream.consumer) {
    throw new ConnectionError(
      `${stream} is already connected to ${stream.consumer}`,
      { stream: String(stream), consumer: String(stream.consumer) }
    );
  }
  if (codec.input) {
    throw new ConnectionError(`${codec} already has an input`, { codec: String(codec) });
  }
  if (slot !== undefined && slot !== 0) {
    throw new ConnectionError(`${codec} has a single input slot`, { slot });
  }
  if (stream.kind !== codec.kind) {
    throw new ConnectionError(`${codec} expects ${codec.kind}, got ${stream.kind}`, {
      codec: String(codec),
      expected: codec.kind,
      actual: stream.kind,
    });
  }
  checkDevice(stream, codec);
  codec.bindInput(stream);
  stream.bindCodec(codec);
}

/**
 * Recompute output metadata of a complete filter and of every complete
 * filter downstream of it
 */
function propagate(filter: Filter, path: Set<Filter>): void {
  if (path.has(filter) || !filter.isComplete) {
    return;
  }
  path.add(filter);

  const known: Metadata[] = [];
  for (const input of filter.inputs) {
    if (input?.meta) {
      known.push(input.meta);
    }
  }
  const result = known.length === filter.inputs.length ? filter.transform(known) : [];

  filter.outputs.forEach((output, i) => {
    output.meta = result[i] ?? null;
    if (output.consumer) {
      propagate(output.consumer, path);
    }
  });

  path.delete(filter);
}

/**
 * Bind `stream` to an input of `dest`. Without `slot` the first free slot
 * is taken. Filters receive metadata as soon as all their inputs are bound.
 */
export function connect(stream: Stream, dest: Destination, slot?: number): void {
  if (stream.owner.isFrozen || dest.isFrozen) {
    throw new ConnectionError(
      `Cannot connect ${stream} to ${dest}: the graph was rendered`,
      { stream: String(stream), dest: String(dest) }
    );
  }

  if (dest instanceof Codec) {
    connectCodec(stream, dest, slot);
    return;
  }

  if (stream.consumer) {
    throw new ConnectionError(
      `${stream} is already connected to ${stream.consumer}`,
      { stream: String(stream), consumer: String(stream.consumer) }
    );
  }
  if (stream.codecs.length > 0) {
    throw new ConnectionError(
      `${stream} feeds codecs directly and cannot also feed ${dest}`,
      { stream: String(stream), dest: dest.name }
    );
  }

  const target = slot ?? dest.inputs.findIndex(input => input === null);
  if (target < 0) {
    throw new ConnectionError(`All inputs of ${dest} are connected`, { filter: dest.name });
  }
  if (target >= dest.inputs.length) {
    throw new ConnectionError(`${dest} has no input ${target}`, {
      filter: dest.name,
      slot: target,
    });
  }
  if (dest.inputs[target]) {
    throw new ConnectionError(`Input ${target} of ${dest} is already connected`, {
      filter: dest.name,
      slot: target,
    });
  }

  dest.checkInput(stream, target);
  checkDevice(stream, dest);

  dest.bindInput(target, stream);
  stream.bindFilter(dest);
  propagate(dest, new Set());
}

/**
 * Bind `stream` to the first free input of `dest` of the same kind. When
 * only slots of another kind are free, the filter's own input check raises.
 */
export function pipe(stream: Stream, dest: Destination): void {
  if (dest instanceof Codec) {
    if (dest.input || dest.kind !== stream.kind) {
      throw new NoFreeSlotError(String(dest), stream.kind);
    }
    connect(stream, dest);
    return;
  }
  const slot = dest.inputs.findIndex(
    (input, i) => input === null && dest.inputKinds[i] === stream.kind
  );
  if (slot < 0) {
    // a free slot of another kind: let the filter name the mismatch
    const free = dest.inputs.findIndex(input => input === null);
    if (free >= 0) {
      dest.checkInput(stream, free);
    }
    throw new NoFreeSlotError(dest.name, stream.kind);
  }
  connect(stream, dest, slot);
}
