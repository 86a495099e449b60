/**
 * Stream Vector
 *
 * Applies filters to a list of parallel streams at once, e.g. the same
 * source prepared for several renditions. Elements sharing a stream
 * receive one filter per distinct parameter set; a split is inserted
 * wherever a stream ends up read by more than one destination.
 */

import { isObject } from '@reelgraph/utils';
import { pipe, type Codec, type Filter, type Stream } from './base.js';
import { VectorLengthMismatchError } from './errors.js';
import { Split } from './filters.js';

export type FilterConstructor<P> = new (params: P) => Filter;

function isList<P>(params: P | P[]): params is P[] {
  return Array.isArray(params);
}

/**
 * Serialize parameters with sorted keys so equal sets compare equal
 */
export function paramsKey(params: unknown): string {
  return JSON.stringify(params, (_key, value: unknown) =>
    isObject(value)
      ? Object.fromEntries(Object.entries(value).sort(([a], [b]) => a.localeCompare(b)))
      : value
  );
}

export class StreamVector {
  readonly streams: readonly Stream[];

  constructor(streams: Stream[]) {
    this.streams = streams;
  }

  get length(): number {
    return this.streams.length;
  }

  /**
   * Instantiate `FilterClass` per element. `params` is shared or given per
   * element; equal parameter sets on the same stream share one filter.
   * Elements masked out pass through unchanged.
   */
  connect<P>(FilterClass: FilterConstructor<P>, params: P | P[], mask?: boolean[]): StreamVector {
    let perElement: P[];
    if (isList(params)) {
      perElement = params;
    } else {
      const shared = params;
      perElement = this.streams.map(() => shared);
    }
    if (perElement.length !== this.length) {
      throw new VectorLengthMismatchError('params', this.length, perElement.length);
    }
    const enabled = this.mask(mask);

    const created = new Map<Stream, Map<string, Filter>>();
    const targets = this.streams.map((stream, i) => {
      const element = perElement[i];
      if (!enabled[i] || element === undefined) {
        return null;
      }
      const byParams = created.get(stream) ?? new Map<string, Filter>();
      created.set(stream, byParams);
      const key = paramsKey(element);
      const existing = byParams.get(key);
      if (existing) {
        return existing;
      }
      const filter = new FilterClass(element);
      byParams.set(key, filter);
      return filter;
    });

    return this.distribute(targets);
  }

  /**
   * Connect every enabled element to the same filter instance
   */
  apply(filter: Filter, mask?: boolean[]): StreamVector {
    const enabled = this.mask(mask);
    return this.distribute(this.streams.map((_, i) => (enabled[i] ? filter : null)));
  }

  /**
   * Connect element i to codec i
   */
  finalize(codecs: Codec[]): void {
    if (codecs.length !== this.length) {
      throw new VectorLengthMismatchError('codecs', this.length, codecs.length);
    }
    this.streams.forEach((stream, i) => {
      const codec = codecs[i];
      if (codec) {
        pipe(stream, codec);
      }
    });
  }

  private mask(mask: boolean[] | undefined): boolean[] {
    if (mask === undefined) {
      return this.streams.map(() => true);
    }
    if (mask.length !== this.length) {
      throw new VectorLengthMismatchError('mask', this.length, mask.length);
    }
    return mask;
  }

  private distribute(targets: Array<Filter | null>): StreamVector {
    // stream -> destination (null for pass-through) -> element indices
    const groups = new Map<Stream, Map<Filter | null, number[]>>();
    this.streams.forEach((stream, i) => {
      const target = targets[i] ?? null;
      const destinations = groups.get(stream) ?? new Map<Filter | null, number[]>();
      groups.set(stream, destinations);
      destinations.set(target, [...(destinations.get(target) ?? []), i]);
    });

    const result = [...this.streams];
    for (const [stream, destinations] of groups) {
      const entries = [...destinations];
      let branches: Stream[] = [stream];
      if (entries.length > 1) {
        const split = new Split({ kind: stream.kind, outputCount: entries.length });
        pipe(stream, split);
        branches = split.outputs;
      }

      entries.forEach(([target, indices], k) => {
        const branch = branches[k];
        if (!branch) {
          return;
        }
        let out = branch;
        if (target) {
          pipe(branch, target);
          out = target.output;
        }
        for (const i of indices) {
          result[i] = out;
        }
      });
    }

    return new StreamVector(result);
  }
}
