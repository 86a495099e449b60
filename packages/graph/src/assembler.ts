/**
 * Filter Graph Assembler
 *
 * Freezes the graph reachable from the declared sources and codecs,
 * validates it, assigns labels and renders ffmpeg's filtergraph syntax:
 * - short form `scale=w=1280:h=720,format=pix_fmts=yuv420p` for a single
 *   linear chain feeding one codec
 * - full form `[0:v]split[vout0][vout1];[vout0]scale=...[vout2];...`
 *   otherwise
 */

import { createLogger } from '@reelgraph/utils';
import { Codec, Filter, Source, type Stream } from './base.js';
import {
  CyclicGraphError,
  DanglingOutputError,
  UnresolvedReferenceError,
} from './errors.js';
import { KIND_TAG, type StreamKind } from './meta.js';

const log = createLogger({ module: 'filter-graph' });

export type GraphForm = 'empty' | 'short' | 'full';

export interface RenderedGraph {
  form: GraphForm;
  /** `-filter_complex` value in full form, the codec's filter chain in short form */
  text: string;
  /** `-map` value per codec: `0:v` for a source stream, `[vout0]` for a filter output */
  maps: Map<Codec, string>;
  /** Short form only: the chain applied to the codec's stream */
  chains: Map<Codec, string>;
}

interface LinkedGraph {
  filters: Filter[];
  codecs: Codec[];
}

export class FilterGraph {
  private readonly sources: Source[];
  private readonly codecs: Codec[];
  private counter = 0;

  constructor(sources: Source[], codecs: Codec[]) {
    this.sources = sources;
    this.codecs = codecs;
    sources.forEach((source, index) => source.assignIndex(index));
  }

  /**
   * Render the graph. Repeated calls on an unchanged graph return the
   * same text; any structural error aborts without output.
   */
  render(): RenderedGraph {
    this.counter = 0;

    const graph = this.link();
    for (const node of [...this.sources, ...graph.filters, ...graph.codecs]) {
      node.freeze();
    }

    const ordered = this.order(graph.filters);
    const chain = this.linearChain(ordered);
    const rendered = chain ? this.renderShort(chain) : this.renderFull(ordered);

    log.debug(
      { form: rendered.form, filters: ordered.length, codecs: graph.codecs.length },
      'Filter graph rendered'
    );
    return rendered;
  }

  private sourceLabel(stream: Stream): string {
    const owner = stream.owner;
    if (!(owner instanceof Source)) {
      throw new UnresolvedReferenceError(`${stream} is not a source stream`);
    }
    const index = this.sources.indexOf(owner);
    if (index < 0) {
      throw new UnresolvedReferenceError(`${owner} is not a declared input`, {
        source: owner.name,
      });
    }
    return owner.label(stream, index);
  }

  private nextLabel(kind: StreamKind): string {
    return `[${KIND_TAG[kind]}out${this.counter++}]`;
  }

  /**
   * Collect every filter reachable from the declared sources or upstream
   * of the declared codecs, and check that all references resolve
   */
  private link(): LinkedGraph {
    const filters = new Set<Filter>();

    const visitDownstream = (stream: Stream): void => {
      const consumer = stream.consumer;
      if (consumer && !filters.has(consumer)) {
        filters.add(consumer);
        consumer.outputs.forEach(visitDownstream);
      }
    };

    const visitUpstream = (stream: Stream): void => {
      const owner = stream.owner;
      if (owner instanceof Source) {
        this.sourceLabel(stream);
        return;
      }
      if (filters.has(owner)) {
        return;
      }
      filters.add(owner);
      owner.inputs.forEach((input, slot) => {
        if (!input) {
          throw new UnresolvedReferenceError(`Input ${slot} of ${owner} is not connected`, {
            filter: owner.name,
            slot,
          });
        }
        visitUpstream(input);
      });
    };

    for (const source of this.sources) {
      source.streams.forEach(visitDownstream);
    }

    for (const codec of this.codecs) {
      const input = codec.input;
      if (!input) {
        throw new UnresolvedReferenceError(`${codec} is not connected`, {
          codec: String(codec),
        });
      }
      visitUpstream(input);
    }

    const list = [...filters];
    for (const filter of list) {
      // filters found downstream may still miss an input
      filter.inputs.forEach((input, slot) => {
        if (!input) {
          throw new UnresolvedReferenceError(`Input ${slot} of ${filter} is not connected`, {
            filter: filter.name,
            slot,
          });
        }
        if (input.owner instanceof Source) {
          this.sourceLabel(input);
        }
      });
    }

    this.checkAcyclic(list);

    for (const filter of list) {
      filter.outputs.forEach((output, slot) => {
        if (!output.consumer && !output.codecs.some(codec => this.codecs.includes(codec))) {
          throw new DanglingOutputError(filter.name, slot);
        }
      });
    }

    return { filters: list, codecs: this.codecs };
  }

  private checkAcyclic(filters: Filter[]): void {
    const done = new Set<Filter>();
    const path: Filter[] = [];

    const visit = (filter: Filter): void => {
      if (path.includes(filter)) {
        const cycle = path.slice(path.indexOf(filter)).concat(filter);
        throw new CyclicGraphError(cycle.map(node => node.name));
      }
      if (done.has(filter)) {
        return;
      }
      path.push(filter);
      for (const output of filter.outputs) {
        if (output.consumer) {
          visit(output.consumer);
        }
      }
      path.pop();
      done.add(filter);
    };

    filters.forEach(visit);
  }

  /**
   * Kahn's algorithm; among ready filters the earliest connected goes first
   */
  private order(filters: Filter[]): Filter[] {
    const pending = new Map<Filter, number>();
    for (const filter of filters) {
      const upstream = filter.inputs.filter(input => input?.owner instanceof Filter).length;
      pending.set(filter, upstream);
    }

    const ready = filters.filter(filter => pending.get(filter) === 0);
    const result: Filter[] = [];

    while (ready.length > 0) {
      ready.sort((a, b) => a.sequence - b.sequence);
      const next = ready.shift();
      if (!next) {
        break;
      }
      result.push(next);
      for (const output of next.outputs) {
        const consumer = output.consumer;
        if (!consumer) {
          continue;
        }
        const left = (pending.get(consumer) ?? 0) - 1;
        pending.set(consumer, left);
        if (left === 0) {
          ready.push(consumer);
        }
      }
    }

    return result;
  }

  /**
   * The filters when they form one single-input/single-output chain from a
   * source stream to exactly one codec, null otherwise
   */
  private linearChain(ordered: Filter[]): Filter[] | null {
    const [head] = ordered;
    if (!head || !ordered.every(f => f.inputs.length === 1 && f.outputs.length === 1)) {
      return null;
    }
    if (!(head.inputs[0]?.owner instanceof Source)) {
      return null;
    }
    for (let i = 1; i < ordered.length; i++) {
      if (ordered[i]?.inputs[0]?.owner !== ordered[i - 1]) {
        return null;
      }
    }
    const last = ordered[ordered.length - 1];
    const codecs = last?.output.codecs ?? [];
    return codecs.length === 1 ? ordered : null;
  }

  private directMaps(): Map<Codec, string> {
    const maps = new Map<Codec, string>();
    for (const codec of this.codecs) {
      const input = codec.input;
      if (input && input.owner instanceof Source) {
        maps.set(codec, this.sourceLabel(input));
      }
    }
    return maps;
  }

  private renderShort(chain: Filter[]): RenderedGraph {
    const maps = this.directMaps();
    const chains = new Map<Codec, string>();
    const head = chain[0]?.inputs[0];
    const codec = chain[chain.length - 1]?.output.codecs[0];
    if (!head || !codec) {
      throw new UnresolvedReferenceError('Filter chain has no endpoints');
    }

    const text = chain.map(filter => filter.render()).join(',');
    maps.set(codec, this.sourceLabel(head));
    chains.set(codec, text);
    return { form: 'short', text, maps, chains };
  }

  private renderFull(ordered: Filter[]): RenderedGraph {
    const maps = this.directMaps();
    if (ordered.length === 0) {
      return { form: 'empty', text: '', maps, chains: new Map() };
    }

    const labels = new Map<Stream, string>();
    const statements: string[] = [];

    const inputLabel = (stream: Stream | null): string => {
      if (!stream) {
        throw new UnresolvedReferenceError('Filter input is not connected');
      }
      if (stream.owner instanceof Source) {
        return `[${this.sourceLabel(stream)}]`;
      }
      const label = labels.get(stream);
      if (!label) {
        throw new UnresolvedReferenceError(`${stream} has no label`);
      }
      return label;
    };

    for (const filter of ordered) {
      const inputs = filter.inputs.map(inputLabel).join('');
      const fanouts: string[] = [];
      const outputs = filter.outputs
        .map(output => {
          const label = this.nextLabel(output.kind);
          labels.set(output, label);
          const codecs = output.codecs.filter(codec => this.codecs.includes(codec));
          if (codecs.length === 1 && codecs[0]) {
            maps.set(codecs[0], label);
          } else if (codecs.length > 1) {
            fanouts.push(this.fanout(output.kind, label, codecs, maps));
          }
          return label;
        })
        .join('');
      statements.push(`${inputs}${filter.render()}${outputs}`, ...fanouts);
    }

    return { form: 'full', text: statements.join(';'), maps, chains: new Map() };
  }

  /**
   * A label can be mapped once, so an output read by several codecs is
   * split at render time. The graph itself is left as is.
   */
  private fanout(
    kind: StreamKind,
    label: string,
    codecs: Codec[],
    maps: Map<Codec, string>
  ): string {
    const name = kind === 'video' ? 'split' : 'asplit';
    const args = codecs.length === 2 ? '' : `=${codecs.length}`;
    const outputs = codecs
      .map(codec => {
        const out = this.nextLabel(kind);
        maps.set(codec, out);
        return out;
      })
      .join('');
    return `${label}${name}${args}${outputs}`;
  }
}
