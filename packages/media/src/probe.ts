/**
 * Metadata Probe
 */

import type { SourceStreamInit } from '@reelgraph/graph';
import { createLogger } from '@reelgraph/utils';
import { metadataFromProbe } from './metadata.js';
import { FFProbe } from './probes/ffprobe.js';

const log = createLogger({ module: 'metadata-probe' });

export class MetadataProbe {
  private ffprobe: FFProbe;

  constructor(ffprobe: FFProbe = new FFProbe()) {
    this.ffprobe = ffprobe;
  }

  /**
   * Stream metadata of `file`. A file ffprobe cannot read yields no streams;
   * the graph then runs with unknown metadata.
   */
  async probe(file: string): Promise<SourceStreamInit[]> {
    try {
      const result = await this.ffprobe.probe(file);
      const streams = metadataFromProbe(result);
      log.debug({ file, streams: streams.length }, 'File probed');
      return streams;
    } catch (error) {
      log.warn(
        { file, error: error instanceof Error ? error.message : String(error) },
        'Probe failed, stream metadata is unknown'
      );
      return [];
    }
  }
}
