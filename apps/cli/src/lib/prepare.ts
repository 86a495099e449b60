/**
 * Job Preparation
 *
 * Loads a job file, probes its inputs and builds the ffmpeg program.
 */

import type { SourceStreamInit } from '@reelgraph/graph';
import { FFProbe, MetadataProbe } from '@reelgraph/media';
import { getConfig } from '../config/index.js';
import { buildProgram, loadJob, type BuiltJob } from './job.js';

export interface PrepareOptions {
  probe?: boolean;
  overwrite?: boolean;
}

export async function prepareJob(path: string, options: PrepareOptions = {}): Promise<BuiltJob> {
  const config = getConfig();
  const job = await loadJob(path);

  const metadata = new Map<string, SourceStreamInit[]>();
  if (options.probe !== false) {
    const probe = new MetadataProbe(new FFProbe(config.ffprobePath));
    const probed = await Promise.all(
      job.inputs.map(async input => (input.probe ? probe.probe(input.file) : []))
    );
    job.inputs.forEach((input, i) => {
      const streams = probed[i];
      if (streams && streams.length > 0) {
        metadata.set(input.id, streams);
      }
    });
  }

  return buildProgram(job, metadata, {
    ffmpegPath: config.ffmpegPath,
    loglevel: config.loglevel,
    timeout: config.timeout,
    overwrite: options.overwrite,
  });
}
