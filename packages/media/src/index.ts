/**
 * @reelgraph/media
 *
 * Probes media files and turns the results into source stream metadata.
 */

export { ProbeError } from './errors.js';
export {
  FFProbe,
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';
export { metadataFromProbe, parseRational } from './metadata.js';
export { MetadataProbe } from './probe.js';
