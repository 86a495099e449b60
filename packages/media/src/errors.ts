/**
 * Probe Errors
 */

import { ReelgraphError } from '@reelgraph/graph';

export class ProbeError extends ReelgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROBE_ERROR', details);
    this.name = 'ProbeError';
  }
}
