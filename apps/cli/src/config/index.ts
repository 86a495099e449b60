/**
 * CLI Configuration
 */

import './env.js';
import { loadConfig, type EncodingConfig } from '@reelgraph/encoding';

let cached: EncodingConfig | null = null;

/**
 * Validated configuration; throws ConfigError on invalid variables
 */
export function getConfig(): EncodingConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}
