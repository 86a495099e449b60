/**
 * Encoding Configuration
 *
 * Tool paths and execution settings, read from the environment.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  // Execution
  FFMPEG_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).default('3600000'), // 1 hour
  FFMPEG_LOGLEVEL: z.string().min(1).default('level+info'),
});

export interface EncodingConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  ffmpegPath: string;
  ffprobePath: string;
  timeout: number;
  loglevel: string;
}

/**
 * Validate an environment. Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EncodingConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  const parsed = parseResult.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    ffmpegPath: parsed.FFMPEG_PATH,
    ffprobePath: parsed.FFPROBE_PATH,
    timeout: parsed.FFMPEG_TIMEOUT_MS,
    loglevel: parsed.FFMPEG_LOGLEVEL,
  };
}
