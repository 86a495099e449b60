/**
 * FFProbe Wrapper
 *
 * Runs ffprobe and validates its JSON report. Only the fields stream
 * metadata is built from are typed; everything else passes through.
 */

import { executeCommand } from '@reelgraph/utils';
import { z } from 'zod';
import { ProbeError } from '../errors.js';

const streamSchema = z
  .object({
    index: z.number(),
    codec_type: z.string(),
    codec_name: z.string().optional(),
    start_time: z.string().optional(),
    duration: z.string().optional(),
    bit_rate: z.string().optional(),
    // Video specific
    width: z.number().optional(),
    height: z.number().optional(),
    sample_aspect_ratio: z.string().optional(),
    display_aspect_ratio: z.string().optional(),
    pix_fmt: z.string().optional(),
    r_frame_rate: z.string().optional(),
    avg_frame_rate: z.string().optional(),
    nb_frames: z.string().optional(),
    // Audio specific
    sample_rate: z.string().optional(),
    channels: z.number().optional(),
    channel_layout: z.string().optional(),
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

const formatSchema = z
  .object({
    filename: z.string().optional(),
    format_name: z.string().optional(),
    start_time: z.string().optional(),
    duration: z.string().optional(),
    size: z.string().optional(),
    bit_rate: z.string().optional(),
    tags: z.record(z.string()).optional(),
  })
  .passthrough();

export const ffprobeResultSchema = z.object({
  format: formatSchema.default({}),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeResult = z.output<typeof ffprobeResultSchema>;
export type FFProbeStream = z.output<typeof streamSchema>;

export class FFProbe {
  private ffprobePath: string;
  private timeout: number;

  constructor(ffprobePath: string = 'ffprobe', timeout: number = 60000) {
    this.ffprobePath = ffprobePath;
    this.timeout = timeout;
  }

  /**
   * Probe a media file and return its format and streams
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_error',
      filePath,
    ];

    const result = await executeCommand(this.ffprobePath, args, {
      timeout: this.timeout,
    });

    if (result.exitCode !== 0) {
      throw new ProbeError(`ffprobe failed for ${filePath}: ${result.stderr.trim()}`, {
        file: filePath,
        exitCode: result.exitCode,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch {
      throw new ProbeError(
        `Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`,
        { file: filePath }
      );
    }

    const parsed = ffprobeResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProbeError(`Unexpected ffprobe output for ${filePath}`, {
        file: filePath,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }
}
