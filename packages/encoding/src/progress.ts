/**
 * Progress Parser
 *
 * Reads ffmpeg's periodic status line:
 * frame= 1000 fps=24.5 q=28.0 size=   1234kB time=00:00:42.00 bitrate= 240.5kbits/s speed=2.01x
 */

import { parseTimecode } from '@reelgraph/utils';

export interface FFmpegProgress {
  frame: number;
  fps: number;
  /** Output time reached, seconds */
  time: number;
  speed: number;
  /** 0-100, null when the expected duration is unknown */
  percent: number | null;
}

const STATUS_PATTERN = /frame=\s*(\d+)\s+fps=\s*([\d.]+).*?time=\s*([\d:.]+).*?speed=\s*([\d.]+)x/;

/**
 * Progress carried by a status line, null for any other line
 */
export function parseProgressLine(line: string, duration?: number): FFmpegProgress | null {
  const match = STATUS_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [, frame = '0', fps = '0', time = '0', speed = '0'] = match;

  let seconds: number;
  try {
    seconds = parseTimecode(time);
  } catch {
    return null;
  }

  return {
    frame: parseInt(frame, 10),
    fps: parseFloat(fps),
    time: seconds,
    speed: parseFloat(speed),
    percent:
      duration !== undefined && duration > 0 ? Math.min(100, (seconds / duration) * 100) : null,
  };
}
