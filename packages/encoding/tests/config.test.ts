import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      timeout: 3600000,
      loglevel: 'level+info',
    });
  });

  it('reads tool paths and timeouts', () => {
    const config = loadConfig({
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      FFMPEG_TIMEOUT_MS: '60000',
    });
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.timeout).toBe(60000);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ FFMPEG_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
