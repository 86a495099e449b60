import { describe, it, expect } from 'vitest';
import { InvalidParamsError, Scale, audioMeta, videoMeta } from '@reelgraph/graph';
import { AudioCodec, Input, Output, Simd, VideoCodec } from '../src/index.js';

function makeSource(): Input {
  return new Input({
    file: 'src.mp4',
    streams: [
      { kind: 'video', meta: videoMeta({ duration: 60, width: 1920, height: 1080, frameRate: 25 }) },
      { kind: 'audio', meta: audioMeta({ duration: 60, sampleRate: 48000 }) },
    ],
  });
}

function makeOutput(file: string): Output {
  return new Output({ file, codecs: [new VideoCodec(), new AudioCodec()] });
}

describe('Simd', () => {
  it('renders one source into several renditions', () => {
    const simd = new Simd(makeSource(), [makeOutput('720.mp4'), makeOutput('360.mp4')]);

    const scaled = simd.video.connect(Scale, [
      { width: 1280, height: 720 },
      { width: 640, height: 360 },
    ]);
    simd.finalize(scaled);

    const ffmpeg = simd.program();
    expect(ffmpeg.render()).toEqual([
      '-loglevel', 'level+info', '-y',
      '-i', 'src.mp4',
      '-filter_complex',
      '[0:v]split[vout0][vout1];[vout0]scale=w=1280:h=720[vout2];[vout1]scale=w=640:h=360[vout3]',
      '-map', '[vout2]', '-c:v:0', 'libx264', '-map', '0:a', '-c:a:0', 'aac', '720.mp4',
      '-map', '[vout3]', '-c:v:0', 'libx264', '-map', '0:a', '-c:a:0', 'aac', '360.mp4',
    ]);
    expect(ffmpeg.checkBuffering().hazards.size).toBe(0);
  });

  it('copies untouched streams straight from the source', () => {
    const simd = new Simd(makeSource(), [makeOutput('a.mp4')]);

    const ffmpeg = simd.program();
    expect(ffmpeg.render()).toEqual([
      '-loglevel', 'level+info', '-y',
      '-i', 'src.mp4',
      '-map', '0:v', '-c:v:0', 'libx264', '-map', '0:a', '-c:a:0', 'aac', 'a.mp4',
    ]);
  });

  it('requires metadata on every input stream', () => {
    const bare = new Input({ file: 'bare.mp4' });
    expect(() => new Simd(bare, [makeOutput('a.mp4')])).toThrow(InvalidParamsError);

    const simd = new Simd(makeSource(), [makeOutput('a.mp4')]);
    expect(() => simd.addInput(bare)).toThrow(
      'Invalid parameters for simd: bare.mp4[0]: stream metadata must be set for input file; ' +
        'bare.mp4[1]: stream metadata must be set for input file'
    );
  });

  it('requires codecs on every output', () => {
    expect(() => new Simd(makeSource(), [new Output({ file: 'empty.mp4' })])).toThrow(
      'Invalid parameters for simd: empty.mp4: codecs must be set for output file'
    );
  });
});
