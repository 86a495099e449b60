import { describe, it, expect } from 'vitest';
import { Codec, InvalidParamsError, videoMeta } from '@reelgraph/graph';
import { AudioCodec, Input, Output, VideoCodec } from '../src/index.js';

describe('Input', () => {
  it('names scenes after the file and stream position', () => {
    const input = new Input({
      file: 'a.mp4',
      streams: [{ kind: 'audio' }, { kind: 'video', meta: videoMeta({ duration: 5 }) }],
    });

    expect(input.video.meta?.scenes).toEqual([
      { stream: 'a.mp4#1', start: 0, end: 5, position: 0 },
    ]);
    expect(input.video.meta?.streams).toEqual(['a.mp4#1']);
    expect(input.audio.meta).toBeNull();
  });

  it('keeps scene names given by the caller', () => {
    const input = new Input({
      file: 'a.mp4',
      streams: [{ kind: 'video', meta: videoMeta({ stream: 'camera-1', duration: 5 }) }],
    });
    expect(input.video.meta?.streams).toEqual(['camera-1']);
  });

  it('defaults to one video and one audio stream', () => {
    const input = new Input({ file: 'a.mp4' });
    expect(input.streams.map(stream => stream.kind)).toEqual(['video', 'audio']);
  });

  it('renders input options before the file', () => {
    const input = new Input({
      file: 'a.mp4',
      hwaccel: 'cuda',
      hwaccelDevice: '0',
      seekTo: 12.5,
      duration: 30,
      format: 'mp4',
      extraArgs: ['-re'],
    });
    expect(input.renderArgs()).toEqual([
      '-hwaccel', 'cuda', '-hwaccel_device', '0',
      '-ss', '12.5', '-t', '30', '-f', 'mp4', '-re',
      '-i', 'a.mp4',
    ]);
  });

  it('marks hardware-decoded video with its device', () => {
    const input = new Input({
      file: 'a.mp4',
      hwaccel: 'cuda',
      streams: [{ kind: 'video', meta: videoMeta({ width: 1920, height: 1080 }) }],
    });
    const meta = input.video.meta;
    expect(meta?.kind === 'video' ? meta.device : undefined).toEqual({
      hardware: 'cuda',
      name: 'cuda',
    });
  });
});

describe('Output', () => {
  it('numbers codecs per kind', () => {
    const first = new VideoCodec();
    const audio = new AudioCodec();
    const second = new VideoCodec();
    new Output({ file: 'out.mkv', codecs: [first, audio, second] });

    expect([first.index, audio.index, second.index]).toEqual([0, 0, 1]);
  });

  it('appends a copy codec when every codec of a kind is taken', () => {
    const input = new Input({ file: 'a.mp4' });
    const output = new Output({ file: 'out.mkv', codecs: [new VideoCodec()] });
    output.receive(input.video);

    expect(output.codecs).toHaveLength(1);
    const stub = output.freeCodec('audio');
    expect(stub).toBeInstanceOf(Codec);
    expect(stub.codecName).toBe('copy');
    expect(output.codecs).toHaveLength(2);
    expect(output.freeCodec('audio')).toBe(stub);
  });

  it('leaves the codec list alone when read', () => {
    const video = new VideoCodec();
    const output = new Output({ file: 'out.mkv', codecs: [video] });

    expect(output.codecs).toEqual([video]);
    expect(output.renderArgs()).toEqual(['-an', 'out.mkv']);
    expect(output.codecs).toEqual([video]);
    expect('audio' in output).toBe(false);
  });

  it('disables missing stream kinds', () => {
    const output = new Output({
      file: 'out.mp4',
      codecs: [new AudioCodec()],
      format: 'mp4',
      movflags: '+faststart',
    });
    expect(output.renderArgs()).toEqual(['-vn', '-f', 'mp4', '-movflags', '+faststart', 'out.mp4']);
  });
});

describe('codecs', () => {
  it('renders options with stream specifiers', () => {
    const codec = new VideoCodec({
      codec: 'libx264',
      bitrate: '4M',
      preset: 'fast',
      crf: 23,
      pixFmt: 'yuv420p',
      gop: 50,
    });
    codec.index = 1;

    expect(codec.renderArgs()).toEqual([
      '-c:v:1', 'libx264',
      '-b:v:1', '4M',
      '-preset:v:1', 'fast',
      '-crf:v:1', '23',
      '-pix_fmt:v:1', 'yuv420p',
      '-g:v:1', '50',
    ]);
  });

  it('renders audio options', () => {
    const codec = new AudioCodec({ bitrate: 128000, sampleRate: 48000, channels: 2 });
    expect(codec.renderArgs()).toEqual([
      '-c:a:0', 'aac',
      '-b:a:0', '128000',
      '-ar:a:0', '48000',
      '-ac:a:0', '2',
    ]);
  });

  it('ignores encoder options for stream copy', () => {
    expect(new VideoCodec({ codec: 'copy', bitrate: '4M' }).renderArgs()).toEqual(['-c:v:0', 'copy']);
  });

  it('validates options', () => {
    expect(() => new VideoCodec({ bitrate: 'fast' })).toThrow(InvalidParamsError);
    expect(() => new AudioCodec({ channels: 0 })).toThrow(InvalidParamsError);
  });
});
