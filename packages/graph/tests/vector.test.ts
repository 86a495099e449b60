import { describe, it, expect } from 'vitest';
import {
  Codec,
  FilterGraph,
  Scale,
  Source,
  Split,
  StreamVector,
  VectorLengthMismatchError,
  Volume,
  paramsKey,
  videoMeta,
} from '../src/index.js';

function makeSource(): Source {
  return new Source(
    [
      { kind: 'video', meta: videoMeta({ stream: 'in.mp4#0', width: 1920, height: 1080 }) },
      { kind: 'audio' },
    ],
    'in.mp4'
  );
}

describe('StreamVector.connect', () => {
  it('splits a shared stream for distinct parameter sets', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);

    const scaled = vector.connect(Scale, [
      { width: 1920, height: 1080 },
      { width: 1280, height: 720 },
    ]);

    const split = source.video.consumer;
    expect(split).toBeInstanceOf(Split);
    expect(split?.outputs).toHaveLength(2);

    const [first, second] = scaled.streams;
    expect(first?.owner).toBeInstanceOf(Scale);
    expect(second?.owner).toBeInstanceOf(Scale);
    expect(first?.owner).not.toBe(second?.owner);

    const codecs = [new Codec('video', 'libx264'), new Codec('video', 'libx264')];
    scaled.finalize(codecs);
    const rendered = new FilterGraph([source], codecs).render();
    expect(rendered.text).toBe(
      '[0:v]split[vout0][vout1];' +
        '[vout0]scale=w=1920:h=1080[vout2];' +
        '[vout1]scale=w=1280:h=720[vout3]'
    );
  });

  it('shares one filter for equal parameters', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);

    const scaled = vector.connect(Scale, { width: 1280, height: 720 });

    expect(source.video.consumer).toBeInstanceOf(Scale);
    expect(scaled.streams[0]).toBe(scaled.streams[1]);
  });

  it('deduplicates parameter objects regardless of key order', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);

    vector.connect(Scale, [
      { width: 1280, height: 720 },
      { height: 720, width: 1280 },
    ]);

    expect(source.video.consumer).toBeInstanceOf(Scale);
  });

  it('passes masked elements through a split branch', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);

    const result = vector.connect(Scale, { width: 640, height: 360 }, [true, false]);
    const scaled = new Codec('video');
    const original = new Codec('video');
    result.finalize([scaled, original]);

    const rendered = new FilterGraph([source], [scaled, original]).render();
    expect(rendered.text).toBe('[0:v]split[vout0][vout1];[vout0]scale=w=640:h=360[vout2]');
    expect(rendered.maps.get(scaled)).toBe('[vout2]');
    expect(rendered.maps.get(original)).toBe('[vout1]');
  });

  it('leaves a fully masked vector untouched', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);

    const result = vector.connect(Scale, { width: 640 }, [false, false]);

    expect(result.streams).toEqual([source.video, source.video]);
    expect(source.video.isConsumed).toBe(false);
  });

  it('applies one filter instance to every element', () => {
    const source = makeSource();
    const volume = new Volume({ volume: 0.5 });
    const vector = new StreamVector([source.audio, source.audio]);

    const result = vector.apply(volume);

    expect(source.audio.consumer).toBe(volume);
    expect(result.streams).toEqual([volume.output, volume.output]);
  });
});

describe('StreamVector length checks', () => {
  it('rejects a params vector of another length', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);
    expect(() =>
      vector.connect(Scale, [{ width: 1 }, { width: 2 }, { width: 3 }])
    ).toThrow(VectorLengthMismatchError);
  });

  it('rejects a mask of another length', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);
    expect(() => vector.connect(Scale, { width: 640 }, [true])).toThrow(
      'mask length 1 does not match vector length 2'
    );
  });

  it('rejects a codec list of another length', () => {
    const source = makeSource();
    const vector = new StreamVector([source.video, source.video]);
    expect(() => vector.finalize([new Codec('video')])).toThrow(VectorLengthMismatchError);
  });
});

describe('paramsKey', () => {
  it('ignores key order', () => {
    expect(paramsKey({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });
});
