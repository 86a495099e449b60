import { describe, it, expect } from 'vitest';
import {
  Codec,
  Concat,
  CyclicGraphError,
  DanglingOutputError,
  FilterGraph,
  Overlay,
  Scale,
  Source,
  Split,
  UnresolvedReferenceError,
  Volume,
  audioMeta,
  connect,
  videoMeta,
} from '../src/index.js';

function makeSource(name = 'input.mp4'): Source {
  return new Source(
    [
      {
        kind: 'video',
        meta: videoMeta({ stream: `${name}#0`, duration: 10, width: 1920, height: 1080 }),
      },
      { kind: 'audio', meta: audioMeta({ stream: `${name}#1`, duration: 10 }) },
    ],
    name
  );
}

describe('FilterGraph short form', () => {
  it('renders a single scale as a bare chain', () => {
    const source = makeSource();
    const codec = new Codec('video', 'libx264');
    source.video.pipe(new Scale({ width: 1280, height: 720 })).pipe(codec);

    const rendered = new FilterGraph([source], [codec]).render();

    expect(rendered.form).toBe('short');
    expect(rendered.text).toBe('scale=w=1280:h=720');
    expect(rendered.maps.get(codec)).toBe('0:v');
    expect(rendered.chains.get(codec)).toBe('scale=w=1280:h=720');
  });

  it('joins a linear chain with commas and maps direct codecs', () => {
    const source = makeSource();
    const video = new Codec('video', 'libx264');
    const audio = new Codec('audio', 'aac');
    source.video
      .pipe(new Scale({ width: 1280 }))
      .pipe(new Scale({ height: 360 }))
      .pipe(video);
    source.audio.pipe(audio);

    const rendered = new FilterGraph([source], [video, audio]).render();

    expect(rendered.text).toBe('scale=w=1280:h=-1,scale=w=-1:h=360');
    expect(rendered.maps.get(audio)).toBe('0:a');
  });

  it('is pure across repeated renders', () => {
    const source = makeSource();
    const codec = new Codec('video');
    source.video.pipe(new Scale({ width: 640 })).pipe(codec);
    const graph = new FilterGraph([source], [codec]);

    const first = graph.render();
    const second = graph.render();

    expect(second.text).toBe(first.text);
    expect([...second.maps.values()]).toEqual([...first.maps.values()]);
  });
});

describe('FilterGraph full form', () => {
  it('labels each split branch once', () => {
    const source = makeSource();
    const split = source.video.pipe(new Split({ kind: 'video', outputCount: 3 }));
    const sizes = [
      { width: 1280, height: 720 },
      { width: 640, height: 360 },
      { width: 320, height: 180 },
    ];
    const codecs = sizes.map(size => {
      const codec = new Codec('video', 'libx264');
      split.pipe(new Scale(size)).pipe(codec);
      return codec;
    });

    const rendered = new FilterGraph([source], codecs).render();

    expect(rendered.form).toBe('full');
    expect(rendered.text).toBe(
      '[0:v]split=3[vout0][vout1][vout2];' +
        '[vout0]scale=w=1280:h=720[vout3];' +
        '[vout1]scale=w=640:h=360[vout4];' +
        '[vout2]scale=w=320:h=180[vout5]'
    );
    expect(codecs.map(codec => rendered.maps.get(codec))).toEqual([
      '[vout3]',
      '[vout4]',
      '[vout5]',
    ]);
  });

  it('references several sources', () => {
    const main = makeSource('main.mp4');
    const logo = makeSource('logo.png');
    const video = new Codec('video');
    const audio = new Codec('audio');
    const overlay = new Overlay({ x: 10, y: 20 });
    main.video.pipe(overlay);
    logo.video.pipe(overlay);
    overlay.pipe(video);
    main.audio.pipe(audio);

    const rendered = new FilterGraph([main, logo], [video, audio]).render();

    expect(rendered.text).toBe('[0:v][1:v]overlay=x=10:y=20[vout0]');
    expect(rendered.maps.get(video)).toBe('[vout0]');
    expect(rendered.maps.get(audio)).toBe('0:a');
  });

  it('orders independent chains by connection and shares one counter', () => {
    const source = makeSource();
    const audio = new Codec('audio');
    const video = new Codec('video');
    source.audio.pipe(new Volume({ volume: 0.5 })).pipe(audio);
    source.video.pipe(new Scale({ width: 640 })).pipe(video);

    const rendered = new FilterGraph([source], [video, audio]).render();

    expect(rendered.text).toBe(
      '[0:a]volume=volume=0.5[aout0];[0:v]scale=w=640:h=-1[vout1]'
    );
  });

  it('renders the same text whatever other graphs are built in between', () => {
    const build = (interleave: boolean): string => {
      const source = makeSource();
      const audio = new Codec('audio');
      const video = new Codec('video');
      source.audio.pipe(new Volume({ volume: 0.5 })).pipe(audio);
      if (interleave) {
        const other = makeSource('other.mp4');
        other.video.pipe(new Scale({ width: 320 })).pipe(new Codec('video'));
      }
      source.video.pipe(new Scale({ width: 640 })).pipe(video);
      return new FilterGraph([source], [video, audio]).render().text;
    };

    expect(build(true)).toBe(build(false));
    expect(build(true)).toBe('[0:a]volume=volume=0.5[aout0];[0:v]scale=w=640:h=-1[vout1]');
  });

  it('splits a filter output read by several codecs at render time', () => {
    const source = makeSource();
    const first = new Codec('video', 'libx264');
    const second = new Codec('video', 'libvpx-vp9');
    const scale = source.video.pipe(new Scale({ width: 640, height: 360 }));
    scale.output.pipe(first);
    scale.output.pipe(second);

    const rendered = new FilterGraph([source], [first, second]).render();

    expect(rendered.text).toBe('[0:v]scale=w=640:h=360[vout0];[vout0]split[vout1][vout2]');
    expect(rendered.maps.get(first)).toBe('[vout1]');
    expect(rendered.maps.get(second)).toBe('[vout2]');
    expect(scale.output.codecs).toHaveLength(2);
  });

  it('maps codecs on source streams without a filter graph', () => {
    const source = makeSource();
    const first = new Codec('video');
    const second = new Codec('video');
    source.video.pipe(first);
    source.video.pipe(second);

    const rendered = new FilterGraph([source], [first, second]).render();

    expect(rendered.form).toBe('empty');
    expect(rendered.text).toBe('');
    expect(rendered.maps.get(first)).toBe('0:v');
    expect(rendered.maps.get(second)).toBe('0:v');
  });

  it('labels additional streams of the same kind', () => {
    const source = new Source([{ kind: 'audio' }, { kind: 'audio' }], 'dual.mkv');
    const codec = new Codec('audio');
    source.stream('audio', 1).pipe(codec);

    const rendered = new FilterGraph([source], [codec]).render();

    expect(rendered.maps.get(codec)).toBe('0:a:1');
  });
});

describe('FilterGraph validation', () => {
  it('rejects an unconnected split output', () => {
    const source = makeSource();
    const codec = new Codec('video');
    source.video.pipe(new Split({ kind: 'video' })).pipe(codec);

    expect(() => new FilterGraph([source], [codec]).render()).toThrow(DanglingOutputError);
  });

  it('rejects an unconnected codec', () => {
    const source = makeSource();
    expect(() => new FilterGraph([source], [new Codec('video')]).render()).toThrow(
      UnresolvedReferenceError
    );
  });

  it('rejects a source missing from the input list', () => {
    const declared = makeSource('a.mp4');
    const codec = new Codec('video');
    makeSource('b.mp4').video.pipe(codec);

    expect(() => new FilterGraph([declared], [codec]).render()).toThrow(
      'b.mp4 is not a declared input'
    );
  });

  it('rejects a filter with a missing input', () => {
    const source = makeSource();
    const codec = new Codec('video');
    source.video.pipe(new Concat({ kind: 'video' })).pipe(codec);

    expect(() => new FilterGraph([source], [codec]).render()).toThrow(
      'Input 1 of concat is not connected'
    );
  });

  it('rejects cycles', () => {
    const source = makeSource();
    const concat = new Concat({ kind: 'video' });
    const scale = new Scale({ width: 100 });
    connect(source.video, concat, 0);
    concat.pipe(scale);
    scale.pipe(concat);

    expect(() => new FilterGraph([source], []).render()).toThrow(CyclicGraphError);
    expect(() => new FilterGraph([source], []).render()).toThrow(
      'Filter graph contains a cycle: concat -> scale -> concat'
    );
  });

  it('leaves the graph open after a failed render', () => {
    const source = makeSource();
    const codec = new Codec('video');
    const split = source.video.pipe(new Split({ kind: 'video' }));
    split.pipe(codec);
    const graph = new FilterGraph([source], [codec, new Codec('video')]);
    expect(() => graph.render()).toThrow(UnresolvedReferenceError);

    const other = new Codec('video');
    split.pipe(other);
    const rendered = new FilterGraph([source], [codec, other]).render();
    expect(rendered.text).toBe('[0:v]split[vout0][vout1]');
  });
});
