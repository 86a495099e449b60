import { describe, it, expect } from 'vitest';
import {
  Codec,
  Concat,
  MetadataRequiredError,
  Overlay,
  SetPTS,
  Source,
  Split,
  Trim,
  analyzeBuffering,
  sceneLag,
  videoMeta,
} from '../src/index.js';

function makeSource(name: string, duration: number): Source {
  return new Source(
    [{ kind: 'video', meta: videoMeta({ stream: `${name}#0`, duration, frameRate: 25 }) }],
    name
  );
}

describe('analyzeBuffering', () => {
  it('flags a shared source read in diverging orders', () => {
    const main = makeSource('main.mp4', 10);
    const preroll = makeSource('preroll.mp4', 5);
    const split = main.video.pipe(new Split({ kind: 'video' }));

    const direct = new Codec('video', 'libx264');
    split.pipe(direct);

    const edited = new Codec('video', 'libx264');
    const concat = new Concat({ kind: 'video' });
    split.pipe(new Trim({ kind: 'video', start: 5, end: 10 })).pipe(concat);
    preroll.video.pipe(new Trim({ kind: 'video', start: 0, end: 5 })).pipe(concat);
    concat.pipe(edited);

    const report = analyzeBuffering([direct, edited]);

    expect([...report.hazards.keys()]).toEqual(['main.mp4#0']);
    const [hazard] = report.hazards.get('main.mp4#0') ?? [];
    expect(hazard?.held.codec).toBe(direct);
    expect(hazard?.ahead.codec).toBe(edited);
    expect(hazard?.held.scene).toEqual({ stream: 'main.mp4#0', start: 0, end: 10, position: 0 });
    expect(hazard?.ahead.scene).toEqual({ stream: 'main.mp4#0', start: 5, end: 10, position: 0 });
    expect(hazard?.lag).toBe(5);
    expect(report.skipped).toEqual([]);
  });

  it('builds per-source timelines', () => {
    const main = makeSource('main.mp4', 10);
    const preroll = makeSource('preroll.mp4', 5);
    const codec = new Codec('video');
    const concat = new Concat({ kind: 'video' });
    preroll.video.pipe(concat);
    main.video.pipe(concat);
    concat.pipe(codec);

    const report = analyzeBuffering([codec]);

    expect(report.timelines.get('preroll.mp4#0')).toEqual([
      { codec, start: 0, end: 5, position: 0 },
    ]);
    expect(report.timelines.get('main.mp4#0')).toEqual([
      { codec, start: 0, end: 10, position: 5 },
    ]);
    expect(report.hazards.size).toBe(0);
  });

  it('accepts identical consumption by several codecs', () => {
    const main = makeSource('main.mp4', 10);
    const split = main.video.pipe(new Split({ kind: 'video' }));
    const first = new Codec('video');
    const second = new Codec('video');
    split.pipe(first);
    split.pipe(second);

    expect(analyzeBuffering([first, second]).hazards.size).toBe(0);
  });

  it('flags scenes of one source in reverse order', () => {
    const main = makeSource('main.mp4', 10);
    const split = main.video.pipe(new Split({ kind: 'video' }));
    const concat = new Concat({ kind: 'video' });
    const codec = new Codec('video');
    split.pipe(new Trim({ kind: 'video', start: 5, end: 10 })).pipe(concat);
    split.pipe(new Trim({ kind: 'video', start: 0, end: 5 })).pipe(concat);
    concat.pipe(codec);

    const [hazard] = analyzeBuffering([codec]).hazards.get('main.mp4#0') ?? [];

    expect(hazard?.held.scene).toEqual({ stream: 'main.mp4#0', start: 0, end: 5, position: 5 });
    expect(hazard?.ahead.scene).toEqual({ stream: 'main.mp4#0', start: 5, end: 10, position: 0 });
    expect(hazard?.lag).toBe(10);
  });

  it('counts the top layer of an overlay as consumed', () => {
    const main = makeSource('main.mp4', 10);
    const split = main.video.pipe(new Split({ kind: 'video' }));
    const overlay = new Overlay();
    const codec = new Codec('video');
    split.pipe(overlay);
    split
      .pipe(new Trim({ kind: 'video', start: 5, end: 10 }))
      .pipe(new SetPTS({ kind: 'video' }))
      .pipe(overlay);
    overlay.pipe(codec);

    const report = analyzeBuffering([codec]);

    expect(report.timelines.get('main.mp4#0')).toHaveLength(2);
    expect(report.hazards.get('main.mp4#0')?.[0]?.lag).toBe(5);
  });

  it('skips codecs without metadata', () => {
    const source = new Source([{ kind: 'video' }], 'unknown.mp4');
    const codec = new Codec('video');
    source.video.pipe(codec);

    const report = analyzeBuffering([codec]);

    expect(report.skipped).toEqual([codec]);
    expect(report.timelines.size).toBe(0);
  });

  it('requires metadata on request', () => {
    const source = new Source([{ kind: 'video' }], 'unknown.mp4');
    const codec = new Codec('video');
    source.video.pipe(codec);

    expect(() => analyzeBuffering([codec], { requireMetadata: true })).toThrow(
      MetadataRequiredError
    );
  });
});

describe('sceneLag', () => {
  const codec = new Codec('video');

  it('is zero for consecutive scenes', () => {
    expect(
      sceneLag(
        { codec, start: 0, end: 5, position: 0 },
        { codec, start: 5, end: 10, position: 5 }
      )
    ).toBe(0);
  });

  it('is null when the second scene ends before the first starts', () => {
    expect(
      sceneLag(
        { codec, start: 5, end: 10, position: 0 },
        { codec, start: 0, end: 4, position: 5 }
      )
    ).toBeNull();
  });
});
