import { describe, it, expect } from 'vitest';
import { InvalidParamsError, Scaler, xround } from '../src/index.js';

describe('xround', () => {
  it('rounds to a multiple of the divisor', () => {
    expect(xround(503.9999999, 2)).toBe(504);
    expect(xround(365, 16, 'floor')).toBe(352);
    expect(xround(353, 16, 'ceil')).toBe(368);
    expect(xround(7, 4)).toBe(8);
  });
});

describe('Scaler', () => {
  it('fits into and covers a target box', () => {
    const scaler = Scaler.create({ width: 1280, height: 960 }, { accuracy: 1 });

    expect(scaler.scaleFit({ width: 640, height: 360 }).size).toEqual({ width: 480, height: 360 });

    const { scaler: covered, crop } = scaler.scaleCrop({ width: 640, height: 360 });
    expect(covered.size).toEqual({ width: 640, height: 480 });
    expect(crop).toEqual({ left: 0, top: 120, width: 1280, height: 720 });
  });

  it('rounds to blocks', () => {
    const scaler = Scaler.create({ width: 1280, height: 720 }, { accuracy: 16 });
    expect(scaler.scaleFit({ width: 640, height: 360 }).size).toEqual({ width: 640, height: 352 });
  });

  it('accounts for rotation', () => {
    const scaler = Scaler.create({ width: 1280, height: 720 }, { rotation: 90 });
    expect(scaler.scaleFit({ width: 360, height: 640 }).size).toEqual({ width: 360, height: 640 });
    expect(scaler.rotate(90).size).toEqual({ width: 1280, height: 720 });
  });

  it('accounts for non-square pixels', () => {
    const scaler = Scaler.create({ width: 720, height: 720 }, { par: 16 / 9 });
    const fit = scaler.scaleFit({ width: 640, height: 360 });
    expect(fit.size).toEqual({ width: 640, height: 360 });
    expect(fit.par).toBe(1);
  });

  it('crops within the frame', () => {
    const scaler = Scaler.create({ width: 1920, height: 1080 });
    expect(scaler.crop(1600, 0, 640, 360).size).toEqual({ width: 320, height: 360 });
    expect(scaler.aspect).toBe(1.778);
  });

  it('refuses an empty source', () => {
    const scaler = Scaler.create({ width: 0, height: 0 });
    expect(() => scaler.scaleFit({ width: 640, height: 360 })).toThrow(InvalidParamsError);
  });
});
