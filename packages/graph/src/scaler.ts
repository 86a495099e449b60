/**
 * Scaler
 *
 * Frame size arithmetic for planning Scale and Crop parameters: fit into
 * or cover a target box, crop, rotate by quarter turns, with results
 * rounded to a block size.
 */

import { InvalidParamsError } from './errors.js';

export type RoundingMode = 'round' | 'ceil' | 'floor';

export interface Size {
  width: number;
  height: number;
}

export interface CropBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ScalerOptions {
  /** Pixel aspect ratio */
  par?: number;
  /** Degrees, multiple of 90 */
  rotation?: number;
  /** Resulting dimensions are multiples of this */
  accuracy?: number;
}

/**
 * Round `value` to a multiple of `divisor`. The value is first rounded to
 * `quality` decimals so 503.9999999 counts as 504.
 */
export function xround(
  value: number,
  divisor: number,
  how: RoundingMode = 'round',
  quality = 5
): number {
  const scale = 10 ** quality;
  const v = Math.round(value * scale) / scale;
  if (how === 'floor') {
    return Math.floor(v / divisor) * divisor;
  }
  if (how === 'ceil') {
    return Math.ceil(v / divisor) * divisor;
  }
  return Math.floor(Math.trunc(v + divisor / 2) / divisor) * divisor;
}

export class Scaler {
  private constructor(
    public readonly size: Size,
    public readonly par: number,
    public readonly rotated: boolean,
    public readonly accuracy: number
  ) {}

  static create(size: Size, options: ScalerOptions = {}): Scaler {
    const rotated = options.rotation === 90 || options.rotation === 270;
    return new Scaler(
      rotated ? { width: size.height, height: size.width } : size,
      options.par ?? 1,
      rotated,
      options.accuracy ?? 2
    );
  }

  /** Source size in square pixels */
  get pixelSize(): Size {
    return { width: Math.trunc(this.size.width * this.par), height: this.size.height };
  }

  get aspect(): number {
    const { width, height } = this.size;
    return height ? Math.round((width / height) * 1000) / 1000 : 0;
  }

  crop(left: number, top: number, width: number, height: number): Scaler {
    return new Scaler(
      {
        width: Math.min(this.size.width - left, width),
        height: Math.min(this.size.height - top, height),
      },
      this.par,
      this.rotated,
      this.accuracy
    );
  }

  rotate(rotation = 90): Scaler {
    if (rotation === 0 || rotation === 180) {
      return this;
    }
    return new Scaler(
      { width: this.size.height, height: this.size.width },
      this.par,
      !this.rotated,
      this.accuracy
    );
  }

  /**
   * Largest size that fits into `target`
   */
  scaleFit(target: Size): Scaler {
    const { width, height } = this.nonEmptyPixelSize();
    return this.scale(Math.min(target.width / width, target.height / height));
  }

  /**
   * Smallest size that covers `target`, with the part of the source
   * that remains visible once the result is cropped to `target`
   */
  scaleCrop(target: Size): { scaler: Scaler; crop: CropBox } {
    const { width, height } = this.nonEmptyPixelSize();
    const factor = Math.max(target.width / width, target.height / height);
    const cw = Math.trunc(target.width / factor);
    const ch = Math.trunc(target.height / factor);
    return {
      scaler: this.scale(factor),
      crop: {
        left: Math.max(width - cw, 0) / 2,
        top: Math.max(height - ch, 0) / 2,
        width: cw,
        height: ch,
      },
    };
  }

  /**
   * Multiply dimensions by `factor`. Width rounds up and height rounds
   * down, which avoids vertical black bars for landscape sources.
   */
  scale(factor: number): Scaler {
    const { width, height } = this.pixelSize;
    return new Scaler(
      {
        width: xround(width * factor, this.accuracy, 'ceil'),
        height: xround(height * factor, this.accuracy, 'floor'),
      },
      1,
      this.rotated,
      this.accuracy
    );
  }

  private nonEmptyPixelSize(): Size {
    const size = this.pixelSize;
    if (size.width + size.height === 0) {
      throw new InvalidParamsError('scaler', ['source size is 0x0']);
    }
    return size;
  }
}
