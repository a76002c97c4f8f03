/**
 * RGB raster the engine plots into
 */

import { ConfigError, OutOfBoundsError } from './errors.js';
import type { Rgb } from './types.js';

export const BLACK: Rgb = [0, 0, 0];
export const WHITE: Rgb = [255, 255, 255];

const CHANNELS = 3;

export function assertDimension(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`Canvas ${name} must be a positive integer, got ${value}`);
  }
}

export function assertColor(color: Rgb): void {
  for (const channel of color) {
    if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
      throw new ConfigError(`Color channel must be an integer in 0..255, got ${channel}`);
    }
  }
}

export class PixelCanvas {
  /** Row-major RGB bytes, origin at the top-left corner. */
  readonly data: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
    readonly background: Rgb = BLACK
  ) {
    assertDimension('width', width);
    assertDimension('height', height);
    assertColor(background);
    this.data = new Uint8Array(width * height * CHANNELS);
    this.fill(background);
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  setPixel(x: number, y: number, color: Rgb): void {
    if (!this.inBounds(x, y)) throw new OutOfBoundsError(x, y, this.width, this.height);
    const i = (y * this.width + x) * CHANNELS;
    this.data[i] = color[0];
    this.data[i + 1] = color[1];
    this.data[i + 2] = color[2];
  }

  getPixel(x: number, y: number): Rgb {
    if (!this.inBounds(x, y)) throw new OutOfBoundsError(x, y, this.width, this.height);
    const i = (y * this.width + x) * CHANNELS;
    return [this.data[i] ?? 0, this.data[i + 1] ?? 0, this.data[i + 2] ?? 0];
  }

  fill(color: Rgb): void {
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      this.data[i] = color[0];
      this.data[i + 1] = color[1];
      this.data[i + 2] = color[2];
    }
  }

  countMatching(color: Rgb): number {
    let n = 0;
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      if (this.data[i] === color[0] && this.data[i + 1] === color[1] && this.data[i + 2] === color[2]) n++;
    }
    return n;
  }

  isUniform(color: Rgb): boolean {
    return this.countMatching(color) === this.width * this.height;
  }
}
