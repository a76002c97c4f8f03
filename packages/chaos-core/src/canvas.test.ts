import { describe, it, expect } from 'vitest';
import { BLACK, PixelCanvas, WHITE } from './canvas.js';
import { ConfigError, OutOfBoundsError } from './errors.js';

describe('PixelCanvas', () => {
  it('starts at the background color', () => {
    const c = new PixelCanvas(3, 2);
    expect(c.data.length).toBe(18);
    expect(c.isUniform(BLACK)).toBe(true);
    expect(new PixelCanvas(2, 2, [10, 20, 30]).getPixel(1, 1)).toEqual([10, 20, 30]);
  });

  it('writes row-major RGB', () => {
    const c = new PixelCanvas(3, 2);
    c.setPixel(2, 1, WHITE);
    expect(c.getPixel(2, 1)).toEqual([255, 255, 255]);
    expect(Array.from(c.data.subarray(15, 18))).toEqual([255, 255, 255]);
    expect(c.countMatching(WHITE)).toBe(1);
  });

  it('treats repeated writes as one', () => {
    const c = new PixelCanvas(4, 4);
    c.setPixel(1, 1, WHITE);
    c.setPixel(1, 1, WHITE);
    expect(c.countMatching(WHITE)).toBe(1);
    expect(c.countMatching(BLACK)).toBe(15);
  });

  it.each([[3, 0], [0, 2], [-1, 0], [0.5, 0]])('rejects a write at (%s, %s)', (x, y) => {
    const c = new PixelCanvas(3, 2);
    expect(() => c.setPixel(x, y, WHITE)).toThrow(OutOfBoundsError);
    expect(c.isUniform(BLACK)).toBe(true);
  });

  it('reports the offending coordinate', () => {
    const c = new PixelCanvas(3, 2);
    try {
      c.setPixel(7, 1, WHITE);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(OutOfBoundsError);
      if (e instanceof OutOfBoundsError) {
        expect([e.x, e.y, e.width, e.height]).toEqual([7, 1, 3, 2]);
        expect(e.message).toBe('Pixel (7, 1) is outside the 3x2 canvas');
      }
    }
  });

  it.each([[0, 1], [1, 0], [1.5, 2], [-4, 2]])('rejects %sx%s', (w, h) => {
    expect(() => new PixelCanvas(w, h)).toThrow(ConfigError);
  });

  it('rejects invalid colors', () => {
    expect(() => new PixelCanvas(1, 1, [256, 0, 0])).toThrow(ConfigError);
  });
});
