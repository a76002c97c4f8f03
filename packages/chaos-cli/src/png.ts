import fs from 'node:fs';
import pkg from 'pngjs';
import type { PixelCanvas } from '@chaosgame/core';
const { PNG } = pkg;

// Truecolor without alpha, matching the canvas layout
const RGB = 2;

export function encodePng(canvas: PixelCanvas): Buffer {
  const png = new PNG({ width: canvas.width, height: canvas.height });
  png.data = Buffer.from(canvas.data);
  return PNG.sync.write(png, { colorType: RGB, inputColorType: RGB, inputHasAlpha: false });
}

export function savePng(canvas: PixelCanvas, file: string): void {
  fs.writeFileSync(file, encodePng(canvas));
}
