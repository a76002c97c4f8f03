/**
 * Output file naming and path checks
 */

import fs from 'node:fs';
import path from 'node:path';

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * Day of month, hour, minute and second in UTC, e.g. "19142305"
 */
export function timestamp(date: Date): string {
  return pad2(date.getUTCDate()) + pad2(date.getUTCHours()) + pad2(date.getUTCMinutes()) + pad2(date.getUTCSeconds());
}

/**
 * Name of the rendered image
 * @param date - Render time
 * @param width - Canvas width
 * @param height - Canvas height
 * @param quality - Iteration count
 * @returns `<DDHHMMSS>_<width>x<height>_<quality>.png`
 */
export function outputFileName(date: Date, width: number, height: number, quality: number): string {
  return `${timestamp(date)}_${width}x${height}_${quality}.png`;
}

/** Throws when the directory the file would be written to does not exist. */
export function checkOutputPath(file: string): void {
  const dir = path.dirname(file);
  const st = fs.statSync(dir, { throwIfNoEntry: false });
  if (!st || !st.isDirectory()) throw new Error(`Directory "${dir}" does not exist`);
}
