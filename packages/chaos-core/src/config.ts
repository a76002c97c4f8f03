/**
 * Render configuration: canvas size, triangle sizing policy, iterations, seed, colors
 */

import { assertColor, assertDimension, BLACK, WHITE } from './canvas.js';
import { assertIterations } from './engine.js';
import { ConfigError } from './errors.js';
import { boundingBox, checkedTriangle, equilateral } from './geometry.js';
import { entropySeed, seedState, type Seed } from './rng.js';
import type { Point, Rgb, Triangle } from './types.js';

export type TriangleSizing =
  | { kind: 'fit' }                                // equilateral, side = min(width, height)
  | { kind: 'side'; length: number }               // equilateral with explicit side
  | { kind: 'points'; a: Point; b: Point; c: Point };

export interface RenderConfig {
  width: number;
  height: number;
  iterations: number;
  triangle?: TriangleSizing;
  seed?: Seed;
  foreground?: Rgb;
  background?: Rgb;
}

export interface ResolvedRenderConfig {
  width: number;
  height: number;
  iterations: number;
  triangle: Triangle;
  seed: Seed;
  foreground: Rgb;
  background: Rgb;
  fitsCanvas: boolean;   // false: some pixels will land outside and be skipped
}

export function resolveTriangle(sizing: TriangleSizing, width: number, height: number): Triangle {
  switch (sizing.kind) {
    case 'fit':
      return equilateral(Math.min(width, height));
    case 'side':
      return equilateral(sizing.length);
    case 'points':
      return checkedTriangle(sizing.a, sizing.b, sizing.c);
  }
}

/**
 * Whether every pixel the walk can produce is inside the canvas.
 * A vertex sitting exactly on the right or bottom edge still counts as inside,
 * since the walk only reaches it in the limit.
 */
export function fitsCanvas(t: Triangle, width: number, height: number): boolean {
  const box = boundingBox(t);
  return box.minX >= 0 && box.minY >= 0 && box.maxX <= width && box.maxY <= height;
}

function sameColor(p: Rgb, q: Rgb): boolean {
  return p[0] === q[0] && p[1] === q[1] && p[2] === q[2];
}

export function resolveConfig(config: RenderConfig): ResolvedRenderConfig {
  const { width, height, iterations } = config;
  assertDimension('width', width);
  assertDimension('height', height);
  assertIterations(iterations);

  const foreground = config.foreground ?? WHITE;
  const background = config.background ?? BLACK;
  assertColor(foreground);
  assertColor(background);
  if (sameColor(foreground, background)) {
    throw new ConfigError(`Foreground and background must differ, both are ${foreground.join(',')}`);
  }

  const seed = config.seed ?? entropySeed();
  seedState(seed);   // rejects non-finite numbers

  const triangle = resolveTriangle(config.triangle ?? { kind: 'fit' }, width, height);
  return {
    width, height, iterations, triangle, seed, foreground, background,
    fitsCanvas: fitsCanvas(triangle, width, height)
  };
}
