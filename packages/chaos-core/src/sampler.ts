/**
 * Random sampling over a triangle
 */

import { add, scale, sub } from './geometry.js';
import type { Rng } from './rng.js';
import type { Point, Triangle } from './types.js';

export class Sampler {
  constructor(private readonly rng: Rng) {}

  /** Uniform float in [low, high). */
  uniform(low: number, high: number): number {
    return low + this.rng() * (high - low);
  }

  /** Uniform integer in [0, n). */
  randomIndex(n: number): number {
    return Math.min(n - 1, Math.floor(this.rng() * n));
  }

  /**
   * Uniformly distributed point inside the triangle.
   * r2 is drawn from [0, 1 - r1] so (r1, r2) never leaves the simplex
   * u >= 0, v >= 0, u + v <= 1. r1 has density 2(1 - r1) on [0, 1], which
   * makes the joint density of (r1, r2) constant over the simplex.
   * @returns a + r1·(b - a) + r2·(c - a)
   */
  randomInteriorPoint(t: Triangle): Point {
    const r1 = 1 - Math.sqrt(this.uniform(0, 1));
    const r2 = this.uniform(0, 1 - r1);
    return add(add(t.a, scale(sub(t.b, t.a), r1)), scale(sub(t.c, t.a), r2));
  }

  randomVertex(t: Triangle): Point {
    const vertices = [t.a, t.b, t.c] as const;
    return vertices[this.randomIndex(3)] ?? t.a;
  }
}
