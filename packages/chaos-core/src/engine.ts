/**
 * Chaos game: move the current point halfway toward a random vertex and plot it
 */

import { WHITE } from './canvas.js';
import { ConfigError, DegenerateGeometryError, OutOfBoundsError } from './errors.js';
import { isDegenerate, midpoint } from './geometry.js';
import type { Sampler } from './sampler.js';
import type { PlotEvent, Point, Progress, Rgb, Triangle } from './types.js';

/** Anything pixels can be written to. PixelCanvas is the usual one. */
export interface PlotTarget {
  setPixel(x: number, y: number, color: Rgb): void;
}

export interface RunOptions {
  onProgress?: (progress: Progress) => void;
  progressInterval?: number;   // transitions between progress callbacks
}

export interface EngineCounters { iterations: number; plotted: number; skipped: number; }

export function assertIterations(n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ConfigError(`Iteration count must be a non-negative integer, got ${n}`);
  }
}

export function defaultProgressInterval(total: number): number {
  return Math.max(1, Math.ceil(total / 1000));
}

export class ChaosGame {
  private point: Point;
  private iteration = 0;
  private plotted = 0;
  private skipped = 0;

  /**
   * @param triangle - Non-degenerate triangle the walk stays inside
   * @param sampler - Owns the RNG; seeds the start point and picks vertices
   * @param total - Number of transitions to perform
   * @param target - Receives one foreground write per transition
   * @param foreground - Color written for every plotted point
   */
  constructor(
    readonly triangle: Triangle,
    private readonly sampler: Sampler,
    readonly total: number,
    private readonly target: PlotTarget,
    readonly foreground: Rgb = WHITE
  ) {
    if (isDegenerate(triangle)) throw new DegenerateGeometryError('Chaos game needs a non-degenerate triangle');
    assertIterations(total);
    this.point = sampler.randomInteriorPoint(triangle);
  }

  get current(): Point { return this.point; }
  get completed(): number { return this.iteration; }
  get remaining(): number { return this.total - this.iteration; }
  get done(): boolean { return this.iteration >= this.total; }

  counters(): EngineCounters {
    return { iterations: this.iteration, plotted: this.plotted, skipped: this.skipped };
  }

  /**
   * Perform one transition.
   * @returns The plot event, or null once every iteration has run
   */
  step(): PlotEvent | null {
    if (this.done) return null;

    const vertex = this.sampler.randomVertex(this.triangle);
    const next = midpoint(this.point, vertex);
    // Truncate, never round: rounding shifts the pattern
    const pixel = { x: Math.floor(next.x), y: Math.floor(next.y) };

    let plotted = true;
    try {
      this.target.setPixel(pixel.x, pixel.y, this.foreground);
      this.plotted++;
    } catch (e) {
      if (!(e instanceof OutOfBoundsError)) throw e;
      plotted = false;
      this.skipped++;
    }

    this.point = next;
    this.iteration++;
    return { iteration: this.iteration, point: next, pixel, plotted };
  }

  /** Yield every remaining transition; breaking out early leaves a consistent partial canvas. */
  *walk(): Generator<PlotEvent, void, undefined> {
    for (let ev = this.step(); ev; ev = this.step()) yield ev;
  }

  /**
   * Run every remaining transition
   * @param options - Optional progress callback and its interval
   * @returns Counters after the run
   */
  run(options: RunOptions = {}): EngineCounters {
    const { onProgress, progressInterval = defaultProgressInterval(this.total) } = options;
    if (!Number.isSafeInteger(progressInterval) || progressInterval < 1) {
      throw new ConfigError(`Progress interval must be a positive integer, got ${progressInterval}`);
    }

    let reported = -1;
    while (this.step()) {
      if (onProgress && this.iteration % progressInterval === 0) {
        onProgress({ iteration: this.iteration, total: this.total });
        reported = this.iteration;
      }
    }
    if (onProgress && reported !== this.iteration) {
      onProgress({ iteration: this.iteration, total: this.total });
    }
    return this.counters();
  }
}
