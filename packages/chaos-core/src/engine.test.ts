import { describe, it, expect } from 'vitest';
import { ChaosGame, type PlotTarget } from './engine.js';
import { BLACK, PixelCanvas, WHITE } from './canvas.js';
import { Sampler } from './sampler.js';
import { createRng } from './rng.js';
import { barycentric, containsPoint, equilateral, fromThreePoints, point } from './geometry.js';
import { ConfigError, DegenerateGeometryError, OutOfBoundsError } from './errors.js';
import type { Progress, Rgb, Triangle } from './types.js';

class Recorder implements PlotTarget {
  readonly pixels: string[] = [];
  setPixel(x: number, y: number, _color: Rgb): void { this.pixels.push(`${x},${y}`); }
}

function sequence(values: number[]) {
  let i = 0;
  return () => values[i++ % values.length] ?? 0;
}

function game(triangle: Triangle, seed: number, total: number, target: PlotTarget = new Recorder()) {
  return new ChaosGame(triangle, new Sampler(createRng(seed)), total, target);
}

describe('ChaosGame', () => {
  const right = fromThreePoints(point(0, 0), point(4, 0), point(0, 4));

  it('moves halfway to the chosen vertex and truncates to a pixel', () => {
    // start (2, 1); then vertices a, b, c
    const target = new Recorder();
    const g = new ChaosGame(right, new Sampler(sequence([0.25, 0.5, 0, 0.5, 0.9])), 3, target);
    expect(g.current).toEqual({ x: 2, y: 1 });

    expect(g.step()).toEqual({ iteration: 1, point: { x: 1, y: 0.5 }, pixel: { x: 1, y: 0 }, plotted: true });
    expect(g.step()).toEqual({ iteration: 2, point: { x: 2.5, y: 0.25 }, pixel: { x: 2, y: 0 }, plotted: true });
    expect(g.step()).toEqual({ iteration: 3, point: { x: 1.25, y: 2.125 }, pixel: { x: 1, y: 2 }, plotted: true });
    expect(g.step()).toBeNull();
    expect(g.done).toBe(true);
    expect(target.pixels).toEqual(['1,0', '2,0', '1,2']);
  });

  it('never plots the start point', () => {
    const target = new Recorder();
    const g = game(equilateral(50), 3, 0, target);
    expect(containsPoint(g.triangle, g.current)).toBe(true);
    expect(g.run()).toEqual({ iterations: 0, plotted: 0, skipped: 0 });
    expect(target.pixels).toEqual([]);
  });

  it('leaves the canvas at background for zero iterations', () => {
    const canvas = new PixelCanvas(20, 20);
    const seen: Progress[] = [];
    game(equilateral(20), 1, 0, canvas).run({ onProgress: p => seen.push(p) });
    expect(canvas.isUniform(BLACK)).toBe(true);
    expect(seen).toEqual([{ iteration: 0, total: 0 }]);
  });

  it('keeps every point inside the triangle', () => {
    const t = fromThreePoints(point(5, 2), point(90, 30), point(40, 95));
    for (const seed of [1, 2, 3]) {
      const g = game(t, seed, 2000);
      expect(containsPoint(t, g.current)).toBe(true);
      for (const ev of g.walk()) expect(containsPoint(t, ev.point)).toBe(true);
    }
  });

  it('stays inside the bounding box of a side-100 triangle', () => {
    const canvas = new PixelCanvas(100, 100);
    const g = new ChaosGame(equilateral(100), new Sampler(createRng(1000)), 1000, canvas);
    for (const ev of g.walk()) {
      expect(ev.plotted).toBe(true);
      expect(ev.pixel.x).toBeGreaterThanOrEqual(0);
      expect(ev.pixel.x).toBeLessThan(100);
      expect(ev.pixel.y).toBeGreaterThanOrEqual(0);
      expect(ev.pixel.y).toBeLessThanOrEqual(86);
    }
    expect(g.counters()).toEqual({ iterations: 1000, plotted: 1000, skipped: 0 });
  });

  it('never enters the central inverted sub-triangle', () => {
    const t = equilateral(100);
    for (const ev of game(t, 77, 5000).walk()) {
      const w = barycentric(ev.point, t);
      expect(Math.max(w.wa, w.wb, w.wc)).toBeGreaterThanOrEqual(0.5 - 1e-9);
    }
  });

  it('replays the same pixels for the same seed', () => {
    const first = new Recorder(), second = new Recorder(), other = new Recorder();
    game(equilateral(64), 9, 500, first).run();
    game(equilateral(64), 9, 500, second).run();
    game(equilateral(64), 10, 500, other).run();
    expect(first.pixels).toHaveLength(500);
    expect(second.pixels).toEqual(first.pixels);
    expect(other.pixels).not.toEqual(first.pixels);
  });

  it('reports progress without changing the pixel stream', () => {
    const quiet = new Recorder(), observed = new Recorder();
    const seen: number[] = [];
    game(equilateral(64), 5, 10, quiet).run();
    game(equilateral(64), 5, 10, observed).run({ onProgress: p => seen.push(p.iteration), progressInterval: 3 });
    expect(seen).toEqual([3, 6, 9, 10]);
    expect(observed.pixels).toEqual(quiet.pixels);
  });

  it('does not repeat the final progress report', () => {
    const seen: Progress[] = [];
    game(equilateral(64), 5, 9).run({ onProgress: p => seen.push(p), progressInterval: 3 });
    expect(seen.map(p => p.iteration)).toEqual([3, 6, 9]);
    expect(seen.every(p => p.total === 9)).toBe(true);
  });

  it('can stop early and resume', () => {
    const g = game(equilateral(64), 8, 20);
    let taken = 0;
    for (const ev of g.walk()) {
      if (ev.iteration === 5) break;
      taken++;
    }
    expect(taken).toBe(4);
    expect(g.completed).toBe(5);
    expect(g.remaining).toBe(15);
    expect(g.run().iterations).toBe(20);
  });

  it('skips writes outside the canvas and keeps going', () => {
    const canvas = new PixelCanvas(10, 10);
    const g = new ChaosGame(equilateral(100), new Sampler(createRng(4)), 500, canvas, WHITE);
    const { iterations, plotted, skipped } = g.run();
    expect(iterations).toBe(500);
    expect(skipped).toBeGreaterThan(0);
    expect(plotted + skipped).toBe(500);
    expect(canvas.countMatching(WHITE)).toBeLessThanOrEqual(plotted);
  });

  it('lets other write failures through', () => {
    const broken: PlotTarget = { setPixel() { throw new Error('write failed'); } };
    expect(() => game(equilateral(10), 1, 3, broken).step()).toThrow('write failed');
  });

  it('counts out-of-bounds errors raised by any target', () => {
    const edge: PlotTarget = { setPixel(x, y) { throw new OutOfBoundsError(x, y, 0, 0); } };
    const g = game(equilateral(10), 1, 4, edge);
    expect(g.step()?.plotted).toBe(false);
    expect(g.run()).toEqual({ iterations: 4, plotted: 0, skipped: 4 });
  });

  it('rejects degenerate triangles', () => {
    const flat = fromThreePoints(point(0, 0), point(1, 1), point(2, 2));
    expect(() => game(flat, 1, 10)).toThrow(DegenerateGeometryError);
  });

  it.each([-1, 1.5, NaN])('rejects %s iterations', n => {
    expect(() => game(equilateral(10), 1, n)).toThrow(ConfigError);
  });

  it('rejects a zero progress interval', () => {
    expect(() => game(equilateral(10), 1, 5).run({ progressInterval: 0 })).toThrow(ConfigError);
  });
});
