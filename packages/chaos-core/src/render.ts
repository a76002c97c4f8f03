import { PixelCanvas } from './canvas.js';
import { resolveConfig, type RenderConfig, type ResolvedRenderConfig } from './config.js';
import { ChaosGame, type RunOptions } from './engine.js';
import { createRng } from './rng.js';
import { Sampler } from './sampler.js';
import type { RenderStats } from './types.js';

export interface RenderResult { canvas: PixelCanvas; stats: RenderStats; config: ResolvedRenderConfig; }

export function createChaosGame(config: ResolvedRenderConfig, canvas: PixelCanvas): ChaosGame {
  const sampler = new Sampler(createRng(config.seed));
  return new ChaosGame(config.triangle, sampler, config.iterations, canvas, config.foreground);
}

export function renderFractal(config: RenderConfig, options: RunOptions = {}): RenderResult {
  const resolved = resolveConfig(config);
  const canvas = new PixelCanvas(resolved.width, resolved.height, resolved.background);
  const game = createChaosGame(resolved, canvas);

  const start = performance.now();
  const { iterations, plotted, skipped } = game.run(options);
  const elapsedMs = performance.now() - start;

  const litPixels = iterations === 0 ? 0 : canvas.countMatching(resolved.foreground);
  return { canvas, config: resolved, stats: { iterations, plotted, skipped, litPixels, elapsedMs } };
}
