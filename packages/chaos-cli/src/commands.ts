import path from 'node:path';
import { renderFractal, type RenderStats, type Triangle } from '@chaosgame/core';
import type { RenderOptions } from './args.js';
import { checkOutputPath, outputFileName } from './output.js';
import { savePng } from './png.js';
import { ProgressBar, type Writable } from './progress.js';

export interface CommandIO {
  log(message: string): void;
  stderr: Writable & { isTTY?: boolean };   // the bar is drawn only on a terminal
  now(): Date;
}

export interface RenderSummary {
  file: string;
  width: number;
  height: number;
  quality: number;
  seed: number | string;
  triangle: Triangle;
  stats: RenderStats;
}

function step(n: number, message: string): string {
  return `[${n}/3] ${message}`;
}

/**
 * Render the fractal and save it as a PNG
 * @returns Summary of what was written
 */
export function renderCommand(options: RenderOptions, io: CommandIO): RenderSummary {
  const { width, height, quality, json } = options;
  const file = path.join(options.outputDirectory, outputFileName(io.now(), width, height, quality));
  checkOutputPath(file);

  const bar = options.quiet || json || !io.stderr.isTTY ? null : new ProgressBar(io.stderr);
  if (!json) io.log(step(1, 'Generating fractal...'));

  bar?.start(quality);
  const { canvas, stats, config } = renderFractal(
    {
      width,
      height,
      iterations: quality,
      triangle: options.triangle,
      seed: options.seed,
      foreground: options.color,
      background: options.background
    },
    { onProgress: p => bar?.update(p) }
  );
  bar?.finish();

  if (!config.fitsCanvas && !json) {
    io.log(`warning: triangle extends past the ${width}x${height} canvas, ${stats.skipped} points were not drawn`);
  }

  if (!json) io.log(step(2, 'Saving file...'));
  savePng(canvas, file);
  if (!json) io.log(step(3, `Saved to: ${file}`));

  const summary: RenderSummary = { file, width, height, quality, seed: config.seed, triangle: config.triangle, stats };
  if (json) io.log(JSON.stringify(summary));
  return summary;
}
