/**
 * Terminal progress bar for long renders
 */

import type { Progress } from '@chaosgame/core';

export interface Writable { write(chunk: string): unknown; }

const BAR_WIDTH = 40;

/** "01:02:03" */
export function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(Math.floor(total / 3600))}:${pad(Math.floor(total / 60) % 60)}:${pad(total % 60)}`;
}

/** "#####>----" style bar; full once pos reaches len. */
export function formatBar(pos: number, len: number, width = BAR_WIDTH): string {
  if (len <= 0 || pos >= len) return '#'.repeat(width);
  const filled = Math.floor((pos / len) * width);
  return '#'.repeat(filled) + '>' + '-'.repeat(width - filled - 1);
}

export class ProgressBar {
  private started = 0;
  private last: Progress = { iteration: 0, total: 0 };

  constructor(
    private readonly out: Writable,
    private readonly now: () => number = () => Date.now()
  ) {}

  start(total: number): void {
    this.started = this.now();
    this.update({ iteration: 0, total });
  }

  line(p: Progress): string {
    const elapsed = this.now() - this.started;
    const eta = p.iteration > 0 ? (elapsed / p.iteration) * (p.total - p.iteration) / 1000 : 0;
    const pos = String(p.iteration).padStart(7);
    const len = String(p.total).padEnd(7);
    return `[${formatElapsed(elapsed)}] [${formatBar(p.iteration, p.total)}] ${pos}/${len} (${eta.toFixed(1)}s)`;
  }

  update(p: Progress): void {
    this.last = p;
    this.out.write(`\r${this.line(p)}`);
  }

  finish(): void {
    const seconds = (this.now() - this.started) / 1000;
    this.out.write(`\r${this.line(this.last)}\nFinished in ${seconds.toFixed(2)}s.\n`);
  }
}
