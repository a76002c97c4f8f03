export interface Point { readonly x: number; readonly y: number; }
export interface Triangle { readonly a: Point; readonly b: Point; readonly c: Point; }
export interface Pixel { x: number; y: number; }
export type Rgb = readonly [r: number, g: number, b: number];

export interface PlotEvent {
  iteration: number;   // 1-based index of the transition
  point: Point;        // the new current point
  pixel: Pixel;        // truncated pixel coordinate
  plotted: boolean;    // false when the write fell outside the canvas
}

export interface Progress { iteration: number; total: number; }

export interface RenderStats {
  iterations: number;
  plotted: number;
  skipped: number;
  litPixels: number;
  elapsedMs: number;
}
