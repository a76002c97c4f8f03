/**
 * Error types raised by the chaos-game core
 */

export class ChaosGameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Triangle with zero area: non-positive side length or collinear vertices. */
export class DegenerateGeometryError extends ChaosGameError {}

/** Pixel write outside the canvas. The engine skips the write and keeps going. */
export class OutOfBoundsError extends ChaosGameError {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {
    super(`Pixel (${x}, ${y}) is outside the ${width}x${height} canvas`);
  }
}

export class ConfigError extends ChaosGameError {}
