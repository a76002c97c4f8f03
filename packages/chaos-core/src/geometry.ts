/**
 * Plane geometry for the chaos game: immutable points and triangles
 */

import { DegenerateGeometryError } from './errors.js';
import type { Point, Triangle } from './types.js';

export const SQRT3 = Math.sqrt(3);

// Relative tolerance for the collinearity test
const AREA_EPSILON = 1e-12;

export function point(x: number, y: number): Point { return { x, y }; }
export function add(p: Point, q: Point): Point { return { x: p.x + q.x, y: p.y + q.y }; }
export function sub(p: Point, q: Point): Point { return { x: p.x - q.x, y: p.y - q.y }; }
export function scale(p: Point, k: number): Point { return { x: p.x * k, y: p.y * k }; }
export function midpoint(p: Point, q: Point): Point { return { x: (p.x + q.x) / 2, y: (p.y + q.y) / 2 }; }

/**
 * Equilateral triangle anchored at the origin with its base on the x axis
 * @param sideLength - Edge length, strictly positive
 * @returns Triangle (0,0), (L,0), (L/2, L·√3/2)
 */
export function equilateral(sideLength: number): Triangle {
  if (!Number.isFinite(sideLength) || sideLength <= 0) {
    throw new DegenerateGeometryError(`Side length must be a positive number, got ${sideLength}`);
  }
  return fromThreePoints(
    point(0, 0),
    point(sideLength, 0),
    point(sideLength / 2, sideLength * SQRT3 / 2)
  );
}

/**
 * Build a triangle from three vertices as given.
 * Collinear input is not detected here; use checkedTriangle for that.
 */
export function fromThreePoints(a: Point, b: Point, c: Point): Triangle {
  return { a, b, c };
}

export function checkedTriangle(a: Point, b: Point, c: Point): Triangle {
  const t = fromThreePoints(a, b, c);
  if (isDegenerate(t)) {
    throw new DegenerateGeometryError(
      `Points (${a.x}, ${a.y}), (${b.x}, ${b.y}), (${c.x}, ${c.y}) are collinear`
    );
  }
  return t;
}

/** Twice the signed area; positive when a, b, c run counter-clockwise. */
export function signedArea(t: Triangle): number {
  return (t.b.x - t.a.x) * (t.c.y - t.a.y) - (t.b.y - t.a.y) * (t.c.x - t.a.x);
}

export function isDegenerate(t: Triangle): boolean {
  const coords = [t.a.x, t.a.y, t.b.x, t.b.y, t.c.x, t.c.y];
  if (!coords.every(Number.isFinite)) return true;
  const box = boundingBox(t);
  const extent = Math.max(box.maxX - box.minX, box.maxY - box.minY);
  if (extent === 0) return true;
  return Math.abs(signedArea(t)) <= AREA_EPSILON * extent * extent;
}

export interface BoundingBox { minX: number; minY: number; maxX: number; maxY: number; }

export function boundingBox(t: Triangle): BoundingBox {
  return {
    minX: Math.min(t.a.x, t.b.x, t.c.x),
    minY: Math.min(t.a.y, t.b.y, t.c.y),
    maxX: Math.max(t.a.x, t.b.x, t.c.x),
    maxY: Math.max(t.a.y, t.b.y, t.c.y)
  };
}

export interface Barycentric { wa: number; wb: number; wc: number; }

/**
 * Barycentric weights of p with respect to the triangle's vertices
 * @param p - Point to express
 * @param t - Non-degenerate triangle
 * @returns Weights for a, b and c; they sum to 1
 */
export function barycentric(p: Point, t: Triangle): Barycentric {
  const v0 = sub(t.c, t.a);
  const v1 = sub(t.b, t.a);
  const v2 = sub(p, t.a);

  const dot00 = v0.x * v0.x + v0.y * v0.y;
  const dot01 = v0.x * v1.x + v0.y * v1.y;
  const dot02 = v0.x * v2.x + v0.y * v2.y;
  const dot11 = v1.x * v1.x + v1.y * v1.y;
  const dot12 = v1.x * v2.x + v1.y * v2.y;

  const invDenom = 1 / (dot00 * dot11 - dot01 * dot01);
  const wc = (dot11 * dot02 - dot01 * dot12) * invDenom;
  const wb = (dot00 * dot12 - dot01 * dot02) * invDenom;

  return { wa: 1 - wb - wc, wb, wc };
}

/** Whether p lies in the closed triangle, allowing `epsilon` of slack on each weight. */
export function containsPoint(t: Triangle, p: Point, epsilon = 1e-9): boolean {
  const { wa, wb, wc } = barycentric(p, t);
  return wa >= -epsilon && wb >= -epsilon && wc >= -epsilon;
}
