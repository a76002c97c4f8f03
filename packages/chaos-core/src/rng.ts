/**
 * Seedable pseudo-random source
 */

import { randomInt } from 'node:crypto';
import { ConfigError } from './errors.js';

/** Uniform float in [0, 1). */
export type Rng = () => number;

export type Seed = number | string;

/**
 * FNV1a32 hash function
 */
export function fnv1a32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return (h >>> 0);
}

/**
 * Mulberry32 PRNG
 */
export function mulberry32(seed: number): Rng {
  return function() {
    let t = seed += 0x6D2B79F5;
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Reduce a seed to the 32-bit state mulberry32 starts from
 * @param seed - Integer (taken modulo 2^32) or string (hashed)
 */
export function seedState(seed: Seed): number {
  if (typeof seed === 'string') return fnv1a32(seed);
  if (!Number.isFinite(seed)) throw new ConfigError(`Seed must be a finite number, got ${seed}`);
  return Math.trunc(seed) >>> 0;
}

export function createRng(seed: Seed): Rng {
  return mulberry32(seedState(seed));
}

export function entropySeed(): number {
  return randomInt(0x100000000);
}
