export * from './types.js';
export * from './errors.js';
export * from './geometry.js';
export * from './rng.js';
export * from './sampler.js';
export * from './canvas.js';
export * from './engine.js';
export * from './config.js';
export * from './render.js';
