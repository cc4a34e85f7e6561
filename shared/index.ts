export * from './srs.js';
export * from './types.js';
export * from './text-normalizer.js';
