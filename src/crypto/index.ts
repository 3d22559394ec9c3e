export * from './hash.js';
export * from './random.js';
