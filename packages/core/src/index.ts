export * from './errors.js';
export * from './retry.js';
export * from './hash.js';
export * from './audit.js';
export * from './queue.js';
