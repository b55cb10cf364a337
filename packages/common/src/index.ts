export * from './types.js';
export * from './utils.js';
export * from './errors.js';
export * from './topologies.js';
