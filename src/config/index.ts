export * from './interpolate.js';
export * from './loader.js';
export * from './test-loader.js';
