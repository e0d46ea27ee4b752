export * from './loader.js';
export * from './suite-loader.js';
export * from './interpolate.js';
