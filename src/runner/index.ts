export * from './case.js';
export * from './parameters.js';
export * from './suite.js';
