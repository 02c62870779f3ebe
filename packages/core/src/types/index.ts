export * from './result.js';
export * from './errors.js';
