export * from './response-descriptor.js';
export * from './match-options.js';
export * from './match-criteria.js';
