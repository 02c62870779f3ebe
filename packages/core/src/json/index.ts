export * from './json-value.js';
export * from './parsers.js';
export * from './path-address.js';
export * from './path-compiler.js';
export * from './path-query.js';
export * from './context.js';
export * from './json-document.js';
export * from './schema-union.js';
export * from './cycle-detector.js';
