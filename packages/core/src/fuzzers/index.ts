export * from './field-fuzzer.js';
export * from './replace-arrays-with-primitives.js';
export * from './http-body-fuzzer.js';
