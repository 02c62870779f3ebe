import { isArray } from '../json/json-document.js';
import type { ReplaceFieldsContext } from './field-fuzzer.js';

export const PRIMITIVE_REPLACEMENT = 'probe_primitive_string';

export const replaceArraysWithPrimitives: ReplaceFieldsContext = {
  replaceWhat: 'array',
  replaceWith: 'primitive',
  skipMessage: 'Fuzzer only runs for arrays',
  fieldFilter: (payload, field, ctx) => isArray(payload, field, ctx),
  fuzzValueProducer: () => [PRIMITIVE_REPLACEMENT],
};
