import {
  DEFAULT_JSON_CONTEXT,
  type JsonEngineContext,
} from '../json/context.js';
import { toJsonPath } from '../json/json-document.js';
import { resolveUnion } from '../json/schema-union.js';

/**
 * Policy of a fuzzer that replaces one field at a time.
 */
export interface ReplaceFieldsContext {
  /** Kind of field replaced, e.g. `array` */
  replaceWhat: string;
  /** Kind of value put in its place, e.g. `primitive` */
  replaceWith: string;
  skipMessage: string;
  fieldFilter(payload: string, field: string, ctx: JsonEngineContext): boolean;
  fuzzValueProducer(field: string): string[];
}

export interface FuzzCase {
  field: string;
  fuzzedValue: string;
  payload: string;
  scenario: string;
}

export interface SkippedField {
  field: string;
  reason: string;
}

export interface FieldFuzzerRun {
  cases: FuzzCase[];
  skipped: SkippedField[];
}

function scenarioText(
  policy: ReplaceFieldsContext,
  field: string,
  value: string
): string {
  return `Replace ${policy.replaceWhat} field [${field}] with ${policy.replaceWith} [${value}]`;
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1);
}

/**
 * One case per (field, value) for every field the filter accepts. The value
 * goes in through union resolution, so inlined oneOf/anyOf alternatives
 * collapse onto the field name.
 */
export function runReplaceFieldsFuzzer(
  payload: string,
  fields: readonly string[],
  policy: ReplaceFieldsContext,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): FieldFuzzerRun {
  const cases: FuzzCase[] = [];
  const skipped: SkippedField[] = [];

  for (const field of fields) {
    if (!policy.fieldFilter(payload, field, ctx)) {
      skipped.push({ field, reason: policy.skipMessage });
      continue;
    }
    const targetPath = toJsonPath(field, payload, ctx);
    for (const fuzzedValue of policy.fuzzValueProducer(field)) {
      cases.push({
        field,
        fuzzedValue,
        payload: resolveUnion(
          payload,
          {
            targetPath,
            alternativeKey: lastSegment(targetPath),
            newValue: fuzzedValue,
            eliminateKeys: [],
          },
          ctx
        ),
        scenario: scenarioText(policy, field, fuzzedValue),
      });
    }
  }
  ctx.logger.debug(`Generated ${cases.length} fuzz cases`, {
    skipped: skipped.length,
  });
  return { cases, skipped };
}
