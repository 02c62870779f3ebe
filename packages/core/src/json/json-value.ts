import {
  isLosslessNumber,
  stringify,
  type LosslessNumber,
} from 'lossless-json';

/**
 * Numbers that do not survive a round trip through a double (integers past
 * 2^53, over-long decimals, exponents out of range) are kept as
 * LosslessNumber with their source digits.
 */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;
export type JsonContainer = JsonArray | JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}

export function isJsonArray(value: unknown): value is JsonArray {
  return Array.isArray(value);
}

/** Scalar node: string, number, boolean or null */
export function isJsonPrimitive(value: JsonValue): value is JsonPrimitive {
  return value === null || typeof value !== 'object' || isLosslessNumber(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || isLosslessNumber(value)) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Deep copy; LosslessNumber instances are immutable and shared */
export function cloneJson(value: JsonValue): JsonValue {
  if (isJsonArray(value)) return value.map(cloneJson);
  if (isJsonObject(value)) {
    const copy: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setOwnKey(copy, key, cloneJson(item));
    }
    return copy;
  }
  return value;
}

export function hasOwnKey(object: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

/**
 * Assign as an own data property; plain assignment of "__proto__" would
 * replace the prototype instead of adding a key.
 */
export function setOwnKey(
  object: JsonObject,
  key: string,
  value: JsonValue
): void {
  Object.defineProperty(object, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

/** Compact text; LosslessNumber values are written with their source digits */
export function serializeJson(value: JsonValue): string {
  // only undefined, functions and symbols stringify to undefined
  return stringify(value) ?? 'null';
}
