import {
  PathNotFoundError,
  PathSyntaxError,
  type PathQueryError,
} from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import {
  compilePath,
  renderSegments,
  type CompiledPath,
  type PathSegment,
} from './path-compiler.js';
import {
  cloneJson,
  hasOwnKey,
  isJsonArray,
  isJsonObject,
  serializeJson,
  setOwnKey,
  type JsonArray,
  type JsonContainer,
  type JsonObject,
  type JsonValue,
} from './json-value.js';

/**
 * Path-addressed access to one parsed JSON document.
 *
 * Reads and updates never create missing nodes: a definite path that does not
 * resolve is a PathNotFoundError, and an update through a wildcard path fails
 * the same way only when nothing matches.
 */
export interface PathQuery {
  readonly document: JsonValue;
  resolve(path: string): Result<JsonValue, PathQueryError>;
  /** Replaces every matched node; returns the number of nodes replaced */
  set(path: string, value: JsonValue): Result<number, PathQueryError>;
  delete(path: string): Result<number, PathQueryError>;
  /** Renames `oldKey` to `newKey` inside every object the path matches */
  rename(
    path: string,
    oldKey: string,
    newKey: string
  ): Result<number, PathQueryError>;
  /** Adds or replaces `key` inside every object the path matches */
  put(
    path: string,
    key: string,
    value: JsonValue
  ): Result<number, PathQueryError>;
  toJson(): string;
}

interface Location {
  parent: JsonContainer | null;
  key: string | number | null;
  value: JsonValue;
}

function notFound(path: string, message: string): PathNotFoundError {
  return new PathNotFoundError({ message, context: { path } });
}

function step(
  location: Location,
  segment: PathSegment,
  into: Location[]
): void {
  const { value } = location;
  switch (segment.kind) {
    case 'property': {
      if (isJsonObject(value) && hasOwnKey(value, segment.name)) {
        into.push({
          parent: value,
          key: segment.name,
          value: value[segment.name],
        });
      }
      return;
    }
    case 'index': {
      if (!isJsonArray(value)) return;
      const index =
        segment.index < 0 ? value.length + segment.index : segment.index;
      if (index >= 0 && index < value.length) {
        into.push({ parent: value, key: index, value: value[index] });
      }
      return;
    }
    case 'wildcard': {
      if (isJsonArray(value)) {
        value.forEach((item, index) =>
          into.push({ parent: value, key: index, value: item })
        );
      } else if (isJsonObject(value)) {
        for (const key of Object.keys(value)) {
          into.push({ parent: value, key, value: value[key] });
        }
      }
      return;
    }
  }
}

function applyFunction(path: CompiledPath, value: JsonValue): JsonValue {
  switch (path.fn) {
    case 'keys':
      return isJsonObject(value) ? Object.keys(value) : null;
    case 'length':
      if (isJsonArray(value)) return value.length;
      if (isJsonObject(value)) return Object.keys(value).length;
      return typeof value === 'string' ? value.length : null;
    default:
      return value;
  }
}

export class JsonTreeQuery implements PathQuery {
  #document: JsonValue;

  constructor(document: JsonValue) {
    this.#document = document;
  }

  get document(): JsonValue {
    return this.#document;
  }

  resolve(path: string): Result<JsonValue, PathQueryError> {
    const compiled = compilePath(path);
    if (isErr(compiled)) return compiled;
    const located = this.#locate(compiled.value);
    if (isErr(located)) return located;

    const locations = located.value;
    if (compiled.value.definite) {
      // a definite path that resolves has exactly one location
      return ok(applyFunction(compiled.value, locations[0].value));
    }
    return ok(
      applyFunction(
        compiled.value,
        locations.map((location) => location.value)
      )
    );
  }

  set(path: string, value: JsonValue): Result<number, PathQueryError> {
    const located = this.#locateForUpdate(path);
    if (isErr(located)) return located;

    for (const location of located.value) {
      const copy = cloneJson(value);
      const { parent, key } = location;
      if (parent === null) {
        this.#document = copy;
      } else if (isJsonArray(parent) && typeof key === 'number') {
        parent[key] = copy;
      } else if (isJsonObject(parent) && typeof key === 'string') {
        setOwnKey(parent, key, copy);
      }
    }
    return ok(located.value.length);
  }

  delete(path: string): Result<number, PathQueryError> {
    const located = this.#locateForUpdate(path);
    if (isErr(located)) return located;

    const locations = located.value;
    if (locations.some((location) => location.parent === null)) {
      return err(
        new PathSyntaxError({
          message: `The root node cannot be deleted: ${path}`,
          context: { path, position: 0 },
        })
      );
    }

    // splice array entries from the highest index down
    const arrays = new Map<JsonArray, number[]>();
    for (const { parent, key } of locations) {
      if (isJsonArray(parent) && typeof key === 'number') {
        const indexes = arrays.get(parent) ?? [];
        indexes.push(key);
        arrays.set(parent, indexes);
      } else if (isJsonObject(parent) && typeof key === 'string') {
        delete parent[key];
      }
    }
    for (const [array, indexes] of arrays) {
      for (const index of [...new Set(indexes)].sort((a, b) => b - a)) {
        array.splice(index, 1);
      }
    }
    return ok(locations.length);
  }

  rename(
    path: string,
    oldKey: string,
    newKey: string
  ): Result<number, PathQueryError> {
    const located = this.#locateObjects(path);
    if (isErr(located)) return located;

    const objects = located.value;
    if (objects.some((object) => !hasOwnKey(object, oldKey))) {
      return err(
        notFound(path, `No key '${oldKey}' found in object at ${path}`)
      );
    }
    if (oldKey !== newKey) {
      for (const object of objects) {
        const value = object[oldKey];
        delete object[oldKey];
        setOwnKey(object, newKey, value);
      }
    }
    return ok(objects.length);
  }

  put(
    path: string,
    key: string,
    value: JsonValue
  ): Result<number, PathQueryError> {
    const located = this.#locateObjects(path);
    if (isErr(located)) return located;

    for (const object of located.value) {
      setOwnKey(object, key, cloneJson(value));
    }
    return ok(located.value.length);
  }

  toJson(): string {
    return serializeJson(this.#document);
  }

  #locate(path: CompiledPath): Result<Location[], PathNotFoundError> {
    let current: Location[] = [
      { parent: null, key: null, value: this.#document },
    ];
    for (const [depth, segment] of path.segments.entries()) {
      const next: Location[] = [];
      for (const location of current) {
        step(location, segment, next);
      }
      if (next.length === 0 && path.definite) {
        const missing = renderSegments(path.segments.slice(0, depth + 1));
        return err(
          notFound(
            path.source,
            `Missing node ${missing} in path ${path.source}`
          )
        );
      }
      current = next;
    }
    return ok(current);
  }

  #locateForUpdate(path: string): Result<Location[], PathQueryError> {
    const compiled = compilePath(path);
    if (isErr(compiled)) return compiled;
    if (compiled.value.fn !== undefined) {
      return err(
        new PathSyntaxError({
          message: `Functions cannot be used in update paths: ${path}`,
          context: { path, position: 0 },
        })
      );
    }

    const located = this.#locate(compiled.value);
    if (isErr(located)) return located;
    if (located.value.length === 0) {
      return err(notFound(path, `No results for path ${path}`));
    }
    return located;
  }

  #locateObjects(path: string): Result<JsonObject[], PathQueryError> {
    const located = this.#locateForUpdate(path);
    if (isErr(located)) return located;

    const objects: JsonObject[] = [];
    for (const { value } of located.value) {
      if (!isJsonObject(value)) {
        return err(notFound(path, `Expected an object at ${path}`));
      }
      objects.push(value);
    }
    return ok(objects);
  }
}
