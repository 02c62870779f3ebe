/**
 * Collapsing of inlined oneOf/anyOf alternatives.
 *
 * Generated payloads may carry every alternative of a union side by side
 * (keys such as `ONE_OF#Cat`, `ANY_OF#Dog`). Replacing a field inside such a
 * union means keeping one alternative under the field's own name and dropping
 * its siblings.
 */

import { ContractViolationError, isPathNotFound } from '../types/errors.js';
import { isErr } from '../types/result.js';
import { DEFAULT_JSON_CONTEXT, type JsonEngineContext } from './context.js';
import { quoteKey, sanitizePath } from './path-address.js';
import { JsonTreeQuery } from './path-query.js';

/**
 * Textual signal that the payload inlines union alternatives. Any key
 * containing `_OF` also matches.
 */
export const UNION_MARKER = '_OF';

export interface UnionResolution {
  /** Path-query of the node to replace; `$` replaces the whole payload */
  targetPath: string;
  /** Renamed to the target's last segment when the target is absent */
  alternativeKey: string;
  /** Replacement value, JSON or a bare scalar */
  newValue: string;
  /** Sibling alternatives deleted from the target's parent */
  eliminateKeys: ReadonlySet<string> | readonly string[];
}

export function hasUnionMarker(payload: string): boolean {
  return payload.includes(UNION_MARKER);
}

/**
 * Sets `targetPath` to `newValue`. When the target does not exist and the
 * payload carries union alternatives, renames `alternativeKey` under the
 * target's parent to the target's last segment and deletes every key of
 * `eliminateKeys` from that parent.
 *
 * Every failure returns the best payload available so far; only a missing
 * `eliminateKeys` throws.
 */
// eslint-disable-next-line complexity
export function resolveUnion(
  payload: string,
  request: UnionResolution,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): string {
  const { alternativeKey, newValue, eliminateKeys } = request;
  // reachable from untyped callers (config files, CLI input)
  if (eliminateKeys === null || eliminateKeys === undefined) {
    throw new ContractViolationError({
      message: 'resolveUnion requires a set of keys to eliminate',
      context: { path: request.targetPath },
    });
  }

  const targetPath = sanitizePath(request.targetPath);
  if (targetPath === '$') {
    return newValue;
  }

  const value = ctx.parsers.permissive(newValue);
  if (isErr(value)) {
    ctx.logger.debug(`Could not add node ${targetPath}`, {
      reason: value.error.message,
    });
    return payload;
  }

  const document = ctx.parsers.strict(payload);
  if (isErr(document)) {
    ctx.logger.debug(`Could not add node ${targetPath}: payload is not JSON`);
    return payload;
  }

  const direct = new JsonTreeQuery(document.value);
  const set = direct.set(targetPath, value.value);
  if (!isErr(set)) {
    return direct.toJson();
  }
  if (!isPathNotFound(set.error)) {
    ctx.logger.debug(`Could not add node ${targetPath}`, {
      reason: set.error.message,
    });
    return payload;
  }

  const lastDot = targetPath.lastIndexOf('.');
  if (lastDot < 0 || !hasUnionMarker(payload)) {
    return payload;
  }
  const parentPath = targetPath.slice(0, lastDot);
  const replacementKey = targetPath.slice(lastDot + 1);

  // the failed set left the tree untouched
  const union = new JsonTreeQuery(document.value);
  const renamed = union.rename(parentPath, alternativeKey, replacementKey);
  if (isErr(renamed)) {
    ctx.logger.debug(`Alternative ${alternativeKey} not renamed`, {
      reason: renamed.error.message,
    });
  }

  for (const key of eliminateKeys) {
    const nodeToDelete = `${parentPath}.${quoteKey(key)}`;
    ctx.logger.debug(`to delete ${nodeToDelete}`);
    const deleted = union.delete(nodeToDelete);
    if (isErr(deleted)) {
      ctx.logger.debug(
        `Path not found when removing any_of/one_of: ${deleted.error.message}`
      );
    }
  }
  return union.toJson();
}
