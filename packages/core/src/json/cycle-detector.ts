import { DEFAULT_JSON_CONTEXT, type JsonEngineContext } from './context.js';

function equalsIgnoreCase(a: string, b: string): boolean {
  return a === b || a.toLowerCase() === b.toLowerCase();
}

/**
 * Whether a `#`-joined traversal history (`pet#owner#pet`) names the same
 * property twice, compared case-insensitively. Chains with fewer than `depth`
 * segments are never reported.
 */
export function isCyclicChain(
  chain: string,
  depth: number,
  ctx: JsonEngineContext = DEFAULT_JSON_CONTEXT
): boolean {
  const properties = chain.split('#');
  if (properties.length < depth) {
    return false;
  }

  for (let i = 0; i < properties.length - 1; i++) {
    for (let j = i + 1; j < properties.length; j++) {
      if (equalsIgnoreCase(properties[i], properties[j])) {
        ctx.logger.debug(`Found cyclic dependencies for ${chain}`);
        return true;
      }
    }
  }
  return false;
}
