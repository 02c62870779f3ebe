import { silentLogger, type ProbeLogger } from '../util/logger.js';
import { DEFAULT_PARSERS, type JsonParsers } from './parsers.js';

/**
 * Immutable collaborators of the JSON operations. Built once per process (or
 * per CLI run) and passed by reference; holds no per-call state.
 */
export interface JsonEngineContext {
  readonly parsers: JsonParsers;
  readonly logger: ProbeLogger;
}

export function createJsonEngineContext(
  overrides: Partial<JsonEngineContext> = {}
): JsonEngineContext {
  return Object.freeze({
    parsers: overrides.parsers ?? DEFAULT_PARSERS,
    logger: overrides.logger ?? silentLogger,
  });
}

export const DEFAULT_JSON_CONTEXT: JsonEngineContext =
  createJsonEngineContext();
