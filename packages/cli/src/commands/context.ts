import type { Command } from 'commander';
import {
  createJsonEngineContext,
  createStderrLogger,
  type JsonEngineContext,
} from '@payloadprobe/core';

export type ContextFactory = (command: Command) => JsonEngineContext;

export function createCliContext(verbose: boolean): JsonEngineContext {
  return createJsonEngineContext({
    logger: createStderrLogger({ verbose }),
  });
}

/**
 * Engine context for a subcommand, honouring the global --verbose flag.
 */
export const contextForCommand: ContextFactory = (command) => {
  const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
  return createCliContext(verbose === true);
};
