import type { Command } from 'commander';
import {
  ConfigurationError,
  compilePath,
  deleteNode,
  isErr,
  parseJson,
  resolveUnion,
  sanitizePath,
  type JsonEngineContext,
} from '@payloadprobe/core';
import { readInputFile } from '../files.js';
import { parseList } from '../flags.js';
import type { ContextFactory } from './context.js';

export interface MutateCommandOptions {
  payload?: string;
  path?: string;
  value?: string;
  alternativeKey?: string;
  eliminate?: string;
  delete?: boolean;
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1);
}

/**
 * Apply one replacement or deletion to a payload file and return the result.
 */
export function runMutate(
  options: MutateCommandOptions,
  ctx: JsonEngineContext
): string {
  const removing = options.delete === true;
  if (removing === (options.value !== undefined)) {
    throw new ConfigurationError({
      message: 'Exactly one of --value or --delete is required',
    });
  }
  if (options.payload === undefined || options.path === undefined) {
    throw new ConfigurationError({
      message: 'Both --payload and --path are required',
    });
  }

  const payload = readInputFile(options.payload);
  const parsed = parseJson(payload, ctx);
  if (isErr(parsed)) throw parsed.error;

  const path = sanitizePath(options.path);
  const compiled = compilePath(path);
  if (isErr(compiled)) throw compiled.error;

  if (removing) {
    const result = deleteNode(payload, path, ctx);
    if (result === payload) {
      ctx.logger.warn(`Nothing deleted at ${path}`);
    }
    return result;
  }

  return resolveUnion(
    payload,
    {
      targetPath: path,
      alternativeKey: options.alternativeKey ?? lastSegment(path),
      newValue: options.value ?? '',
      eliminateKeys: parseList(options.eliminate) ?? [],
    },
    ctx
  );
}

export function registerMutateCommand(
  program: Command,
  contextFor: ContextFactory
): void {
  program
    .command('mutate')
    .description('Replace or delete one node of a JSON payload')
    .requiredOption('--payload <file>', 'JSON payload file')
    .requiredOption('--path <path>', 'Node path, e.g. pet#tags or $.pet.tags')
    .option('--value <value>', 'Replacement value (JSON or a bare word)')
    .option(
      '--alternative-key <key>',
      'oneOf/anyOf alternative renamed onto a missing target'
    )
    .option('--eliminate <keys>', 'Sibling alternatives to drop, comma list')
    .option('--delete', 'Delete the node instead of replacing it')
    .action((options: MutateCommandOptions, command: Command) => {
      process.stdout.write(runMutate(options, contextFor(command)) + '\n');
    });
}
