import type { Command } from 'commander';
import {
  ConfigurationError,
  isErr,
  parseJson,
  randomStringBody,
  replaceArraysWithPrimitives,
  runReplaceFieldsFuzzer,
  type JsonEngineContext,
} from '@payloadprobe/core';
import { readInputFile } from '../files.js';
import { parseList, parseSeed } from '../flags.js';
import type { ContextFactory } from './context.js';

export interface FuzzCommandOptions {
  payload?: string;
  fields?: string;
  seed?: string;
}

export interface FuzzRecord {
  fuzzer: string;
  scenario: string;
  field?: string;
  fuzzedValue?: string;
  payload: string;
}

/**
 * Field cases from replaceArraysWithPrimitives followed by one random body.
 */
export function runFuzz(
  options: FuzzCommandOptions,
  ctx: JsonEngineContext
): FuzzRecord[] {
  const fields = parseList(options.fields) ?? [];
  if (fields.length === 0) {
    throw new ConfigurationError({
      message: 'At least one field is required in --fields',
    });
  }
  if (options.payload === undefined) {
    throw new ConfigurationError({ message: '--payload is required' });
  }
  const seed = parseSeed(options.seed ?? '424242');

  const payload = readInputFile(options.payload);
  const parsed = parseJson(payload, ctx);
  if (isErr(parsed)) throw parsed.error;

  const run = runReplaceFieldsFuzzer(
    payload,
    fields,
    replaceArraysWithPrimitives,
    ctx
  );
  for (const skipped of run.skipped) {
    ctx.logger.debug(`Skipping field ${skipped.field}: ${skipped.reason}`);
  }

  const records: FuzzRecord[] = run.cases.map((fuzzCase) => ({
    fuzzer: 'ReplaceArraysWithPrimitives',
    scenario: fuzzCase.scenario,
    field: fuzzCase.field,
    fuzzedValue: fuzzCase.fuzzedValue,
    payload: fuzzCase.payload,
  }));
  records.push({
    fuzzer: 'RandomStringBody',
    scenario: randomStringBody.scenario,
    payload: randomStringBody.payload(seed),
  });
  return records;
}

export function registerFuzzCommand(
  program: Command,
  contextFor: ContextFactory
): void {
  program
    .command('fuzz')
    .description('Generate fuzzed payloads as NDJSON')
    .requiredOption('--payload <file>', 'JSON payload file')
    .requiredOption('--fields <list>', 'Fields to fuzz, e.g. tags,owner#ids')
    .option('--seed <number>', 'Deterministic seed', '424242')
    .action((options: FuzzCommandOptions, command: Command) => {
      const records = runFuzz(options, contextFor(command));
      const lines = records.map((record) => JSON.stringify(record));
      process.stdout.write(lines.join('\n') + '\n');
    });
}
