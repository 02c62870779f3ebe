#!/usr/bin/env node

// CLI entry point
// - Command name: `payloadprobe` with subcommands `match`, `mutate` and `fuzz`.
// - `match` classifies a recorded response (code + body file) with
//   MatchCriteria built from --match-* flags over an optional --match-config
//   file.
// - `mutate` replaces or deletes one payload node, collapsing oneOf/anyOf
//   alternatives when the target is missing.
// - `fuzz` prints NDJSON cases for the bundled fuzz strategies.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  ProbeError,
  isProbeError,
} from '@payloadprobe/core';
import { renderCLIView } from './render.js';
import { contextForCommand, createCliContext } from './commands/context.js';
import { registerMatchCommand } from './commands/match.js';
import { registerMutateCommand } from './commands/mutate.js';
import { registerFuzzCommand } from './commands/fuzz.js';

const program = new Command();

program
  .name('payloadprobe')
  .description('Mutate JSON payloads and classify fuzzing responses')
  .version('0.1.0')
  .option('-v, --verbose', 'Print engine debug logs to stderr', false);

registerMatchCommand(program, contextForCommand);
registerMutateCommand(program, contextForCommand);
registerFuzzCommand(program, contextForCommand);

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: ProbeError;
  if (isProbeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends ProbeError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const { verbose } = program.opts<{ verbose?: boolean }>();
  if (verbose === true) {
    // context.value is redacted when NODE_ENV is production
    createCliContext(true).logger.debug('Error details', {
      error: error.toJSON(env),
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
