import type { Command } from 'commander';
import {
  MatchCriteria,
  describeResponse,
  type JsonEngineContext,
} from '@payloadprobe/core';
import { readInputFile } from '../files.js';
import {
  parseResponseCode,
  resolveMatchOptions,
  type MatchFlagOptions,
} from '../flags.js';
import type { ContextFactory } from './context.js';

export interface MatchCommandOptions extends MatchFlagOptions {
  code?: string;
  body?: string;
  inputValue?: string;
}

export interface MatchVerdict {
  matched: boolean;
  evaluated: boolean;
  reflected: boolean;
  criteria: string;
}

/**
 * Classify one recorded response against the configured filters.
 */
export function runMatch(
  options: MatchCommandOptions,
  ctx: JsonEngineContext
): MatchVerdict {
  const responseCode = parseResponseCode(options.code);
  const body = options.body !== undefined ? readInputFile(options.body) : '';
  const criteria = MatchCriteria.fromOptions(resolveMatchOptions(options));

  if (!criteria.isAnyCriterionConfigured() && !criteria.matchInput) {
    ctx.logger.warn('No match criteria configured; nothing will match');
  }

  const response = describeResponse({ responseCode, body });
  ctx.logger.debug('Evaluating response', {
    responseCode,
    numberOfLines: response.numberOfLines,
    numberOfWords: response.numberOfWords,
    contentLengthInBytes: response.contentLengthInBytes,
  });

  const evaluated = criteria.evaluate(response);
  const reflected =
    options.inputValue !== undefined &&
    criteria.isInputReflected(response, options.inputValue);
  return {
    matched: evaluated || reflected,
    evaluated,
    reflected,
    criteria: criteria.describe(),
  };
}

export function registerMatchCommand(
  program: Command,
  contextFor: ContextFactory
): void {
  program
    .command('match')
    .description('Check a recorded response against match filters')
    .requiredOption('--code <number>', 'HTTP response code')
    .option('--body <file>', 'Response body file')
    .option('--input-value <value>', 'Fuzzed value sent with the request')
    .option('--match-response-codes <list>', 'Codes or classes, e.g. 200,4XX')
    .option('--match-response-lines <list>', 'Line counts to match')
    .option('--match-response-words <list>', 'Word counts to match')
    .option('--match-response-sizes <list>', 'Body sizes in bytes to match')
    .option('--match-response-regex <pattern>', 'Whole-body regex to match')
    .option('--match-input', 'Match responses that echo the fuzzed value')
    .option('--match-config <file>', 'JSON file with match options')
    .action((options: MatchCommandOptions, command: Command) => {
      const verdict = runMatch(options, contextFor(command));
      process.stdout.write(JSON.stringify(verdict) + '\n');
    });
}
