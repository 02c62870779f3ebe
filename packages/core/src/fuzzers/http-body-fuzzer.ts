import { XorShift32, randomAlphanumeric } from '../util/rng.js';

/**
 * A fuzzer that replaces the whole request body.
 */
export interface HttpBodyFuzzer {
  readonly scenario: string;
  readonly description: string;
  payload(seed: number): string;
}

export const RANDOM_BODY_LENGTH = 64;

export const randomStringBody: HttpBodyFuzzer = {
  scenario: 'Send a request with a random string body',
  description: 'send a request with a random string body',
  payload: (seed) =>
    randomAlphanumeric(
      new XorShift32(seed, 'random-string-body'),
      RANDOM_BODY_LENGTH
    ),
};
