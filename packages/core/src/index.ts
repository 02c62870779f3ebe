// @payloadprobe/core entry point
//
// - json/: path-addressed reads, type tests and rewrites of payload text,
//   oneOf/anyOf collapsing and cyclic-chain detection.
// - match/: response descriptors and the MatchCriteria filter engine.
// - fuzzers/: the contract fuzz strategies use to drive the JSON engine.

export * from './types/index.js';
export * from './json/index.js';
export * from './match/index.js';
export * from './fuzzers/index.js';

export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  createStderrLogger,
  silentLogger,
  type ProbeLogger,
  type StderrLoggerOptions,
} from './util/logger.js';
export { XorShift32, fnv1a32, randomAlphanumeric } from './util/rng.js';
