// @platcheck/core entry point
//
// Public API:
// - PropertyRunner drives the round-trip oracle (checkRoundTrip) over the
//   platform-string arbitrary (platformStrings) and returns a RunReport.
// - platformCodec adapts @platcheck/platform to the PlatformCodec interface;
//   other implementations plug in through the same interface.
// - Errors, exit codes, the presenter, Result and option resolution are
//   shared with @platcheck/cli.

export * from './generator/index.js';
export * from './oracle/index.js';
export * from './runner/index.js';

// Errors
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
  PlatcheckError,
  UnexpectedParseError,
  RoundTripMismatchError,
  GeneratorExhaustedError,
  ConfigurationError,
  InternalError,
  isPlatcheckError,
  toPlatcheckError,
  type DescriptorView,
  type ErrorContext,
  type SerializedError,
  type PlatcheckErrorParams,
} from './types/errors.js';

// Result
export { Ok, Err, ok, err, type Result } from './types/result.js';

// Options
export {
  resolveOptions,
  DEFAULT_HARNESS_OPTIONS,
  type HarnessOptions,
  type GeneratorOptions,
  type ResolvedHarnessOptions,
} from './types/options.js';
