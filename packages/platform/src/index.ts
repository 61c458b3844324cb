// @platcheck/platform entry point
//
// Platform descriptor library exercised by the round-trip harness in
// @platcheck/core. Consumers outside this package reach it through the codec
// adapter in @platcheck/core rather than calling Platform.parse directly.

export {
  Platform,
  PlatformError,
  PLATFORM_SEPARATOR,
  type PlatformTuple,
} from './platform.js';
export { matchOs, UNKNOWN_OS, type OsMatch } from './os-rules.js';
