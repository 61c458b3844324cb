import { Platform, PlatformError } from '@platcheck/platform';

import { err, ok, type Result } from '../types/result.js';

export interface ParseFailure {
  message: string;
  cause?: Error;
}

/**
 * What the oracle needs from a platform-string implementation. Descriptors
 * are opaque: they are only compared with `equals` and rendered with
 * `format` (string form) and `inspect` (debug form).
 */
export interface PlatformCodec<D> {
  parse(input: string): Result<D, ParseFailure>;
  format(descriptor: D): string;
  equals(a: D, b: D): boolean;
  inspect(descriptor: D): string;
}

/**
 * Codec over `@platcheck/platform`. A `PlatformError` becomes an `Err`; any
 * other exception is a bug in the library and propagates.
 */
export const platformCodec: PlatformCodec<Platform> = {
  parse(input) {
    try {
      return ok(Platform.parse(input));
    } catch (error) {
      if (error instanceof PlatformError) {
        return err({ message: error.message, cause: error });
      }
      throw error;
    }
  },
  format: (platform) => platform.toString(),
  equals: (a, b) => a.equals(b),
  inspect: (platform) => platform.inspect(),
};
