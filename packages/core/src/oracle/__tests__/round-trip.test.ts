import { describe, it, expect } from 'vitest';
import type { Platform } from '@platcheck/platform';

import { platformCodec, type PlatformCodec } from '../codec.js';
import { checkRoundTrip, expectedRejectionMessage } from '../round-trip.js';
import {
  RoundTripMismatchError,
  UnexpectedParseError,
} from '../../types/errors.js';
import { ErrorCode } from '../../errors/codes.js';
import { err } from '../../types/result.js';

function codecWith(
  overrides: Partial<PlatformCodec<Platform>>
): PlatformCodec<Platform> {
  return { ...platformCodec, ...overrides };
}

/** Drops the version when formatting. */
const lossyCodec = codecWith({
  format: (platform) =>
    [platform.cpu, platform.os].filter((part) => part !== null).join('-'),
});

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('checkRoundTrip with the platform codec', () => {
  it('discards the empty string as an expected rejection', () => {
    expect(checkRoundTrip('', platformCodec)).toEqual({
      kind: 'expected-rejection',
      candidate: '',
      reason: 'empty cpu in platform ""',
    });
  });

  it('discards a leading empty field', () => {
    expect(checkRoundTrip('-linux', platformCodec).kind).toBe(
      'expected-rejection'
    );
  });

  it('round-trips cpu and os', () => {
    expect(checkRoundTrip('x86_64-linux', platformCodec)).toEqual({
      kind: 'pass',
      candidate: 'x86_64-linux',
      serialized: 'x86_64-linux',
    });
  });

  it('round-trips a version field', () => {
    expect(checkRoundTrip('arm64-darwin-20', platformCodec)).toEqual({
      kind: 'pass',
      candidate: 'arm64-darwin-20',
      serialized: 'arm64-darwin-20',
    });
  });

  it('round-trips a malformed version token consistently', () => {
    expect(checkRoundTrip('1..0-x86', platformCodec)).toEqual({
      kind: 'pass',
      candidate: '1..0-x86',
      serialized: '1..0-unknown',
    });
  });

  it('checks the largest generator output', () => {
    const fragment = 'x86_64'.repeat(4 ** 4);
    const candidate = Array.from({ length: 5 }, () => fragment).join('-');

    expect(checkRoundTrip(candidate, platformCodec)).toEqual({
      kind: 'pass',
      candidate,
      serialized: `${fragment}-unknown`,
    });
  });
});

describe('checkRoundTrip rejection filter', () => {
  it('builds the whitelisted message from the exact candidate', () => {
    expect(expectedRejectionMessage('-x86')).toBe(
      'empty cpu in platform "-x86"'
    );
  });

  it('raises any other rejection message', () => {
    const codec = codecWith({
      parse: () => err({ message: 'unsupported platform' }),
    });

    const error = catchError(() => checkRoundTrip('x86-linux', codec));

    expect(error).toBeInstanceOf(UnexpectedParseError);
    if (error instanceof UnexpectedParseError) {
      expect(error.errorCode).toBe(ErrorCode.UNEXPECTED_PARSE_ERROR);
      expect(error.message).toBe(
        'Unexpected parse error for "x86-linux": unsupported platform'
      );
      expect(error.context).toMatchObject({
        candidate: 'x86-linux',
        reason: 'unsupported platform',
      });
    }
  });

  it('raises the empty cpu message when it names another string', () => {
    const codec = codecWith({
      parse: (input) =>
        err({ message: expectedRejectionMessage(input.trim()) }),
    });

    expect(() => checkRoundTrip(' x86 ', codec)).toThrow(UnexpectedParseError);
  });

  it('raises when the string form is rejected, even with the empty cpu message', () => {
    const codec = codecWith({ format: () => '' });

    const error = catchError(() => checkRoundTrip('x86-linux', codec));

    expect(error).toBeInstanceOf(UnexpectedParseError);
    if (error instanceof UnexpectedParseError) {
      expect(error.message).toBe(
        'Re-parsing "" (from "x86-linux") failed: empty cpu in platform ""'
      );
      expect(error.context?.serialized).toBe('');
    }
  });

  it('lets exceptions that are not rejections propagate', () => {
    const codec = codecWith({
      parse: () => {
        throw new TypeError('parser crashed');
      },
    });

    expect(() => checkRoundTrip('x86-linux', codec)).toThrow(TypeError);
  });
});

describe('checkRoundTrip mismatch report', () => {
  it('reports the candidate and both descriptors', () => {
    const error = catchError(() =>
      checkRoundTrip('arm64-darwin-20', lossyCodec)
    );

    expect(error).toBeInstanceOf(RoundTripMismatchError);
    if (error instanceof RoundTripMismatchError) {
      expect(error.message).toBe(
        [
          'Round trip changed the platform',
          'From      "arm64-darwin-20"',
          'Expected: #<Platform cpu="arm64" os="darwin" version="20">',
          '          arm64-darwin',
          'Got:      #<Platform cpu="arm64" os="darwin" version=null>',
          '          arm64-darwin',
        ].join('\n')
      );
      expect(error.context?.expected).toEqual({
        text: 'arm64-darwin',
        debug: '#<Platform cpu="arm64" os="darwin" version="20">',
      });
      expect(error.getExitCode()).toBe(11);
    }
  });

  it('passes the lossy codec when nothing is lost', () => {
    expect(checkRoundTrip('x86-linux', lossyCodec).kind).toBe('pass');
  });
});
