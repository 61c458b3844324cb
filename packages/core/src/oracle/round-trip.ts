import type { PlatformCodec } from './codec.js';
import {
  RoundTripMismatchError,
  UnexpectedParseError,
} from '../types/errors.js';

/**
 * The one rejection the harness tolerates. It embeds the exact candidate, so
 * the same wording for another input does not match.
 */
export function expectedRejectionMessage(candidate: string): string {
  return `empty cpu in platform ${JSON.stringify(candidate)}`;
}

export type OracleVerdict =
  | { kind: 'pass'; candidate: string; serialized: string }
  | { kind: 'expected-rejection'; candidate: string; reason: string };

/**
 * parse → format → parse, then compare the two descriptors with the codec's
 * own equality.
 *
 * @throws {UnexpectedParseError} on any rejection other than the empty-cpu one,
 *   and on any rejection of the string form
 * @throws {RoundTripMismatchError} when the descriptors differ
 */
export function checkRoundTrip<D>(
  candidate: string,
  codec: PlatformCodec<D>
): OracleVerdict {
  const first = codec.parse(candidate);
  if (first.isErr()) {
    const reason = first.error.message;
    if (reason === expectedRejectionMessage(candidate)) {
      return { kind: 'expected-rejection', candidate, reason };
    }
    throw new UnexpectedParseError({
      candidate,
      reason,
      cause: first.error.cause,
    });
  }

  const serialized = codec.format(first.value);
  const second = codec.parse(serialized);
  if (second.isErr()) {
    throw new UnexpectedParseError({
      candidate,
      serialized,
      reason: second.error.message,
      cause: second.error.cause,
    });
  }

  if (!codec.equals(first.value, second.value)) {
    throw new RoundTripMismatchError({
      candidate,
      expected: { text: serialized, debug: codec.inspect(first.value) },
      actual: {
        text: codec.format(second.value),
        debug: codec.inspect(second.value),
      },
    });
  }

  return { kind: 'pass', candidate, serialized };
}
