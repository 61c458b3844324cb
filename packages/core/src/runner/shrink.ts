import type * as fc from 'fast-check';

import {
  isNoMoreComplex,
  type Candidate,
} from '../generator/platform-string.js';
import type { PlatcheckError } from '../types/errors.js';
import type { TrialOutcome } from './types.js';

export interface ShrinkResult {
  candidate: Candidate;
  error: PlatcheckError;
  /** Oracle calls spent */
  steps: number;
}

/**
 * Walks the arbitrary's own shrink stream from a failing value.
 *
 * A shrink is taken when it fails with the same error code as the original
 * failure and is no more complex than the current candidate; the walk then
 * restarts from it. A shrink that fails some other way is a different bug and
 * is skipped. It ends when a stream
 * yields no such shrink or `maxSteps` oracle calls have been made.
 */
export function shrinkFailure(
  arbitrary: fc.Arbitrary<Candidate>,
  failing: fc.Value<Candidate>,
  error: PlatcheckError,
  evaluate: (candidate: Candidate) => TrialOutcome,
  maxSteps: number
): ShrinkResult {
  let current = failing;
  let currentError = error;
  let steps = 0;
  let improved = true;

  while (improved && steps < maxSteps) {
    improved = false;
    for (const next of arbitrary.shrink(current.value, current.context)) {
      if (steps >= maxSteps) break;
      if (!isNoMoreComplex(next.value, current.value)) continue;

      steps += 1;
      const outcome = evaluate(next.value);
      if (
        outcome.kind === 'failure' &&
        outcome.error.errorCode === error.errorCode
      ) {
        current = next;
        currentError = outcome.error;
        improved = true;
        break;
      }
    }
  }

  return { candidate: current.value, error: currentError, steps };
}
