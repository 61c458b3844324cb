import * as fc from 'fast-check';
import { xoroshiro128plus } from 'pure-rand';

import {
  platformStrings,
  type Candidate,
} from '../generator/platform-string.js';
import { checkRoundTrip } from '../oracle/round-trip.js';
import type { PlatformCodec } from '../oracle/codec.js';
import {
  GeneratorExhaustedError,
  toPlatcheckError,
} from '../types/errors.js';
import {
  resolveOptions,
  type HarnessOptions,
  type ResolvedHarnessOptions,
} from '../types/options.js';
import { shrinkFailure } from './shrink.js';
import type { RunReport, RunStats, TrialOutcome } from './types.js';

/**
 * Drives the round-trip oracle over generated platform strings.
 *
 * Trials run one after another on a random source seeded per `run()`, so a
 * run is fully determined by its options and the codec. Expected rejections
 * are discards: they do not count toward `numRuns`.
 */
export class PropertyRunner<D> {
  readonly options: ResolvedHarnessOptions;
  private readonly arbitrary: fc.Arbitrary<Candidate>;

  constructor(
    private readonly codec: PlatformCodec<D>,
    options: HarnessOptions = {}
  ) {
    this.options = resolveOptions(options);
    this.arbitrary = platformStrings(this.options.generator);
  }

  /** Runs the oracle on one candidate; never throws. */
  evaluate(candidate: Candidate): TrialOutcome {
    try {
      const verdict = checkRoundTrip(candidate.text, this.codec);
      if (verdict.kind === 'expected-rejection') {
        return { kind: 'expected-rejection', candidate, reason: verdict.reason };
      }
      return { kind: 'pass', candidate };
    } catch (error) {
      return { kind: 'failure', candidate, error: toPlatcheckError(error) };
    }
  }

  run(): RunReport {
    const { seed, numRuns, maxDiscards, maxConsecutiveDiscards } =
      this.options;
    const mrng = new fc.Random(xoroshiro128plus(seed));
    const stats: RunStats = { seed, numRuns, trials: 0, passes: 0, discards: 0 };
    let consecutiveDiscards = 0;

    while (stats.passes < numRuns) {
      const drawn = this.arbitrary.generate(mrng, undefined);
      stats.trials += 1;
      const outcome = this.evaluate(drawn.value);

      switch (outcome.kind) {
        case 'pass':
          stats.passes += 1;
          consecutiveDiscards = 0;
          break;
        case 'expected-rejection':
          stats.discards += 1;
          consecutiveDiscards += 1;
          if (
            stats.discards > maxDiscards ||
            consecutiveDiscards > maxConsecutiveDiscards
          ) {
            return {
              ...stats,
              status: 'exhausted',
              error: new GeneratorExhaustedError({
                passes: stats.passes,
                numRuns,
                discards: stats.discards,
                consecutiveDiscards,
              }),
            };
          }
          break;
        case 'failure': {
          const shrunk = shrinkFailure(
            this.arbitrary,
            drawn,
            outcome.error,
            (candidate) => this.evaluate(candidate),
            this.options.maxShrinkSteps
          );
          return {
            ...stats,
            status: 'failed',
            counterexample: outcome.candidate,
            originalError: outcome.error,
            shrunk: shrunk.candidate,
            error: shrunk.error,
            shrinkSteps: shrunk.steps,
          };
        }
      }
    }

    return { ...stats, status: 'passed' };
  }
}
