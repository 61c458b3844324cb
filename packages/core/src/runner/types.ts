import type { Candidate } from '../generator/platform-string.js';
import type {
  GeneratorExhaustedError,
  PlatcheckError,
} from '../types/errors.js';

/** Classification of one oracle call. */
export type TrialOutcome =
  | { kind: 'pass'; candidate: Candidate }
  | { kind: 'expected-rejection'; candidate: Candidate; reason: string }
  | { kind: 'failure'; candidate: Candidate; error: PlatcheckError };

export interface RunStats {
  seed: number;
  numRuns: number;
  /** Oracle calls made while generating, shrink calls excluded */
  trials: number;
  passes: number;
  discards: number;
}

export interface PassedRun extends RunStats {
  status: 'passed';
}

export interface FailedRun extends RunStats {
  status: 'failed';
  /** First failing candidate, as generated */
  counterexample: Candidate;
  originalError: PlatcheckError;
  /** Simplest candidate found that still fails */
  shrunk: Candidate;
  error: PlatcheckError;
  shrinkSteps: number;
}

export interface ExhaustedRun extends RunStats {
  status: 'exhausted';
  error: GeneratorExhaustedError;
}

export type RunReport = PassedRun | FailedRun | ExhaustedRun;
