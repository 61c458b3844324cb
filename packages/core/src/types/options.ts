/**
 * Configuration options for a harness run
 *
 * All options are optional; resolveOptions() fills in the defaults and
 * rejects values that could not drive a run.
 */

import { ConfigurationError } from './errors.js';

/**
 * Shape of generated candidates
 */
export interface GeneratorOptions {
  /** Maximum fragments joined into one candidate (default: 5) */
  maxFragments?: number;
  /** Maximum children per fragment-tree node (default: 4) */
  maxChildren?: number;
  /** Maximum nesting depth of a fragment tree (default: 4) */
  maxDepth?: number;
}

export interface HarnessOptions {
  /** Seed for the runner's random source (default: 424242) */
  seed?: number;
  /** Passing trials required for an overall pass (default: 2000) */
  numRuns?: number;
  /** Total discarded candidates tolerated before giving up (default: 100_000) */
  maxDiscards?: number;
  /** Discards in a row tolerated before giving up (default: 100_000) */
  maxConsecutiveDiscards?: number;
  /** Oracle calls spent looking for a simpler counterexample (default: 10_000) */
  maxShrinkSteps?: number;

  generator?: GeneratorOptions;
}

export interface ResolvedHarnessOptions {
  seed: number;
  numRuns: number;
  maxDiscards: number;
  maxConsecutiveDiscards: number;
  maxShrinkSteps: number;
  generator: Required<GeneratorOptions>;
}

export const DEFAULT_HARNESS_OPTIONS: ResolvedHarnessOptions = {
  seed: 424242,
  numRuns: 2000,
  maxDiscards: 100_000,
  maxConsecutiveDiscards: 100_000,
  maxShrinkSteps: 10_000,
  generator: {
    maxFragments: 5,
    maxChildren: 4,
    maxDepth: 4,
  },
};

/**
 * Resolves partial user options into a complete configuration
 *
 * @throws {ConfigurationError} when a value is out of range
 */
export function resolveOptions(
  userOptions: HarnessOptions = {}
): ResolvedHarnessOptions {
  const resolved: ResolvedHarnessOptions = {
    ...DEFAULT_HARNESS_OPTIONS,
    ...userOptions,
    generator: {
      ...DEFAULT_HARNESS_OPTIONS.generator,
      ...userOptions.generator,
    },
  };

  validateOptions(resolved);
  return resolved;
}

function requireInteger(
  value: number,
  setting: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): void {
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    const range =
      max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ConfigurationError(
      `${setting} must be an integer ${range}, got ${String(value)}`,
      setting
    );
  }
}

function validateOptions(options: ResolvedHarnessOptions): void {
  requireInteger(options.seed, 'seed', -0x80000000, 0xffffffff);
  requireInteger(options.numRuns, 'numRuns', 1);
  requireInteger(options.maxDiscards, 'maxDiscards', 0);
  requireInteger(options.maxConsecutiveDiscards, 'maxConsecutiveDiscards', 0);
  requireInteger(options.maxShrinkSteps, 'maxShrinkSteps', 0);

  // A tree holds at most maxChildren ** maxDepth leaves
  const { maxFragments, maxChildren, maxDepth } = options.generator;
  requireInteger(maxFragments, 'generator.maxFragments', 0, 8);
  requireInteger(maxChildren, 'generator.maxChildren', 0, 4);
  requireInteger(maxDepth, 'generator.maxDepth', 0, 6);
}
