import * as fc from 'fast-check';

import { atoms } from './atoms.js';
import { fragmentTree } from './tree.js';
import { resolveOptions, type GeneratorOptions } from '../types/options.js';

export const PLATFORM_FIELD_SEPARATOR = '-';

/**
 * One generated input: the fragments it was joined from and the joined text.
 */
export interface Candidate {
  readonly fragments: readonly string[];
  readonly text: string;
}

export function toCandidate(fragments: readonly string[]): Candidate {
  return { fragments, text: fragments.join(PLATFORM_FIELD_SEPARATOR) };
}

/** Splits an existing platform string back into fragments. */
export function candidateFromText(text: string): Candidate {
  return toCandidate(text.split(PLATFORM_FIELD_SEPARATOR));
}

/**
 * True when `next` has no more fragments and no more characters than
 * `current`.
 */
export function isNoMoreComplex(next: Candidate, current: Candidate): boolean {
  return (
    next.fragments.length <= current.fragments.length &&
    next.text.length <= current.text.length
  );
}

/**
 * Arbitrary of candidate platform strings: 0..maxFragments fragment trees
 * joined with `-`. Malformed output is kept; filtering is the oracle's job.
 */
export function platformStrings(
  options: GeneratorOptions = {}
): fc.Arbitrary<Candidate> {
  const { maxFragments, maxChildren, maxDepth } = resolveOptions({
    generator: options,
  }).generator;

  return fc
    .array(fragmentTree(atoms(), { maxChildren, maxDepth }), {
      maxLength: maxFragments,
    })
    .map(toCandidate);
}
