import * as fc from 'fast-check';

import { KNOWN_CPUS, KNOWN_PLATFORMS, VERSION_LIKE } from './vocabulary.js';

/** Leaf of a fragment tree; the only number is the bare `0`. */
export type Atom = string | number;

/**
 * Arbitrary over the five atom categories: empty string, bare zero, cpu name,
 * platform name and version-like token. Builds a fresh arbitrary per call.
 */
export function atoms(): fc.Arbitrary<Atom> {
  return fc.oneof(
    fc.constant(''),
    fc.constant(0),
    fc.constantFrom(...KNOWN_CPUS),
    fc.constantFrom(...KNOWN_PLATFORMS),
    fc.constantFrom(...VERSION_LIKE)
  );
}

export function flattenAtom(atom: Atom): string {
  return String(atom);
}
