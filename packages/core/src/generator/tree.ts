import * as fc from 'fast-check';

import { flattenAtom, type Atom } from './atoms.js';

export interface TreeShape {
  /** Children per node, 0..maxChildren */
  maxChildren: number;
  /** Levels of nesting below the root; 0 yields a single leaf */
  maxDepth: number;
}

export function flattenFragments(parts: readonly string[]): string {
  return parts.join('');
}

/**
 * Arbitrary of fragment trees flattened to strings.
 *
 * A node is either a leaf or 0..maxChildren subtrees concatenated with no
 * separator. The recursion is unrolled once per level, so the arbitrary is
 * finite by construction and a node at depth 0 is always a leaf.
 */
export function fragmentTree(
  leaf: fc.Arbitrary<Atom>,
  shape: TreeShape
): fc.Arbitrary<string> {
  const flatLeaf = leaf.map(flattenAtom);
  if (shape.maxDepth <= 0) {
    return flatLeaf;
  }

  const subtree = fragmentTree(leaf, {
    maxChildren: shape.maxChildren,
    maxDepth: shape.maxDepth - 1,
  });
  return fc.oneof(
    flatLeaf,
    fc
      .array(subtree, { maxLength: shape.maxChildren })
      .map(flattenFragments)
  );
}
