export { atoms, flattenAtom, type Atom } from './atoms.js';
export { fragmentTree, flattenFragments, type TreeShape } from './tree.js';
export {
  platformStrings,
  toCandidate,
  candidateFromText,
  isNoMoreComplex,
  PLATFORM_FIELD_SEPARATOR,
  type Candidate,
} from './platform-string.js';
export { KNOWN_CPUS, KNOWN_PLATFORMS, VERSION_LIKE } from './vocabulary.js';
