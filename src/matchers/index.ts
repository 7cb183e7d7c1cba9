import { AhoCorasickMatcher } from './ahoCorasick';
import { AlternationMatcher } from './alternation';
import { DoubleArrayMatcher } from './doubleArray';
import { BackendKind } from './types';

export * from './types';
export { AhoCorasickMatcher } from './ahoCorasick';
export { AlternationMatcher, escapeRegExp } from './alternation';
export { DoubleArrayMatcher } from './doubleArray';

export type Matcher = AhoCorasickMatcher | AlternationMatcher | DoubleArrayMatcher;

/** Builds the backend for already folded, de-duplicated patterns; index = pattern id. */
export function createMatcher(kind: BackendKind, patterns: readonly string[]): Matcher {
  switch (kind) {
    case 'automaton':
      return new AhoCorasickMatcher(patterns);
    case 'alternation':
      return new AlternationMatcher(patterns);
    case 'compact-trie':
      return new DoubleArrayMatcher(patterns);
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown matcher backend "${String(unknown)}"`);
    }
  }
}
