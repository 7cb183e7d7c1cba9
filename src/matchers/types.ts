export type BackendKind = 'automaton' | 'alternation' | 'compact-trie';

export const BACKEND_KINDS: readonly BackendKind[] = ['automaton', 'alternation', 'compact-trie'];

/**
 * Location of the reported pattern inside the folded text, as UTF-16 offsets.
 */
export interface MatchFragment {
  patternId: number;
  start: number;
  end: number;
}

/**
 * Contract shared by every backend. Input text is expected to be folded
 * already; backends never re-normalize it.
 */
export interface PatternMatcher {
  readonly kind: BackendKind;
  readonly patternCount: number;
  /** Returns true as soon as any pattern occurs in the text. */
  isMatch(text: string): boolean;
  /**
   * Reports the leftmost match; longer matches win at the same start, then the
   * lower pattern id.
   */
  scanText(text: string): MatchFragment | undefined;
}

export function isBackendKind(value: unknown): value is BackendKind {
  return typeof value === 'string' && BACKEND_KINDS.some((kind) => kind === value);
}
