import type { BackendKind, Matcher } from '../matchers';

export type { BackendKind } from '../matchers';

export interface DenyWordList {
  name: string;
  /** Higher values take precedence. */
  priority: number;
  words: readonly string[];
}

/** What to do when the lists contain no usable word at all. */
export type EmptyPolicy = 'error' | 'never-match';

export interface CompileOptions {
  maxPatterns?: number;
  emptyPolicy?: EmptyPolicy;
}

export interface PatternEntry {
  /** Index into the backend; lower ids win ties. */
  id: number;
  /** Folded form handed to the backend. */
  pattern: string;
  /** Word as configured, trimmed but not folded. */
  word: string;
  listName: string;
  priority: number;
  listIndex: number;
  wordIndex: number;
}

export interface CompileWarning {
  listName: string;
  wordIndex: number;
  message: string;
}

export interface CompiledMatcher {
  readonly backend: BackendKind;
  readonly matcher: Matcher;
  readonly patterns: readonly PatternEntry[];
  readonly warnings: readonly CompileWarning[];
  /** Number of skipped empty or whitespace-only words. */
  readonly warningCount: number;
  /** Words dropped because an earlier list already holds the same folded word. */
  readonly duplicateCount: number;
  readonly listNames: readonly string[];
}
