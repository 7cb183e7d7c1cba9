import type { ScanFailureCode } from '../common/errors';

export type ScanInput =
  | string
  | number
  | boolean
  | null
  | readonly ScanInput[]
  | { readonly [key: string]: ScanInput };

export interface ScanOptions {
  /** Deepest allowed nesting; the root value sits at depth 0. */
  maxDepth?: number;
  /** Upper bound on UTF-8 bytes of string leaves scanned in one call. */
  maxBytes?: number;
}

export interface NoMatch {
  matched: false;
}

export interface DenyWordMatch {
  matched: true;
  reason: 'deny_word';
  word: string;
  listName: string;
  priority: number;
  locationHint: string;
}

/** Fail-closed verdict for a payload that could not be scanned safely. */
export interface ScanFailure {
  matched: true;
  reason: ScanFailureCode;
  word: null;
  locationHint: string;
  detail: string;
}

export type ScanResult = NoMatch | DenyWordMatch;

export type MatchOutcome = NoMatch | DenyWordMatch | ScanFailure;

export const DEFAULT_MAX_DEPTH = 32;
