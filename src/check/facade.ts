import { DepthExceededError, isScanFailure } from '../common/errors';
import type { CompiledMatcher } from '../compiler';
import { matchString, MatchOutcome, ScanFailure, ScanInput, ScanOptions, ScanResult, scanValue } from '../scanner';

export interface DescribeOptions {
  /** Include the literal deny word; only for authorized callers. */
  revealWord?: boolean;
}

/**
 * Scans a payload and returns a frozen verdict. Depth and size violations fail
 * closed as `matched: true` with `word: null`; a malformed payload still throws
 * `PayloadTypeError`. Never mutates `compiled`.
 */
export function check(payload: ScanInput, compiled: CompiledMatcher, options: ScanOptions = {}): MatchOutcome {
  return checkValue(payload, compiled, options);
}

/** Same as {@link check} for payloads that arrive untyped, such as parsed request bodies. */
export function checkValue(payload: unknown, compiled: CompiledMatcher, options: ScanOptions = {}): MatchOutcome {
  try {
    return Object.freeze(scanValue(payload, compiled, options));
  } catch (error) {
    if (!isScanFailure(error)) {
      throw error;
    }
    const failure: ScanFailure = {
      matched: true,
      reason: error instanceof DepthExceededError ? 'depth_exceeded' : 'size_exceeded',
      word: null,
      locationHint: error.locationHint,
      detail: error.message,
    };
    return Object.freeze(failure);
  }
}

export function checkText(text: string, compiled: CompiledMatcher): ScanResult {
  return Object.freeze(matchString(text, compiled));
}

export function describeOutcome(outcome: MatchOutcome, options: DescribeOptions = {}): string {
  if (!outcome.matched) {
    return 'prompt allowed';
  }
  switch (outcome.reason) {
    case 'deny_word': {
      const base = `prompt rejected: matched deny word from list '${outcome.listName}'`;
      return options.revealWord ? `${base} ("${outcome.word}")` : base;
    }
    case 'depth_exceeded':
      return 'prompt rejected: payload nesting exceeds the allowed depth';
    case 'size_exceeded':
      return 'prompt rejected: payload text exceeds the allowed size';
    default: {
      const unknown: never = outcome;
      return `prompt rejected: ${JSON.stringify(unknown)}`;
    }
  }
}
