import { MatchFragment, PatternMatcher } from './types';

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * One regular expression made of every pattern as an alternative. Alternatives
 * are ordered longest first so the engine's leftmost-first choice at a given
 * start is also the longest match there.
 */
export class AlternationMatcher implements PatternMatcher {
  readonly kind = 'alternation' as const;
  readonly patternCount: number;

  private readonly regex: RegExp | undefined;
  private readonly ids: ReadonlyMap<string, number>;

  constructor(patterns: readonly string[]) {
    const ids = new Map<string, number>();
    patterns.forEach((pattern, id) => {
      if (pattern.length > 0 && !ids.has(pattern)) {
        ids.set(pattern, id);
      }
    });

    const ordered = [...ids.entries()]
      .sort(([left, leftId], [right, rightId]) => right.length - left.length || leftId - rightId)
      .map(([pattern]) => escapeRegExp(pattern));

    // non-global: exec and test keep no lastIndex state between callers
    this.regex = ordered.length > 0 ? new RegExp(ordered.join('|')) : undefined;
    this.ids = ids;
    this.patternCount = ids.size;
  }

  get source(): string | undefined {
    return this.regex?.source;
  }

  isMatch(text: string): boolean {
    return this.regex !== undefined && this.regex.test(text);
  }

  scanText(text: string): MatchFragment | undefined {
    if (!this.regex) {
      return undefined;
    }
    const match = this.regex.exec(text);
    if (!match) {
      return undefined;
    }
    const patternId = this.ids.get(match[0]);
    if (patternId === undefined) {
      throw new Error(`Alternation produced unknown pattern "${match[0]}"`);
    }
    return { patternId, start: match.index, end: match.index + match[0].length };
  }
}
