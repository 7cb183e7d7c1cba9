import { Candidate, emptyCandidate, offer } from './candidate';
import { MatchFragment, PatternMatcher } from './types';

const ROOT = 0;
const NONE = -1;

/**
 * Trie with failure links over UTF-16 code units. A single pass over the text
 * visits every pattern ending at each position through the output links.
 */
export class AhoCorasickMatcher implements PatternMatcher {
  readonly kind = 'automaton' as const;
  readonly patternCount: number;

  private readonly transitions: Array<Map<number, number>>;
  private readonly fail: Int32Array;
  private readonly depth: Int32Array;
  /** Pattern id terminating at the state, or -1. */
  private readonly terminal: Int32Array;
  /** Nearest terminal state on the failure chain, excluding the state itself. */
  private readonly outputLink: Int32Array;

  constructor(patterns: readonly string[]) {
    const transitions: Array<Map<number, number>> = [new Map()];
    const depth: number[] = [0];
    const terminal: number[] = [NONE];
    let patternCount = 0;

    patterns.forEach((pattern, id) => {
      if (pattern.length === 0) {
        return;
      }
      let state = ROOT;
      for (let i = 0; i < pattern.length; i += 1) {
        const code = pattern.charCodeAt(i);
        let next = transitions[state].get(code);
        if (next === undefined) {
          next = transitions.length;
          transitions.push(new Map());
          depth.push(depth[state] + 1);
          terminal.push(NONE);
          transitions[state].set(code, next);
        }
        state = next;
      }
      if (terminal[state] === NONE) {
        terminal[state] = id;
        patternCount += 1;
      }
    });

    const size = transitions.length;
    const fail = new Int32Array(size);
    const outputLink = new Int32Array(size).fill(NONE);
    const queue: number[] = [...transitions[ROOT].values()];

    for (let head = 0; head < queue.length; head += 1) {
      const state = queue[head];
      for (const [code, child] of transitions[state]) {
        let fallback = fail[state];
        while (fallback !== ROOT && !transitions[fallback].has(code)) {
          fallback = fail[fallback];
        }
        const target = state === ROOT ? undefined : transitions[fallback].get(code);
        const childFail = target !== undefined && target !== child ? target : ROOT;
        fail[child] = childFail;
        outputLink[child] = terminal[childFail] !== NONE ? childFail : outputLink[childFail];
        queue.push(child);
      }
    }

    this.transitions = transitions;
    this.fail = fail;
    this.depth = Int32Array.from(depth);
    this.terminal = Int32Array.from(terminal);
    this.outputLink = outputLink;
    this.patternCount = patternCount;
  }

  /** Number of trie states, root included. */
  get stateCount(): number {
    return this.transitions.length;
  }

  isMatch(text: string): boolean {
    if (this.patternCount === 0) {
      return false;
    }
    let state = ROOT;
    for (let i = 0; i < text.length; i += 1) {
      state = this.step(state, text.charCodeAt(i));
      if (this.terminal[state] !== NONE || this.outputLink[state] !== NONE) {
        return true;
      }
    }
    return false;
  }

  scanText(text: string): MatchFragment | undefined {
    if (this.patternCount === 0) {
      return undefined;
    }
    const best: Candidate = emptyCandidate();
    let state = ROOT;
    for (let i = 0; i < text.length; i += 1) {
      state = this.step(state, text.charCodeAt(i));
      const end = i + 1;
      // every match still ahead starts at or after end - depth[state]
      if (best.patternId !== NONE && end - this.depth[state] > best.start) {
        break;
      }
      let output = this.terminal[state] !== NONE ? state : this.outputLink[state];
      while (output !== NONE) {
        offer(best, end - this.depth[output], end, this.terminal[output]);
        output = this.outputLink[output];
      }
    }
    if (best.patternId === NONE) {
      return undefined;
    }
    return { patternId: best.patternId, start: best.start, end: best.end };
  }

  private step(from: number, code: number): number {
    let state = from;
    for (;;) {
      const next = this.transitions[state].get(code);
      if (next !== undefined) {
        return next;
      }
      if (state === ROOT) {
        return ROOT;
      }
      state = this.fail[state];
    }
  }
}
