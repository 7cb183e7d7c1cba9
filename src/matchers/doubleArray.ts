import { Candidate, emptyCandidate, offer } from './candidate';
import { MatchFragment, PatternMatcher } from './types';

const ROOT = 0;
const NONE = -1;
const FREE = -1;
const ASCII_LIMIT = 128;

interface BuildNode {
  children: Map<number, BuildNode>;
  patternId: number;
  depth: number;
  index: number;
}

function createBuildNode(depth: number): BuildNode {
  return { children: new Map(), patternId: NONE, depth, index: NONE };
}

/**
 * Dense alphabet over the code units that occur in the patterns. Code 0 marks a
 * unit no pattern contains.
 */
class Alphabet {
  private readonly ascii = new Uint16Array(ASCII_LIMIT);
  private readonly other = new Map<number, number>();
  readonly size: number;

  constructor(patterns: readonly string[]) {
    const units = new Set<number>();
    for (const pattern of patterns) {
      for (let i = 0; i < pattern.length; i += 1) {
        units.add(pattern.charCodeAt(i));
      }
    }
    const sorted = [...units].sort((a, b) => a - b);
    sorted.forEach((unit, index) => {
      if (unit < ASCII_LIMIT) {
        this.ascii[unit] = index + 1;
      } else {
        this.other.set(unit, index + 1);
      }
    });
    this.size = sorted.length;
  }

  code(unit: number): number {
    return unit < ASCII_LIMIT ? this.ascii[unit] : this.other.get(unit) ?? 0;
  }
}

/**
 * Aho-Corasick automaton stored as a double array: the child of state `s` on
 * code `c` lives at `base[s] + c` when `check[base[s] + c] === s`. Same match
 * semantics as the map-based automaton with a flat, typed-array footprint.
 */
export class DoubleArrayMatcher implements PatternMatcher {
  readonly kind = 'compact-trie' as const;
  readonly patternCount: number;

  private readonly alphabet: Alphabet;
  private readonly base: Int32Array;
  private readonly check: Int32Array;
  private readonly fail: Int32Array;
  private readonly depth: Int32Array;
  private readonly terminal: Int32Array;
  private readonly outputLink: Int32Array;

  constructor(patterns: readonly string[]) {
    this.alphabet = new Alphabet(patterns);

    const root = createBuildNode(0);
    let patternCount = 0;
    patterns.forEach((pattern, id) => {
      if (pattern.length === 0) {
        return;
      }
      let node = root;
      for (let i = 0; i < pattern.length; i += 1) {
        const code = this.alphabet.code(pattern.charCodeAt(i));
        let child = node.children.get(code);
        if (!child) {
          child = createBuildNode(node.depth + 1);
          node.children.set(code, child);
        }
        node = child;
      }
      if (node.patternId === NONE) {
        node.patternId = id;
        patternCount += 1;
      }
    });
    this.patternCount = patternCount;

    const layout = layoutDoubleArray(root);
    const size = layout.check.length;
    this.base = Int32Array.from(layout.base);
    this.check = Int32Array.from(layout.check);
    this.depth = new Int32Array(size);
    this.terminal = new Int32Array(size).fill(NONE);
    for (const node of layout.nodes) {
      this.depth[node.index] = node.depth;
      this.terminal[node.index] = node.patternId;
    }

    this.fail = new Int32Array(size);
    this.outputLink = new Int32Array(size).fill(NONE);
    this.linkFailures(layout.nodes);
  }

  /** Length of the base/check arrays, free slots included. */
  get arraySize(): number {
    return this.check.length;
  }

  isMatch(text: string): boolean {
    if (this.patternCount === 0) {
      return false;
    }
    let state = ROOT;
    for (let i = 0; i < text.length; i += 1) {
      state = this.step(state, this.alphabet.code(text.charCodeAt(i)));
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
      state = this.step(state, this.alphabet.code(text.charCodeAt(i)));
      const end = i + 1;
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

  private transition(state: number, code: number): number {
    const index = this.base[state] + code;
    return index < this.check.length && this.check[index] === state ? index : NONE;
  }

  private step(from: number, code: number): number {
    if (code === 0) {
      return ROOT;
    }
    let state = from;
    for (;;) {
      const next = this.transition(state, code);
      if (next !== NONE) {
        return next;
      }
      if (state === ROOT) {
        return ROOT;
      }
      state = this.fail[state];
    }
  }

  /** Breadth-first over the laid-out nodes, so parents are linked before children. */
  private linkFailures(nodes: readonly BuildNode[]): void {
    for (const node of nodes) {
      for (const [code, child] of node.children) {
        let childFail = ROOT;
        if (node.index !== ROOT) {
          let fallback = this.fail[node.index];
          while (fallback !== ROOT && this.transition(fallback, code) === NONE) {
            fallback = this.fail[fallback];
          }
          const target = this.transition(fallback, code);
          if (target !== NONE && target !== child.index) {
            childFail = target;
          }
        }
        this.fail[child.index] = childFail;
        this.outputLink[child.index] =
          this.terminal[childFail] !== NONE ? childFail : this.outputLink[childFail];
      }
    }
  }
}

interface DoubleArrayLayout {
  base: number[];
  check: number[];
  /** Nodes in breadth-first order with their final indexes. */
  nodes: BuildNode[];
}

/** First-fit placement of every node's children into shared base/check arrays. */
function layoutDoubleArray(root: BuildNode): DoubleArrayLayout {
  const base: number[] = [0];
  const check: number[] = [FREE];
  root.index = ROOT;
  const nodes: BuildNode[] = [root];
  let firstFree = 1;

  const isFree = (index: number) => index >= check.length || check[index] === FREE;
  const claim = (index: number, owner: number) => {
    while (check.length <= index) {
      check.push(FREE);
      base.push(0);
    }
    check[index] = owner;
  };

  for (let head = 0; head < nodes.length; head += 1) {
    const node = nodes[head];
    if (node.children.size === 0) {
      continue;
    }
    const codes = [...node.children.keys()].sort((a, b) => a - b);
    while (!isFree(firstFree)) {
      firstFree += 1;
    }
    let offset = Math.max(0, firstFree - codes[0]);
    while (!codes.every((code) => isFree(offset + code))) {
      offset += 1;
    }
    base[node.index] = offset;
    for (const code of codes) {
      const child = node.children.get(code);
      if (!child) {
        continue;
      }
      child.index = offset + code;
      claim(child.index, node.index);
      nodes.push(child);
    }
  }

  return { base, check, nodes };
}
