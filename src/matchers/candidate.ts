/**
 * Best candidate seen so far during a scan. `patternId` is -1 until the first
 * match is recorded.
 */
export interface Candidate {
  patternId: number;
  start: number;
  end: number;
}

export function emptyCandidate(): Candidate {
  return { patternId: -1, start: -1, end: -1 };
}

/**
 * Total order on matches: earlier start, then longer match, then lower pattern id.
 * Pattern ids are ranked by the compiler (priority, then list order).
 */
export function outranks(start: number, end: number, patternId: number, best: Candidate): boolean {
  if (best.patternId === -1) {
    return true;
  }
  if (start !== best.start) {
    return start < best.start;
  }
  if (end !== best.end) {
    return end > best.end;
  }
  return patternId < best.patternId;
}

export function offer(best: Candidate, start: number, end: number, patternId: number): void {
  if (outranks(start, end, patternId, best)) {
    best.patternId = patternId;
    best.start = start;
    best.end = end;
  }
}
