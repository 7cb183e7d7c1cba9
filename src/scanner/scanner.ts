import { foldCase } from '../common/casefold';
import { DepthExceededError, PayloadTypeError, SizeExceededError } from '../common/errors';
import { CompiledMatcher, patternFor } from '../compiler';
import { formatLocation, PathSegment, ROOT_LOCATION } from './location';
import { DEFAULT_MAX_DEPTH, DenyWordMatch, ScanInput, ScanOptions, ScanResult } from './types';

interface Frame {
  value: unknown;
  depth: number;
  segment: PathSegment | undefined;
  parent: Frame | undefined;
}

function locationOf(frame: Frame): string {
  const path: PathSegment[] = [];
  for (let current: Frame | undefined = frame; current; current = current.parent) {
    if (current.segment !== undefined) {
      path.push(current.segment);
    }
  }
  return formatLocation(path.reverse());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * A container reached again at the same or a shallower depth has already been
 * walked without a match, and its subtree cannot reach past the limit from
 * there. Deeper visits are walked again, so cycles still end at `maxDepth`.
 */
function expandOnce(expanded: Map<object, number>, container: object, depth: number): boolean {
  const seenAt = expanded.get(container);
  if (seenAt !== undefined && depth <= seenAt) {
    return false;
  }
  expanded.set(container, depth);
  return true;
}

function matchFolded(folded: string, compiled: CompiledMatcher, locate: () => string): ScanResult {
  const { matcher } = compiled;
  if (!matcher.isMatch(folded)) {
    return { matched: false };
  }
  const fragment = matcher.scanText(folded);
  if (!fragment) {
    return { matched: false };
  }
  const entry = patternFor(compiled, fragment.patternId);
  const match: DenyWordMatch = {
    matched: true,
    reason: 'deny_word',
    word: entry.word,
    listName: entry.listName,
    priority: entry.priority,
    locationHint: locate(),
  };
  return match;
}

/** Matches a single string; folding happens here and nowhere else. */
export function matchString(text: string, compiled: CompiledMatcher, locationHint = ROOT_LOCATION): ScanResult {
  return matchFolded(foldCase(text), compiled, () => locationHint);
}

/**
 * Depth-first, pre-order walk over a payload using an explicit stack. Mapping
 * values are visited in key order and sequences by ascending index; keys
 * themselves are not scanned. Stops at the first string that matches. Accepts
 * untrusted values and rejects anything outside {@link ScanInput}. A container
 * shared by several paths is expanded again only when reached deeper than
 * before, so its strings count once toward `maxBytes` per such expansion.
 *
 * @throws DepthExceededError when a value sits deeper than `maxDepth`
 * @throws SizeExceededError when string leaves exceed `maxBytes`
 * @throws PayloadTypeError for values that are not part of {@link ScanInput}
 */
export function scanValue(value: unknown, compiled: CompiledMatcher, options: ScanOptions = {}): ScanResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const { maxBytes } = options;
  const stack: Frame[] = [{ value, depth: 0, segment: undefined, parent: undefined }];
  // Deepest depth each container has been expanded at so far.
  const expanded = new Map<object, number>();
  let bytes = 0;

  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    if (frame.depth > maxDepth) {
      throw new DepthExceededError(maxDepth, locationOf(frame));
    }
    const current = frame.value;

    if (typeof current === 'string') {
      if (maxBytes !== undefined) {
        bytes += Buffer.byteLength(current, 'utf8');
        if (bytes > maxBytes) {
          throw new SizeExceededError(maxBytes, bytes, locationOf(frame));
        }
      }
      const leaf = frame;
      const result = matchFolded(foldCase(current), compiled, () => locationOf(leaf));
      if (result.matched) {
        return result;
      }
      continue;
    }

    if (current === null || typeof current === 'number' || typeof current === 'boolean') {
      continue;
    }

    const depth = frame.depth + 1;
    if (Array.isArray(current)) {
      if (!expandOnce(expanded, current, frame.depth)) {
        continue;
      }
      for (let index = current.length - 1; index >= 0; index -= 1) {
        stack.push({ value: current[index], depth, segment: index, parent: frame });
      }
      continue;
    }

    if (isPlainObject(current)) {
      if (!expandOnce(expanded, current, frame.depth)) {
        continue;
      }
      const keys = Object.keys(current);
      for (let index = keys.length - 1; index >= 0; index -= 1) {
        const key = keys[index];
        stack.push({ value: current[key], depth, segment: key, parent: frame });
      }
      continue;
    }

    throw new PayloadTypeError(locationOf(frame), describeType(current));
  }

  return { matched: false };
}

/** Typed entry point for payloads already known to be {@link ScanInput}. */
export function scanAny(value: ScanInput, compiled: CompiledMatcher, options: ScanOptions = {}): ScanResult {
  return scanValue(value, compiled, options);
}
