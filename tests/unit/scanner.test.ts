import { describe, it, expect } from 'vitest';
import { DepthExceededError, PayloadTypeError, SizeExceededError } from '../../src/common/errors';
import { check } from '../../src/check';
import { compile } from '../../src/compiler';
import { formatLocation, matchString, ScanInput, scanAny, scanValue } from '../../src/scanner';

const compiled = compile([
  { name: 'profanity', priority: 10, words: ['spam', 'scam'] },
  { name: 'internal', priority: 0, words: ['Project-Codename'] },
]);

describe('formatLocation', () => {
  it('renders key and index paths', () => {
    expect(formatLocation([])).toBe('$');
    expect(formatLocation(['a', 'b', 1])).toBe('a.b[1]');
    expect(formatLocation([0, 'x y', '$ref'])).toBe('[0]["x y"].$ref');
    expect(formatLocation(['1st'])).toBe('["1st"]');
  });
});

describe('scanAny', () => {
  it('reports the configured word, list and location', () => {
    const result = scanAny({ a: { b: ['clean', 'buy SPAM now'] } }, compiled);
    expect(result).toEqual({
      matched: true,
      reason: 'deny_word',
      word: 'spam',
      listName: 'profanity',
      priority: 10,
      locationHint: 'a.b[1]',
    });
  });

  it('returns the configured spelling of the word', () => {
    const result = scanAny('leaked project-codename', compiled);
    expect(result).toMatchObject({ word: 'Project-Codename', listName: 'internal', locationHint: '$' });
  });

  it('visits mapping values in key order and sequences by index', () => {
    expect(scanAny({ first: 'a scam', second: 'spam' }, compiled)).toMatchObject({ word: 'scam', locationHint: 'first' });
    expect(scanAny([['ok', 'spam'], 'scam'], compiled)).toMatchObject({ word: 'spam', locationHint: '[0][1]' });
  });

  it('does not scan mapping keys', () => {
    expect(scanAny({ spam: 'fine' }, compiled)).toEqual({ matched: false });
  });

  it('ignores numbers, booleans and null', () => {
    expect(scanAny([1, true, null, Number.NaN, Number.POSITIVE_INFINITY, { n: -0 }], compiled)).toEqual({ matched: false });
  });

  it('stops at the first matching string', () => {
    let reads = 0;
    const payload = {
      hit: 'spam',
      get later(): string {
        reads += 1;
        return 'scam';
      },
    };
    expect(scanAny(payload, compiled)).toMatchObject({ word: 'spam' });
    // the later value is read when pushed, but never matched
    expect(reads).toBe(1);
  });

  it('allows empty containers and strings', () => {
    expect(scanAny({ a: [], b: {}, c: '' }, compiled)).toEqual({ matched: false });
  });
});

describe('scan limits', () => {
  const nest = (levels: number): unknown => {
    let value: unknown = 'clean';
    for (let index = 0; index < levels; index += 1) {
      value = [value];
    }
    return value;
  };

  it('accepts values exactly at the depth limit', () => {
    expect(scanValue(nest(3), compiled, { maxDepth: 3 })).toEqual({ matched: false });
  });

  it('throws when nesting goes past the limit', () => {
    expect(() => scanValue(nest(4), compiled, { maxDepth: 3 })).toThrow(DepthExceededError);
    expect(() => scanValue(nest(4), compiled, { maxDepth: 3 })).toThrow(
      'Payload nesting exceeds maxDepth=3 at [0][0][0][0]',
    );
  });

  it('defaults to a depth limit of 32', () => {
    expect(scanValue(nest(32), compiled)).toEqual({ matched: false });
    expect(() => scanValue(nest(33), compiled)).toThrow(DepthExceededError);
  });

  it('handles deep payloads without recursion', () => {
    expect(scanValue(nest(50_000), compiled, { maxDepth: 60_000 })).toEqual({ matched: false });
  });

  it('counts UTF-8 bytes across string leaves', () => {
    expect(scanValue(['ab', 'cd'], compiled, { maxBytes: 4 })).toEqual({ matched: false });
    expect(() => scanValue(['ab', 'cd', 'é'], compiled, { maxBytes: 5 })).toThrow(SizeExceededError);
    expect(() => scanValue(['東'], compiled, { maxBytes: 2 })).toThrow(
      'Payload text exceeds maxBytes=2 (3 bytes) at [0]',
    );
  });

  it('returns a match found before the limits are reached', () => {
    expect(scanValue(['spam', nest(10)], compiled, { maxDepth: 3 })).toMatchObject({ word: 'spam' });
  });

  it('fails closed on a self-referencing sequence', () => {
    const looped: ScanInput[] = [];
    looped.push(looped);
    expect(check(looped, compiled)).toEqual({
      matched: true,
      reason: 'depth_exceeded',
      word: null,
      locationHint: '[0]'.repeat(33),
      detail: `Payload nesting exceeds maxDepth=32 at ${'[0]'.repeat(33)}`,
    });
  });

  it('fails closed on a self-referencing mapping before reaching later values', () => {
    const looped: { [key: string]: ScanInput } = {};
    looped.self = looped;
    looped.text = 'spam';
    expect(check(looped, compiled, { maxDepth: 2 })).toMatchObject({
      reason: 'depth_exceeded',
      locationHint: 'self.self.self',
    });
  });

  it('walks a container shared by many paths only once', () => {
    let shared: ScanInput = ['clean'];
    for (let level = 0; level < 30; level += 1) {
      shared = [shared, shared];
    }
    expect(scanValue(shared, compiled)).toEqual({ matched: false });
    expect(scanValue([shared, 'spam'], compiled)).toMatchObject({ word: 'spam', locationHint: '[1]' });
  });

  it('walks a shared container again when it is reached deeper', () => {
    const shared = ['clean'];
    expect(() => scanValue([shared, [[shared]]], compiled, { maxDepth: 3 })).toThrow(
      'Payload nesting exceeds maxDepth=3 at [1][0][0][0]',
    );
  });

  it('counts the strings of a shared container once', () => {
    const shared = ['abc'];
    expect(scanValue([shared, shared], compiled, { maxBytes: 3 })).toEqual({ matched: false });
  });
});

describe('malformed payloads', () => {
  it('rejects values outside the scannable shapes', () => {
    expect(() => scanValue({ when: new Date(0) }, compiled)).toThrow(PayloadTypeError);
    expect(() => scanValue({ when: new Date(0) }, compiled)).toThrow('Unsupported payload value of type Date at when');
    expect(() => scanValue([undefined], compiled)).toThrow('Unsupported payload value of type undefined at [0]');
    expect(() => scanValue(() => 'spam', compiled)).toThrow('Unsupported payload value of type function at $');
  });

  it('reports a PayloadTypeError as a TypeError', () => {
    let caught: unknown;
    try {
      scanValue(new Map(), compiled);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TypeError);
    expect(caught).toMatchObject({ code: 'invalid_payload', locationHint: '$', actualType: 'Map' });
  });

  it('accepts objects without a prototype', () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.text = 'a scam';
    expect(scanValue(bare, compiled)).toMatchObject({ word: 'scam', locationHint: 'text' });
  });
});

describe('matchString', () => {
  it('folds the text before matching', () => {
    expect(matchString('SCAM alert', compiled, 'messages[0]')).toMatchObject({ word: 'scam', locationHint: 'messages[0]' });
    expect(matchString('scampi', compiled)).toMatchObject({ word: 'scam' });
    expect(matchString('nothing here', compiled)).toEqual({ matched: false });
  });
});
