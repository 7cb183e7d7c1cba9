import { describe, it, expect } from 'vitest';
import { CompileError } from '../../src/common/errors';
import { BACKEND_KINDS } from '../../src/matchers';
import { compile, DEFAULT_MAX_PATTERNS, isNeverMatching, patternFor } from '../../src/compiler';
import { checkText } from '../../src/check';

function compileError(fn: () => unknown): CompileError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CompileError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a CompileError');
}

describe('compile', () => {
  it('ranks pattern ids by priority, then by listed order', () => {
    const compiled = compile([
      { name: 'low', priority: 1, words: ['alpha', 'beta'] },
      { name: 'high', priority: 5, words: ['gamma'] },
    ]);
    expect(compiled.patterns.map((entry) => [entry.id, entry.pattern, entry.listName])).toEqual([
      [0, 'gamma', 'high'],
      [1, 'alpha', 'low'],
      [2, 'beta', 'low'],
    ]);
    expect(compiled.listNames).toEqual(['low', 'high']);
  });

  it('keeps the first listed attribution for duplicate words', () => {
    const compiled = compile([
      { name: 'first', priority: 1, words: ['Spam'] },
      { name: 'second', priority: 9, words: ['SPAM', 'eggs'] },
    ]);
    expect(compiled.patterns).toHaveLength(2);
    expect(compiled.duplicateCount).toBe(1);
    const spam = compiled.patterns.find((entry) => entry.pattern === 'spam');
    expect(spam).toMatchObject({ word: 'Spam', listName: 'first', priority: 1, listIndex: 0, wordIndex: 0 });
  });

  it('trims words and warns about empty ones', () => {
    const compiled = compile([{ name: 'mixed', priority: 0, words: ['  ', '', ' bad  word '] }]);
    expect(compiled.patterns.map((entry) => entry.word)).toEqual(['bad  word']);
    expect(compiled.warningCount).toBe(2);
    expect(compiled.warnings.map((warning) => warning.message)).toEqual([
      'Skipped empty word #0 in list "mixed"',
      'Skipped empty word #1 in list "mixed"',
    ]);
  });

  it('refuses lists without usable words by default', () => {
    const error = compileError(() => compile([{ name: 'blank', priority: 0, words: ['   '] }]));
    expect(error.reason).toBe('no_patterns');
    expect(error.code).toBe('compile_error');
    expect(compileError(() => compile([])).reason).toBe('no_patterns');
  });

  it.each(BACKEND_KINDS)('builds a never-matching %s matcher under the never-match policy', (backend) => {
    const compiled = compile([{ name: 'blank', priority: 0, words: [''] }], backend, { emptyPolicy: 'never-match' });
    expect(isNeverMatching(compiled)).toBe(true);
    expect(compiled.matcher.patternCount).toBe(0);
    expect(checkText('anything at all', compiled)).toEqual({ matched: false });
  });

  it('enforces the pattern limit on distinct words', () => {
    const error = compileError(() => compile([{ name: 'many', priority: 0, words: ['a', 'b', 'c'] }], 'automaton', { maxPatterns: 2 }));
    expect(error.reason).toBe('too_many_patterns');
    expect(error.message).toBe('Deny lists exceed the limit of 2 patterns');

    const compiled = compile([{ name: 'dupes', priority: 0, words: ['a', 'A', 'b'] }], 'automaton', { maxPatterns: 2 });
    expect(compiled.patterns).toHaveLength(2);
    expect(DEFAULT_MAX_PATTERNS).toBe(100_000);
  });

  it('rejects malformed lists', () => {
    expect(
      compileError(() =>
        compile([
          { name: 'dup', priority: 0, words: ['a'] },
          { name: 'dup', priority: 0, words: ['b'] },
        ]),
      ).message,
    ).toBe('Deny list name "dup" is used more than once');
    expect(compileError(() => compile([{ name: 'frac', priority: 1.5, words: ['a'] }])).reason).toBe('invalid_list');
    expect(compileError(() => compile([{ name: ' ', priority: 0, words: ['a'] }])).message).toBe('Deny list #0 has no name');
  });

  it('produces frozen results', () => {
    const compiled = compile([{ name: 'list', priority: 0, words: ['spam'] }], 'compact-trie');
    expect(compiled.backend).toBe('compact-trie');
    expect(Object.isFrozen(compiled)).toBe(true);
    expect(Object.isFrozen(compiled.patterns)).toBe(true);
    expect(Object.isFrozen(compiled.patterns[0])).toBe(true);
  });

  it('resolves pattern ids and rejects unknown ones', () => {
    const compiled = compile([{ name: 'list', priority: 0, words: ['spam'] }]);
    expect(patternFor(compiled, 0).word).toBe('spam');
    expect(() => patternFor(compiled, 7)).toThrow('Pattern id 7 is not part of this matcher');
  });
});
