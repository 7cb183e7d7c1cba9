import { describe, it, expect } from 'vitest';
import { CASE_FOLDING_RULE, foldCase } from '../../src/common/casefold';
import { compile } from '../../src/compiler';
import { checkText } from '../../src/check';

describe('foldCase', () => {
  it('lowercases ASCII and accented letters', () => {
    expect(foldCase('SPAM')).toBe('spam');
    expect(foldCase('CAFÉ')).toBe('café');
    expect(foldCase('ÜBER Naïve')).toBe('über naïve');
  });

  it('keeps sharp s as a single code point', () => {
    expect(foldCase('ß')).toBe('ß');
    expect(foldCase('STRASSE')).toBe('strasse');
  });

  it('folds capital sigma the same way wherever it sits in a word', () => {
    expect(foldCase('ΜΑΛΑΚΑΣ')).toBe('μαλακασ');
    expect(foldCase('ΜΑΛΑΚΑΣx')).toBe('μαλακασx');
    expect(foldCase('ΣΟΦΟΣ')).toBe('σοφοσ');
  });

  it('treats final and medial small sigma as one letter', () => {
    expect(foldCase('σοφος')).toBe('σοφοσ');
    expect(foldCase('ς')).toBe('σ');
  });

  it('names the rule it applies', () => {
    expect(CASE_FOLDING_RULE).toBe('unicode-default-lowercase');
  });
});

describe('case-insensitive matching', () => {
  it('matches configured words regardless of input case', () => {
    const compiled = compile([{ name: 'cafes', priority: 0, words: ['Café'] }]);
    const outcome = checkText('Meet me at the CAFÉ', compiled);
    expect(outcome).toEqual({
      matched: true,
      reason: 'deny_word',
      word: 'Café',
      listName: 'cafes',
      priority: 0,
      locationHint: '$',
    });
  });

  it('matches Greek words whatever form of sigma the text uses', () => {
    const compiled = compile([{ name: 'greek', priority: 0, words: ['ΜΑΛΑΚΑΣ'] }]);
    expect(compiled.patterns.map((entry) => entry.pattern)).toEqual(['μαλακασ']);
    expect(checkText('ΜΑΛΑΚΑΣx', compiled)).toMatchObject({ matched: true, word: 'ΜΑΛΑΚΑΣ' });
    expect(checkText('μαλακας', compiled).matched).toBe(true);
    expect(checkText('μαλακασ', compiled).matched).toBe(true);
    expect(checkText('μαλακα', compiled).matched).toBe(false);
  });

  it('matches a word written with final sigma inside longer text', () => {
    const compiled = compile([{ name: 'greek', priority: 0, words: ['σοφος'] }]);
    expect(checkText('ΣΟΦΟΣΤΕΡΟΣ', compiled).matched).toBe(true);
  });

  it('does not treat ß and SS as the same word', () => {
    const compiled = compile([{ name: 'streets', priority: 0, words: ['straße'] }]);
    expect(checkText('STRASSE', compiled).matched).toBe(false);
    expect(checkText('Straße', compiled).matched).toBe(true);
  });
});
