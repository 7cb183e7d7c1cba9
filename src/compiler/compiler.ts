import { foldCase } from '../common/casefold';
import { CompileError } from '../common/errors';
import { getLogger } from '../common/logger';
import { createMatcher } from '../matchers';
import {
  BackendKind,
  CompiledMatcher,
  CompileOptions,
  CompileWarning,
  DenyWordList,
  PatternEntry,
} from './types';

export const DEFAULT_MAX_PATTERNS = 100_000;

type UnrankedEntry = Omit<PatternEntry, 'id'>;

function validateLists(lists: readonly DenyWordList[]): void {
  const names = new Set<string>();
  lists.forEach((list, index) => {
    if (typeof list.name !== 'string' || list.name.trim().length === 0) {
      throw new CompileError('invalid_list', `Deny list #${index} has no name`);
    }
    if (names.has(list.name)) {
      throw new CompileError('invalid_list', `Deny list name "${list.name}" is used more than once`);
    }
    names.add(list.name);
    if (!Number.isInteger(list.priority)) {
      throw new CompileError('invalid_list', `Deny list "${list.name}" has a non-integer priority`);
    }
    if (!Array.isArray(list.words)) {
      throw new CompileError('invalid_list', `Deny list "${list.name}" must define a words array`);
    }
  });
}

/**
 * Higher priority first, then the order in which the words were listed. The
 * resulting position is the pattern id backends use as their last tie-break.
 */
function rankEntries(entries: UnrankedEntry[]): PatternEntry[] {
  return entries
    .map((entry, order) => ({ entry, order }))
    .sort((left, right) => right.entry.priority - left.entry.priority || left.order - right.order)
    .map(({ entry }, id) => Object.freeze({ ...entry, id }));
}

export function compile(
  lists: readonly DenyWordList[],
  backend: BackendKind = 'automaton',
  options: CompileOptions = {},
): CompiledMatcher {
  const log = getLogger('compiler');
  const maxPatterns = options.maxPatterns ?? DEFAULT_MAX_PATTERNS;
  const emptyPolicy = options.emptyPolicy ?? 'error';

  validateLists(lists);

  const seen = new Set<string>();
  const entries: UnrankedEntry[] = [];
  const warnings: CompileWarning[] = [];
  let duplicateCount = 0;

  lists.forEach((list, listIndex) => {
    list.words.forEach((raw, wordIndex) => {
      const word = typeof raw === 'string' ? raw.trim() : '';
      if (word.length === 0) {
        warnings.push({
          listName: list.name,
          wordIndex,
          message: `Skipped empty word #${wordIndex} in list "${list.name}"`,
        });
        return;
      }
      const pattern = foldCase(word);
      if (seen.has(pattern)) {
        duplicateCount += 1;
        return;
      }
      if (entries.length >= maxPatterns) {
        throw new CompileError(
          'too_many_patterns',
          `Deny lists exceed the limit of ${maxPatterns} patterns`,
        );
      }
      seen.add(pattern);
      entries.push({
        pattern,
        word,
        listName: list.name,
        priority: list.priority,
        listIndex,
        wordIndex,
      });
    });
  });

  if (entries.length === 0 && emptyPolicy === 'error') {
    throw new CompileError('no_patterns', 'Deny lists contain no usable words');
  }

  const patterns = rankEntries(entries);
  const matcher = createMatcher(
    backend,
    patterns.map((entry) => entry.pattern),
  );

  if (warnings.length > 0) {
    log.warn(`Skipped ${warnings.length} empty deny words`, { lists: [...new Set(warnings.map((w) => w.listName))] });
  }
  log.debug('Compiled deny lists', {
    backend,
    patterns: patterns.length,
    duplicates: duplicateCount,
    lists: lists.length,
  });

  return Object.freeze({
    backend,
    matcher,
    patterns: Object.freeze(patterns),
    warnings: Object.freeze(warnings),
    warningCount: warnings.length,
    duplicateCount,
    listNames: Object.freeze(lists.map((list) => list.name)),
  });
}

/** Word, list and priority behind a backend pattern id. */
export function patternFor(compiled: CompiledMatcher, patternId: number): PatternEntry {
  const entry = compiled.patterns[patternId];
  if (!entry) {
    throw new Error(`Pattern id ${patternId} is not part of this matcher`);
  }
  return entry;
}

export function isNeverMatching(compiled: CompiledMatcher): boolean {
  return compiled.patterns.length === 0;
}
