/**
 * Case folding shared by the compiler and the scanner.
 *
 * Uses the Unicode default lowercase mapping of `String.prototype.toLowerCase`,
 * which does not depend on the host locale, and then maps final sigma `ς` to
 * `σ`. `toLowerCase` picks `ς` or `σ` for `Σ` from the surrounding letters, so
 * without that step a word and the same word inside longer text could fold
 * differently. `ß` stays `ß`; compatibility forms are not normalized.
 */
export function foldCase(text: string): string {
  return text.toLowerCase().replace(/ς/g, 'σ');
}

export const CASE_FOLDING_RULE = 'unicode-default-lowercase';
