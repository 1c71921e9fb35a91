import type { RoutingSettings } from '../../shared/config';
import type { Difficulty } from '../../shared/types';

export type DifficultySettings = RoutingSettings['difficulty'];

const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/gu;
const CJK_CHARS_PER_WORD = 2;

/** Whitespace-separated words plus CJK characters weighted as words; punctuation-only tokens are ignored. */
const wordCount = (text: string): number => {
  const cjkChars = text.match(CJK_CHAR)?.length ?? 0;
  const spaced = text
    .replace(CJK_CHAR, ' ')
    .split(/\s+/)
    .filter((token) => /[\p{L}\p{N}]/u.test(token)).length;
  return spaced + cjkChars / CJK_CHARS_PER_WORD;
};

const countOccurrences = (haystack: string, needle: string): number => {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
};

/** Technical-term hits per 100 words. */
export const technicalDensity = (text: string, terms: readonly string[]): number => {
  const lower = text.toLowerCase();
  const hits = terms.reduce((sum, term) => sum + countOccurrences(lower, term.toLowerCase()), 0);
  return (hits / Math.max(1, wordCount(text))) * 100;
};

export const classifyDifficulty = (text: string, settings: Pick<DifficultySettings, 'technicalTerms' | 'mediumDensity' | 'highDensity'>): Difficulty => {
  const density = technicalDensity(text, settings.technicalTerms);
  if (density >= settings.highDensity) return 'high';
  if (density >= settings.mediumDensity) return 'medium';
  return 'low';
};
