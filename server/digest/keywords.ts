import type { ScoringSettings } from '../../shared/config';
import { CATEGORIES, type Category } from '../../shared/types';
import type { CanonicalArticle } from './types';

const searchableText = (article: CanonicalArticle): string =>
  [article.title, article.description, article.content].filter(Boolean).join('\n').toLowerCase();

const termsFor = (keywords: ScoringSettings['keywords'], category: Category): string[] => {
  if (category !== 'unknown') {
    return keywords[category] ?? [];
  }
  return Array.from(new Set(CATEGORIES.flatMap((c) => keywords[c] ?? [])));
};

const CJK = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** CJK terms match as substrings; other terms only as whole words. */
export const containsTerm = (text: string, term: string): boolean => {
  if (CJK.test(term)) return text.includes(term);
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`, 'u').test(text);
};

/** Distinct configured terms found in the article (case-insensitive), in list order. */
export const matchKeywords = (article: CanonicalArticle, terms: readonly string[]): string[] => {
  const text = searchableText(article);
  const seen = new Set<string>();
  const matched: string[] = [];
  for (const term of terms) {
    const key = term.toLowerCase();
    if (key && !seen.has(key) && containsTerm(text, key)) {
      seen.add(key);
      matched.push(term);
    }
  }
  return matched;
};

export const matchCategoryKeywords = (article: CanonicalArticle, keywords: ScoringSettings['keywords']): string[] =>
  matchKeywords(article, termsFor(keywords, article.category));

/**
 * Picks the category whose list matches the most terms. Ties, or no matches at all, stay `unknown`.
 */
export const inferCategory = (article: CanonicalArticle, keywords: ScoringSettings['keywords']): Category => {
  let best: Category = 'unknown';
  let bestCount = 0;
  let tied = false;
  for (const category of CATEGORIES) {
    if (category === 'unknown') continue;
    const count = matchKeywords(article, keywords[category] ?? []).length;
    if (count > bestCount) {
      best = category;
      bestCount = count;
      tied = false;
    } else if (count > 0 && count === bestCount) {
      tied = true;
    }
  }
  return tied ? 'unknown' : best;
};
