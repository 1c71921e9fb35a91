import type { ScoringSettings } from '../../shared/config';
import { assignScores, bodyText, textLength } from './article';
import { inferCategory, matchCategoryKeywords } from './keywords';
import type { CanonicalArticle } from './types';

export type ScoringOptions = Pick<
  ScoringSettings,
  'keywordPointsPerMatch' | 'maxKeywordPoints' | 'credibilityWeight' | 'defaultCredibility' | 'credibility'
>;

export interface ScoreBreakdown {
  keyword: number;
  recency: number;
  credibility: number;
  quality: number;
  total: number;
}

const HOUR_MS = 60 * 60 * 1000;

export const keywordPoints = (matchCount: number, options: ScoringOptions): number =>
  Math.min(options.keywordPointsPerMatch * Math.max(0, matchCount), options.maxKeywordPoints);

export const recencyPoints = (publishedAt: string, now: Date): number => {
  const ageHours = (now.getTime() - Date.parse(publishedAt)) / HOUR_MS;
  if (ageHours < 1) return 20;
  if (ageHours < 6) return 15;
  if (ageHours < 24) return 10;
  return 5;
};

export const credibilityFor = (sourceName: string, options: ScoringOptions): number =>
  options.credibility[sourceName] ?? options.defaultCredibility;

export const qualityPoints = (article: CanonicalArticle): number => {
  const titleTerm = Math.min(textLength(article.title) / 10, 10);
  const bodyTerm = Math.min(textLength(bodyText(article)) / 50, 10);
  return (titleTerm + bodyTerm) / 2;
};

/**
 * Relevance on 0-100 from keyword matches, recency, source credibility and length-based quality.
 * Deterministic for a given `now`.
 */
export const scoreBreakdown = (
  article: CanonicalArticle,
  matchedKeywords: readonly string[],
  options: ScoringOptions,
  now: Date,
): ScoreBreakdown => {
  const keyword = keywordPoints(matchedKeywords.length, options);
  const recency = recencyPoints(article.publishedAt, now);
  const credibility = credibilityFor(article.sourceName, options) * options.credibilityWeight;
  const quality = qualityPoints(article);
  const total = Math.max(0, Math.min(100, Math.trunc(keyword + recency + credibility + quality)));
  return { keyword, recency, credibility, quality, total };
};

export const score = (
  article: CanonicalArticle,
  matchedKeywords: readonly string[],
  options: ScoringOptions,
  now: Date,
): number => scoreBreakdown(article, matchedKeywords, options, now).total;

/**
 * Matches keywords, optionally infers a category for `unknown` articles, and writes
 * keywords, relevance and credibility onto each article in place.
 */
export const scoreArticles = (articles: CanonicalArticle[], settings: ScoringSettings, now: Date): CanonicalArticle[] => {
  for (const article of articles) {
    if (settings.inferCategory && article.category === 'unknown') {
      article.category = inferCategory(article, settings.keywords);
    }
    const matched = matchCategoryKeywords(article, settings.keywords);
    article.keywords = matched;
    assignScores(article, {
      relevanceScore: score(article, matched, settings, now),
      credibilityScore: credibilityFor(article.sourceName, settings),
    });
  }
  return articles;
};
