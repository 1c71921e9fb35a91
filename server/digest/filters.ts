import type { FilterSettings } from '../../shared/config';
import { bodyText, textLength } from './article';
import type { CanonicalArticle } from './types';

export type RejectionReason = 'title_too_short' | 'blocked_marker' | 'body_too_short' | 'too_old';

export interface FilterDecision {
  accept: boolean;
  reasons: RejectionReason[];
}

export interface FilterResult {
  accepted: CanonicalArticle[];
  rejected: Array<{ article: CanonicalArticle; reasons: RejectionReason[] }>;
}

const HOUR_MS = 60 * 60 * 1000;

/** Runs every check independently; the article passes only if none of them objects. */
export const evaluateArticle = (article: CanonicalArticle, options: FilterSettings, now: Date): FilterDecision => {
  const reasons: RejectionReason[] = [];

  if (textLength(article.title) < options.minTitleLength) {
    reasons.push('title_too_short');
  }

  const lowerTitle = article.title.toLowerCase();
  if (options.blockedMarkers.some((marker) => lowerTitle.includes(marker.toLowerCase()))) {
    reasons.push('blocked_marker');
  }

  if (textLength(bodyText(article)) < options.minBodyLength) {
    reasons.push('body_too_short');
  }

  const ageMs = now.getTime() - Date.parse(article.publishedAt);
  if (ageMs > options.maxAgeHours * HOUR_MS) {
    reasons.push('too_old');
  }

  return { accept: reasons.length === 0, reasons };
};

/** Order-preserving; rejected articles come back with their reasons rather than being mutated. */
export const filterArticles = (articles: CanonicalArticle[], options: FilterSettings, now: Date): FilterResult => {
  const accepted: CanonicalArticle[] = [];
  const rejected: FilterResult['rejected'] = [];
  for (const article of articles) {
    const decision = evaluateArticle(article, options, now);
    if (decision.accept) {
      accepted.push(article);
    } else {
      rejected.push({ article, reasons: decision.reasons });
    }
  }
  return { accepted, rejected };
};
