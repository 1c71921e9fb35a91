import type { CanonicalArticle } from './types';

export interface DeduplicationResult {
  unique: CanonicalArticle[];
  duplicates: {
    article: CanonicalArticle;
    duplicateOf: string;
    key: string;
  }[];
}

/** Lower-cases and collapses every digit run to `0`, so "up 20%" and "up 35%" share a key. */
export const titleKey = (title: string): string =>
  title.toLowerCase().replace(/\d+/g, '0').replace(/\s+/g, ' ').trim();

const beats = (candidate: CanonicalArticle, current: CanonicalArticle): boolean => {
  const a = candidate.relevanceScore ?? 0;
  const b = current.relevanceScore ?? 0;
  if (a !== b) return a > b;
  return Date.parse(candidate.publishedAt) < Date.parse(current.publishedAt);
};

/**
 * Single pass keeping the best article per title key: highest relevance, then earliest
 * publication; full ties keep the first seen. Survivors keep the position their story first
 * appeared at, and carry `isDuplicate` when they absorbed at least one other article.
 */
export const deduplicateArticles = (articles: CanonicalArticle[]): DeduplicationResult => {
  const groups = new Map<string, { best: CanonicalArticle; members: CanonicalArticle[] }>();

  for (const article of articles) {
    const key = titleKey(article.title);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { best: article, members: [article] });
      continue;
    }
    group.members.push(article);
    if (beats(article, group.best)) {
      group.best = article;
    }
  }

  const unique: CanonicalArticle[] = [];
  const duplicates: DeduplicationResult['duplicates'] = [];
  for (const [key, group] of groups) {
    if (group.members.length > 1) {
      group.best.isDuplicate = true;
    }
    unique.push(group.best);
    for (const member of group.members) {
      if (member !== group.best) {
        duplicates.push({ article: member, duplicateOf: group.best.id, key });
      }
    }
  }

  return { unique, duplicates };
};
