import { CATEGORIES, type Category } from '../../shared/types';
import type { CanonicalArticle, RankedDigest } from './types';

/** Score first, then newest first. Equal pairs keep input order (Array#sort is stable). */
export const compareArticles = (a: CanonicalArticle, b: CanonicalArticle): number =>
  (b.relevanceScore ?? 0) - (a.relevanceScore ?? 0) || Date.parse(b.publishedAt) - Date.parse(a.publishedAt);

export const rankArticles = (articles: CanonicalArticle[]): RankedDigest => {
  const partitions = new Map<Category, CanonicalArticle[]>();
  for (const article of articles) {
    const bucket = partitions.get(article.category);
    if (bucket) {
      bucket.push(article);
    } else {
      partitions.set(article.category, [article]);
    }
  }

  const ranked: RankedDigest = {};
  for (const category of CATEGORIES) {
    const bucket = partitions.get(category);
    if (bucket) {
      ranked[category] = [...bucket].sort(compareArticles);
    }
  }
  return ranked;
};

/** Ranked articles in category order, for stages that work over the whole digest. */
export const flattenDigest = (digest: RankedDigest): CanonicalArticle[] =>
  CATEGORIES.flatMap((category) => digest[category] ?? []);
