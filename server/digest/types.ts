import type { Category, ProviderId, SourceType, SummaryLanguage } from '../../shared/types';

export type RawRecord = Readonly<Record<string, unknown>>;

export interface SourceDescriptor {
  name: string;
  type: SourceType;
  /** Fixes the category for every record from this source. */
  category?: Category;
  /** Offset applied to timestamps that carry none, e.g. `+09:00`. */
  defaultOffset?: string;
}

export interface SourceBatch {
  source: SourceDescriptor;
  records: RawRecord[];
}

export interface CanonicalArticle {
  id: string;
  title: string;
  sourceUrl: string;
  sourceName: string;
  sourceType: SourceType;
  category: Category;
  publishedAt: string;
  fetchedAt: string;
  language: SummaryLanguage;
  description?: string | null;
  content?: string | null;
  imageUrl?: string | null;
  authors?: string[];
  summary?: string | null;
  summaryProvider?: ProviderId | null;
  keywords?: string[];
  relevanceScore?: number;
  credibilityScore?: number;
  readonly rawPayload: RawRecord;
  isDuplicate: boolean;
  isCached: boolean;
  /** Set when routing ended without any summary; the next run should try again. */
  needsRetry?: boolean;
}

/** Category → articles, best first. Only categories with articles appear. */
export type RankedDigest = Partial<Record<Category, CanonicalArticle[]>>;
