import fs from 'node:fs/promises';
import path from 'node:path';
import { PROVIDER_IDS, type ProviderId } from '../../shared/types';
import { sanitizeSegment } from '../persistence/fsStore';

export interface CachedSummary {
  articleId: string;
  summary: string;
  providerId: ProviderId;
  cachedAt: string;
}

/** Last good summary per article id; consulted when every provider fails. */
export interface SummaryCache {
  get: (articleId: string) => Promise<CachedSummary | null>;
  put: (entry: CachedSummary) => Promise<void>;
}

export const createMemorySummaryCache = (seed: CachedSummary[] = []): SummaryCache => {
  const entries = new Map<string, CachedSummary>(seed.map((entry) => [entry.articleId, entry]));
  return {
    get: async (articleId) => entries.get(articleId) ?? null,
    put: async (entry) => {
      entries.set(entry.articleId, entry);
    },
  };
};


const isCachedSummary = (value: unknown): value is CachedSummary =>
  typeof value === 'object' &&
  value !== null &&
  'articleId' in value &&
  typeof value.articleId === 'string' &&
  'summary' in value &&
  typeof value.summary === 'string' &&
  'providerId' in value &&
  PROVIDER_IDS.some((id) => id === value.providerId) &&
  'cachedAt' in value &&
  typeof value.cachedAt === 'string';

/** One JSON file per article under `dir`; a newer write replaces the older one. */
export const createFsSummaryCache = (dir: string): SummaryCache => {
  const fileFor = (articleId: string) => path.join(dir, `${sanitizeSegment(articleId)}.json`);

  return {
    get: async (articleId) => {
      let text: string;
      try {
        text = await fs.readFile(fileFor(articleId), 'utf-8');
      } catch (error) {
        if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
      }
      const parsed: unknown = JSON.parse(text);
      return isCachedSummary(parsed) && parsed.articleId === articleId ? parsed : null;
    },
    put: async (entry) => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(fileFor(entry.articleId), JSON.stringify(entry, null, 2), 'utf-8');
    },
  };
};
