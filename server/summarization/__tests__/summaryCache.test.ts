import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFsSummaryCache, createMemorySummaryCache } from '../summaryCache';

const entry = {
  articleId: 'article-1',
  summary: 'First summary.',
  providerId: 'gemini-flash' as const,
  cachedAt: '2026-03-10T12:00:00.000Z',
};

describe('createMemorySummaryCache', () => {
  it('returns the most recent entry per article', async () => {
    const cache = createMemorySummaryCache([entry]);
    expect(await cache.get('article-1')).toEqual(entry);
    await cache.put({ ...entry, summary: 'Second summary.' });
    expect((await cache.get('article-1'))?.summary).toBe('Second summary.');
    expect(await cache.get('missing')).toBeNull();
  });
});

describe('createFsSummaryCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'summary-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('round-trips entries through one file per article', async () => {
    const cache = createFsSummaryCache(path.join(dir, 'summaries'));
    await cache.put(entry);
    expect(await cache.get('article-1')).toEqual(entry);
    expect(await fs.readdir(path.join(dir, 'summaries'))).toEqual(['article-1.json']);
  });

  it('returns null for absent or malformed entries', async () => {
    const cache = createFsSummaryCache(dir);
    expect(await cache.get('article-2')).toBeNull();
    await fs.writeFile(path.join(dir, 'article-3.json'), JSON.stringify({ ...entry, articleId: 'article-3', providerId: 'other' }));
    expect(await cache.get('article-3')).toBeNull();
  });
});
