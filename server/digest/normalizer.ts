import type { Category, SourceType, SummaryLanguage } from '../../shared/types';
import { articleIdFor } from '../../shared/crypto';
import { createCanonicalArticle } from './article';
import { defaultOffsetFor, parseSourceDate } from './dates';
import { NormalizationError, ValidationError } from './errors';
import type { CanonicalArticle, RawRecord, SourceDescriptor } from './types';

// Feeds with skewed clocks may stamp items slightly ahead of us.
const FUTURE_SKEW_TOLERANCE_MS = 60 * 60 * 1000;

const IMPLIED_CATEGORIES: Partial<Record<SourceType, Category>> = {
  filing: 'finance',
  preprint: 'science',
};

interface FieldMap {
  title: string[];
  url: string[];
  publishedAt: string[];
  description: string[];
  content: string[];
  image: string[];
}

const FIELD_MAPS: Record<SourceType, FieldMap> = {
  'wire-news': {
    title: ['title'],
    url: ['url'],
    publishedAt: ['publishedAt'],
    description: ['description'],
    content: ['content'],
    image: ['urlToImage'],
  },
  feed: {
    title: ['title'],
    url: ['link', 'url'],
    publishedAt: ['isoDate', 'pubDate', 'updated', 'published'],
    description: ['contentSnippet', 'summary', 'description'],
    content: ['content', 'content:encoded'],
    image: ['image', 'enclosureUrl'],
  },
  filing: {
    title: ['docDescription', 'title'],
    url: ['docUrl', 'url'],
    publishedAt: ['submitDateTime', 'filedAt'],
    description: ['summary', 'description'],
    content: ['content'],
    image: [],
  },
  preprint: {
    title: ['title'],
    url: ['link', 'url', 'id'],
    publishedAt: ['published', 'updated'],
    description: ['summary', 'abstract'],
    content: ['content'],
    image: [],
  },
};

const readString = (record: RawRecord, keys: string[]): string | null => {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) {
      return value.replace(/\s+/g, ' ').trim();
    }
  }
  return null;
};

const readRaw = (record: RawRecord, keys: string[]): unknown => {
  for (const key of keys) {
    const value = record[key];
    if (value != null && value !== '') return value;
  }
  return undefined;
};

const nestedName = (value: unknown): string | null => {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'object' && value !== null && 'name' in value) {
    const name: unknown = value.name;
    if (typeof name === 'string' && name.trim()) return name.trim();
  }
  return null;
};

const readAuthors = (record: RawRecord): string[] | undefined => {
  const raw = record.authors ?? record.author ?? record.creator;
  const list = Array.isArray(raw) ? raw : raw == null ? [] : [raw];
  const names = list.map(nestedName).filter((name): name is string => name !== null);
  return names.length ? names : undefined;
};

// CJK punctuation, kana and unified ideographs.
const JAPANESE_SCRIPT_RE = /[\u3000-\u9fff]/;

export const detectLanguage = (text: string): SummaryLanguage => (JAPANESE_SCRIPT_RE.test(text) ? 'ja' : 'en');

const resolveSourceName = (record: RawRecord, source: SourceDescriptor): string | null => {
  if (source.type === 'wire-news') {
    const outlet = nestedName(record.source);
    if (outlet) return outlet;
  }
  return source.name.trim() || null;
};

const resolveCategory = (source: SourceDescriptor): Category =>
  source.category ?? IMPLIED_CATEGORIES[source.type] ?? 'unknown';

/**
 * Converts one source-specific record into a canonical article. Pure: the caller supplies the
 * fetch time. Throws NormalizationError for missing required fields and ValidationError when the
 * result would break an article invariant.
 */
export const normalize = (record: RawRecord, source: SourceDescriptor, fetchedAt: Date): CanonicalArticle => {
  const fields = FIELD_MAPS[source.type];

  const title = readString(record, fields.title);
  if (!title) throw new NormalizationError('title', source.name);
  const sourceUrl = readString(record, fields.url);
  if (!sourceUrl) throw new NormalizationError('url', source.name);
  const sourceName = resolveSourceName(record, source);
  if (!sourceName) throw new NormalizationError('sourceName', source.name);

  const fetchedIso = fetchedAt.toISOString();
  const offset = source.defaultOffset ?? defaultOffsetFor(source.type);
  let publishedAt = parseSourceDate(readRaw(record, fields.publishedAt), offset) ?? fetchedIso;
  const aheadMs = Date.parse(publishedAt) - fetchedAt.getTime();
  if (aheadMs > FUTURE_SKEW_TOLERANCE_MS) {
    throw new ValidationError([`publishedAt: ${publishedAt} is ahead of fetch time ${fetchedIso}`]);
  }
  if (aheadMs > 0) {
    publishedAt = fetchedIso;
  }

  let description = readString(record, fields.description);
  if (source.type === 'filing') {
    const filer = readString(record, ['filerName']);
    if (filer) description = description ? `${filer}: ${description}` : filer;
  }
  const content = readString(record, fields.content);

  return createCanonicalArticle(
    {
      id: articleIdFor(title, sourceName),
      title,
      sourceUrl,
      sourceName,
      sourceType: source.type,
      category: resolveCategory(source),
      publishedAt,
      fetchedAt: fetchedIso,
      language: detectLanguage(`${title} ${description ?? ''}`),
      description,
      content,
      imageUrl: readString(record, fields.image),
      authors: readAuthors(record),
      rawPayload: record,
    },
    fetchedAt,
  );
};
