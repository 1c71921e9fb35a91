import type { SourceType } from '../../shared/types';

const DEFAULT_OFFSETS: Record<SourceType, string> = {
  'wire-news': 'Z',
  feed: 'Z',
  // Disclosure systems publish local (JST) wall-clock times.
  filing: '+09:00',
  preprint: 'Z',
};

export const defaultOffsetFor = (type: SourceType): string => DEFAULT_OFFSETS[type];

const OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const LOCAL_DATETIME_RE = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})(:\d{2}(?:\.\d+)?)?$/;

const toIso = (ms: number): string | null => (Number.isFinite(ms) ? new Date(ms).toISOString() : null);

/**
 * Parses the timestamp shapes sources emit (ISO 8601, RFC 2822, date-only, compact dates,
 * epoch seconds/milliseconds) into a UTC ISO string. Values without an offset are read in
 * `offset`. Returns null when nothing sensible can be parsed.
 */
export const parseSourceDate = (value: unknown, offset: string): string | null => {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    // Ten-digit values are seconds.
    return toIso(value < 1e12 ? value * 1000 : value);
  }
  if (value instanceof Date) {
    return toIso(value.getTime());
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  const compact = COMPACT_DATE_RE.exec(trimmed);
  if (compact) {
    return toIso(Date.parse(`${compact[1]}-${compact[2]}-${compact[3]}T00:00:00${offset}`));
  }

  const dateOnly = DATE_ONLY_RE.exec(trimmed);
  if (dateOnly) {
    return toIso(Date.parse(`${trimmed}T00:00:00${offset}`));
  }

  const local = LOCAL_DATETIME_RE.exec(trimmed);
  if (local && !OFFSET_RE.test(trimmed)) {
    return toIso(Date.parse(`${local[1]}T${local[2]}${local[3] ?? ':00'}${offset}`));
  }

  if (/^\d{10,13}$/.test(trimmed)) {
    return parseSourceDate(Number(trimmed), offset);
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : toIso(parsed);
};
