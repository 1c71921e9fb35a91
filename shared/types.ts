export const SOURCE_TYPES = ['wire-news', 'feed', 'filing', 'preprint'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const CATEGORIES = ['AI', 'finance', 'science', 'manufacturing', 'hobby', 'unknown'] as const;
export type Category = (typeof CATEGORIES)[number];

export const PROVIDER_IDS = ['gemini-pro', 'gemini-flash', 'gemini-flash-lite'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const DIFFICULTY_LEVELS = ['low', 'medium', 'high'] as const;
export type Difficulty = (typeof DIFFICULTY_LEVELS)[number];

export type SummaryLanguage = 'ja' | 'en';

export type StageName = 'normalize' | 'filter' | 'score' | 'dedup' | 'rank' | 'summarize';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export type UsageOutcome = 'success' | 'error' | 'timeout';

export interface UsageRecord {
  runId: string;
  articleId: string;
  providerId: ProviderId;
  task: 'summarize';
  tokenCount: number;
  latencyMs: number;
  outcome: UsageOutcome;
  ts: string;
}

export interface DigestMetrics {
  recordsReceived: number;
  normalizationFailures: number;
  validationFailures: number;
  filtered: number;
  rejectionReasons: Record<string, number>;
  duplicatesRemoved: number;
  ranked: number;
  summarized: number;
  servedFromCache: number;
  exhausted: number;
  elapsedMs: number;
}
