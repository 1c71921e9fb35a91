import type { UsageRecord } from './types';

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveNormalizedArticle: (articleId: string, data: unknown) => Promise<string>;
  saveRunArtifact: (runId: string, kind: string, data: unknown) => Promise<string>;
  appendUsageRecord: (runId: string, record: UsageRecord) => Promise<void>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveNormalizedArticle: async () => '',
  saveRunArtifact: async () => '',
  appendUsageRecord: async () => {},
});
