import type { ProviderId, SummaryLanguage } from '../../shared/types';

export interface SummarizeRequest {
  /** Cap on generated length, passed to the provider as its output-token limit. */
  maxOutputLength: number;
  language: SummaryLanguage;
  signal: AbortSignal;
}

export interface SummarizeResult {
  text: string;
  tokenCount: number;
}

/**
 * Capability every summarization provider exposes. Implementations throw ProviderError on
 * failure and must honour `request.signal`.
 */
export interface SummarizationProvider {
  readonly id: ProviderId;
  readonly timeoutMs: number;
  summarize(text: string, request: SummarizeRequest): Promise<SummarizeResult>;
}

export type ProviderRegistry = ReadonlyMap<ProviderId, SummarizationProvider>;
