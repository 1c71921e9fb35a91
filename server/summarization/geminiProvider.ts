import { GoogleGenAI } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { PROVIDER_IDS, type ProviderId } from '../../shared/types';
import { buildSummaryPrompt } from '../prompts/loader';
import { raceAbort } from '../utils/async';
import { RequestRateGate } from '../utils/rateGate';
import { ProviderError } from './errors';
import type { ProviderRegistry, SummarizationProvider, SummarizeRequest, SummarizeResult } from './types';

export interface GenerateContentRequest {
  model: string;
  contents: string;
  config: {
    temperature: number;
    maxOutputTokens: number;
    abortSignal?: AbortSignal;
  };
}

export interface GenerateContentReply {
  text?: string | undefined;
  usageMetadata?: { totalTokenCount?: number };
}

/** The slice of `GoogleGenAI['models']` the provider calls. */
export interface GenerateContentClient {
  generateContent(params: GenerateContentRequest): Promise<GenerateContentReply>;
}

const statusOf = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return null;
};

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Maps an SDK or transport failure onto the provider error kinds. */
export const toProviderError = (error: unknown, providerId: ProviderId): ProviderError => {
  if (error instanceof ProviderError) return error;
  const status = statusOf(error);
  const message = messageOf(error);
  if (status === 429 || /quota|rate.?limit|resource.?exhausted/i.test(message)) {
    return new ProviderError('rate-limited', providerId, message, { status, cause: error });
  }
  if (status === 408 || status === 504 || /abort|timed? ?out|deadline/i.test(message)) {
    return new ProviderError('timeout', providerId, message, { status, cause: error });
  }
  return new ProviderError('transport', providerId, message, { status, cause: error });
};

export interface GeminiProviderOptions {
  id: ProviderId;
  model: string;
  timeoutMs: number;
  temperature: number;
  client: GenerateContentClient;
  rateGate?: RequestRateGate;
}

export class GeminiSummarizationProvider implements SummarizationProvider {
  readonly id: ProviderId;
  readonly timeoutMs: number;

  constructor(private readonly options: GeminiProviderOptions) {
    this.id = options.id;
    this.timeoutMs = options.timeoutMs;
  }

  async summarize(text: string, request: SummarizeRequest): Promise<SummarizeResult> {
    let reply: GenerateContentReply;
    try {
      await this.options.rateGate?.reserve(request.signal);
      reply = await raceAbort(
        this.options.client.generateContent({
          model: this.options.model,
          contents: buildSummaryPrompt(text, request.language),
          config: {
            temperature: this.options.temperature,
            maxOutputTokens: request.maxOutputLength,
            abortSignal: request.signal,
          },
        }),
        request.signal,
      );
    } catch (error) {
      throw toProviderError(error, this.id);
    }

    const summary = typeof reply.text === 'string' ? reply.text.trim() : '';
    if (!summary) {
      throw new ProviderError('invalid-response', this.id, `Empty response from ${this.options.model}`);
    }
    return { text: summary, tokenCount: reply.usageMetadata?.totalTokenCount ?? 0 };
  }
}

/** Builds the SDK client on first use so a missing key surfaces as a failed attempt, not a crash at start-up. */
export const createGenAiClient = (apiKey: string): GenerateContentClient => {
  let ai: GoogleGenAI | null = null;
  return {
    generateContent: async (params) => {
      if (!apiKey) {
        throw new Error('GEMINI_API_KEY missing');
      }
      ai ??= new GoogleGenAI({ apiKey });
      return await ai.models.generateContent(params);
    },
  };
};

/** One provider per configured Gemini tier, sharing a client and the per-key rate gate. */
export const createProviderRegistry = (
  config: AppConfig,
  client: GenerateContentClient = createGenAiClient(config.llm.apiKey),
): ProviderRegistry => {
  const rateGate = new RequestRateGate(config.llm.requestsPerMinute);
  const registry = new Map<ProviderId, SummarizationProvider>();
  for (const id of PROVIDER_IDS) {
    const settings = config.llm.providers[id];
    registry.set(
      id,
      new GeminiSummarizationProvider({
        id,
        model: settings.model,
        timeoutMs: settings.timeoutMs,
        temperature: config.llm.temperature,
        client,
        rateGate,
      }),
    );
  }
  return registry;
};
