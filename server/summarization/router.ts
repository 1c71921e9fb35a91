import type { RoutingSettings } from '../../shared/config';
import type { Difficulty, ProviderId, SummaryLanguage, UsageOutcome } from '../../shared/types';
import type { CanonicalArticle } from '../digest/types';
import type { Logger } from '../obs/logger';
import type { UsageLog } from '../obs/usageLog';
import { linkAbort, raceAbort } from '../utils/async';
import { Semaphore } from '../utils/concurrency';
import { classifyDifficulty } from './difficulty';
import { ProviderError, RouterExhaustedError, asProviderError, type ProviderErrorKind } from './errors';
import type { SummaryCache } from './summaryCache';
import type { ProviderRegistry } from './types';

export type RoutingState = 'pending' | 'awaiting-provider' | 'summarized' | 'exhausted';

export interface AttemptRecord {
  providerId: ProviderId;
  outcome: UsageOutcome;
  latencyMs: number;
  errorKind?: ProviderErrorKind;
  message?: string;
}

export interface RoutingOutcome {
  articleId: string;
  state: Extract<RoutingState, 'summarized' | 'exhausted'>;
  providers: ProviderId[];
  difficulty: Difficulty | null;
  providerId: ProviderId | null;
  summary: string | null;
  fromCache: boolean;
  cancelled: boolean;
  /** Nothing usable came back; the article should be retried by hand or on the next run. */
  needsRetry: boolean;
  attempts: AttemptRecord[];
}

export interface RouterOptions {
  routing: RoutingSettings;
  language: SummaryLanguage;
  maxOutputLength: number;
  concurrency: number;
}

export interface RouterDeps {
  runId: string;
  providers: ProviderRegistry;
  cache: SummaryCache;
  usageLog: UsageLog;
  logger: Logger;
}

const SOURCE_LABELS: Record<SummaryLanguage, { title: string; description: string; body: string }> = {
  ja: { title: 'タイトル', description: '概要', body: '本文' },
  en: { title: 'Title', description: 'Description', body: 'Body' },
};

/** Text handed to providers: title, then description and body when present. */
export const buildSourceText = (article: CanonicalArticle, language: SummaryLanguage): string => {
  const labels = SOURCE_LABELS[language];
  const parts = [`${labels.title}: ${article.title}`];
  if (article.description) parts.push(`${labels.description}: ${article.description}`);
  if (article.content) parts.push(`${labels.body}: ${article.content}`);
  return parts.join('\n\n');
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Picks an ordered provider list per article and walks it one provider at a time until one
 * returns a summary. Articles are processed in parallel up to `concurrency`.
 */
export class SummarizationRouter {
  private readonly slots: Semaphore;

  constructor(
    private readonly options: RouterOptions,
    private readonly deps: RouterDeps,
  ) {
    this.slots = new Semaphore(Math.max(1, options.concurrency));
  }

  /** Worker slots currently held by in-flight articles. */
  get activeSlots(): number {
    return this.slots.inUse;
  }

  /**
   * Category rule for "summarize", else the default list. With difficulty routing enabled a
   * non-empty tier list for the article's difficulty takes precedence.
   */
  selectProviders(article: CanonicalArticle): { providers: ProviderId[]; difficulty: Difficulty | null } {
    const { routing } = this.options;
    if (routing.difficulty.enabled) {
      const difficulty = classifyDifficulty(buildSourceText(article, 'en'), routing.difficulty);
      const tier = routing.difficulty.tiers[difficulty];
      if (tier && tier.length) {
        return { providers: [...tier], difficulty };
      }
      return { providers: this.categoryProviders(article), difficulty };
    }
    return { providers: this.categoryProviders(article), difficulty: null };
  }

  private categoryProviders(article: CanonicalArticle): ProviderId[] {
    const rule = this.options.routing.rules.find(
      (candidate) => candidate.category === article.category && candidate.task === 'summarize',
    );
    return [...(rule?.providers ?? this.options.routing.defaultProviders)];
  }

  async route(article: CanonicalArticle, signal?: AbortSignal): Promise<RoutingOutcome> {
    const { logger, providers: registry, usageLog, runId } = this.deps;
    let state: RoutingState = 'pending';
    const { providers, difficulty } = this.selectProviders(article);
    const text = buildSourceText(article, this.options.language);
    const attempts: AttemptRecord[] = [];
    const failures: ProviderError[] = [];
    let cancelled = false;

    state = 'awaiting-provider';
    logger.debug('Routing article', { runId, articleId: article.id, state, providers, difficulty });

    for (const providerId of providers) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const provider = registry.get(providerId);
      if (!provider) {
        const missing = new ProviderError('transport', providerId, `Provider ${providerId} is not registered`);
        failures.push(missing);
        attempts.push({ providerId, outcome: 'error', latencyMs: 0, errorKind: missing.kind, message: missing.message });
        logger.warn('Summarization provider failed', { runId, articleId: article.id, providerId, kind: missing.kind, error: missing.message });
        continue;
      }

      const linked = linkAbort(signal, provider.timeoutMs);
      const startedAt = Date.now();
      try {
        const result = await raceAbort(
          provider.summarize(text, {
            maxOutputLength: this.options.maxOutputLength,
            language: this.options.language,
            signal: linked.signal,
          }),
          linked.signal,
        );
        const latencyMs = Date.now() - startedAt;
        state = 'summarized';
        attempts.push({ providerId, outcome: 'success', latencyMs });
        usageLog.append({
          runId,
          articleId: article.id,
          providerId,
          task: 'summarize',
          tokenCount: result.tokenCount,
          latencyMs,
          outcome: 'success',
          ts: new Date().toISOString(),
        });

        article.summary = result.text;
        article.summaryProvider = providerId;
        article.isCached = false;
        article.needsRetry = false;
        await this.remember(article.id, result.text, providerId);

        logger.debug('Article summarized', { runId, articleId: article.id, state, providerId, latencyMs });
        return {
          articleId: article.id,
          state,
          providers,
          difficulty,
          providerId,
          summary: result.text,
          fromCache: false,
          cancelled: false,
          needsRetry: false,
          attempts,
        };
      } catch (error) {
        const latencyMs = Date.now() - startedAt;
        if (signal?.aborted) {
          // Run cancelled mid-call: the call is abandoned, not counted as a provider failure.
          cancelled = true;
          attempts.push({ providerId, outcome: 'error', latencyMs, message: 'cancelled' });
          usageLog.append({
            runId,
            articleId: article.id,
            providerId,
            task: 'summarize',
            tokenCount: 0,
            latencyMs,
            outcome: 'error',
            ts: new Date().toISOString(),
          });
          break;
        }

        const failure = linked.timedOut()
          ? new ProviderError('timeout', providerId, `No response within ${provider.timeoutMs}ms`, { cause: error })
          : asProviderError(error, providerId);
        failures.push(failure);
        const outcome: UsageOutcome = failure.kind === 'timeout' ? 'timeout' : 'error';
        attempts.push({ providerId, outcome, latencyMs, errorKind: failure.kind, message: failure.message });
        usageLog.append({
          runId,
          articleId: article.id,
          providerId,
          task: 'summarize',
          tokenCount: 0,
          latencyMs,
          outcome,
          ts: new Date().toISOString(),
        });
        logger.warn('Summarization provider failed', {
          runId,
          articleId: article.id,
          providerId,
          kind: failure.kind,
          status: failure.status,
          error: failure.message,
        });
      } finally {
        linked.dispose();
      }
    }

    state = 'exhausted';
    if (cancelled) {
      article.needsRetry = true;
      logger.info('Routing cancelled', { runId, articleId: article.id, state, attempts: attempts.length });
      return {
        articleId: article.id,
        state,
        providers,
        difficulty,
        providerId: null,
        summary: null,
        fromCache: false,
        cancelled: true,
        needsRetry: true,
        attempts,
      };
    }

    const exhausted = new RouterExhaustedError(article.id, providers, failures);
    const cached = await this.recall(article.id);
    logger.warn(exhausted.message, {
      runId,
      articleId: article.id,
      state,
      providers,
      kinds: failures.map((failure) => failure.kind),
      fromCache: cached !== null,
    });

    if (cached) {
      article.summary = cached.summary;
      article.summaryProvider = cached.providerId;
      article.isCached = true;
    }
    article.needsRetry = cached === null;

    return {
      articleId: article.id,
      state,
      providers,
      difficulty,
      providerId: cached?.providerId ?? null,
      summary: cached?.summary ?? null,
      fromCache: cached !== null,
      cancelled: false,
      needsRetry: cached === null,
      attempts,
    };
  }

  /** Routes every article; outcomes come back in input order. */
  async routeAll(articles: CanonicalArticle[], signal?: AbortSignal): Promise<RoutingOutcome[]> {
    const outcomes = new Array<RoutingOutcome | undefined>(articles.length);
    const workerCount = Math.min(articles.length, Math.max(1, this.options.concurrency));
    let nextIndex = 0;

    const workers = new Array(workerCount).fill(null).map(async () => {
      while (true) {
        const idx = nextIndex;
        nextIndex += 1;
        if (idx >= articles.length) {
          break;
        }
        const article = articles[idx];
        outcomes[idx] = await this.slots.use(() => this.route(article, signal));
      }
    });

    await Promise.all(workers);
    return outcomes.filter((outcome): outcome is RoutingOutcome => outcome !== undefined);
  }

  private async remember(articleId: string, summary: string, providerId: ProviderId): Promise<void> {
    try {
      await this.deps.cache.put({ articleId, summary, providerId, cachedAt: new Date().toISOString() });
    } catch (error) {
      this.deps.logger.warn('Failed to cache summary', { runId: this.deps.runId, articleId, error: errorMessage(error) });
    }
  }

  private async recall(articleId: string) {
    try {
      return await this.deps.cache.get(articleId);
    } catch (error) {
      this.deps.logger.warn('Summary cache lookup failed', { runId: this.deps.runId, articleId, error: errorMessage(error) });
      return null;
    }
  }
}
