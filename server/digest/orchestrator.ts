import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import type { DigestMetrics, StageName } from '../../shared/types';
import { childLogger, type Logger } from '../obs/logger';
import { UsageLog } from '../obs/usageLog';
import { makeStageEmitter, noopStageSender, type StageEmitter, type StageEventSender } from '../pipeline/stageEmitter';
import { SummarizationRouter, type RoutingOutcome } from '../summarization/router';
import type { SummaryCache } from '../summarization/summaryCache';
import type { ProviderRegistry } from '../summarization/types';
import { deduplicateArticles } from './dedup';
import { NormalizationError, ValidationError } from './errors';
import { filterArticles } from './filters';
import { normalize } from './normalizer';
import { flattenDigest, rankArticles } from './ranking';
import { scoreArticles } from './scoring';
import type { CanonicalArticle, RankedDigest, SourceBatch } from './types';

export interface DigestDeps {
  config: AppConfig;
  providers: ProviderRegistry;
  cache: SummaryCache;
  store: ArtifactStore;
  logger: Logger;
}

export interface DigestRunOptions {
  runId?: string;
  /** Reference time for fetch stamps, filter age and recency scoring. */
  asOf?: Date;
  signal?: AbortSignal;
  emit?: StageEventSender;
}

export type DigestWarning = 'no_articles_after_filter' | 'run_cancelled';

export interface DigestResult {
  runId: string;
  asOf: string;
  categories: RankedDigest;
  outcomes: RoutingOutcome[];
  metrics: DigestMetrics;
  warnings: DigestWarning[];
}

const emptyMetrics = (): DigestMetrics => ({
  recordsReceived: 0,
  normalizationFailures: 0,
  validationFailures: 0,
  filtered: 0,
  rejectionReasons: {},
  duplicatesRemoved: 0,
  ranked: 0,
  summarized: 0,
  servedFromCache: 0,
  exhausted: 0,
  elapsedMs: 0,
});

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * One pipeline run over a fetch batch: normalize, filter, score, deduplicate, rank, summarize.
 * Each stage finishes before the next starts. Per-record failures are counted and skipped;
 * the run itself only fails on unexpected errors.
 */
export const runDigest = async (
  batches: SourceBatch[],
  deps: DigestDeps,
  options: DigestRunOptions = {},
): Promise<DigestResult> => {
  const { config, store } = deps;
  const startedAt = Date.now();
  const runId = options.runId ?? randomId();
  const asOf = options.asOf ?? new Date();
  const logger = childLogger(deps.logger, { runId });
  const send = options.emit ?? noopStageSender;
  const metrics = emptyMetrics();
  const warnings: DigestWarning[] = [];

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onParentAbort, { once: true });
  }
  const runTimer =
    config.pipeline.runTimeoutMs > 0
      ? setTimeout(() => {
          logger.warn('Run timeout reached; cancelling in-flight summaries', { runTimeoutMs: config.pipeline.runTimeoutMs });
          controller.abort();
        }, config.pipeline.runTimeoutMs)
      : null;

  const usageLog = new UsageLog((record) => store.appendUsageRecord(runId, record), logger);
  const router = new SummarizationRouter(
    {
      routing: config.routing,
      language: config.llm.summaryLanguage,
      maxOutputLength: config.llm.maxOutputTokens,
      concurrency: config.pipeline.routerConcurrency,
    },
    { runId, providers: deps.providers, cache: deps.cache, usageLog, logger },
  );

  let currentStage: StageEmitter = makeStageEmitter(runId, 'normalize', send);
  const enter = (stage: StageName, message: string) => {
    currentStage = makeStageEmitter(runId, stage, send);
    currentStage.start({ message });
    return currentStage;
  };

  const finish = async (categories: RankedDigest, outcomes: RoutingOutcome[]): Promise<DigestResult> => {
    metrics.elapsedMs = Date.now() - startedAt;
    const result: DigestResult = { runId, asOf: asOf.toISOString(), categories, outcomes, metrics, warnings };
    try {
      await store.ensureLayout();
      await Promise.all(flattenDigest(categories).map((article) => store.saveNormalizedArticle(article.id, article)));
      await store.saveRunArtifact(runId, 'digest', result);
    } catch (error) {
      logger.warn('Failed to persist digest artifacts', { error: errorMessage(error) });
    }
    await usageLog.flush();
    return result;
  };

  try {
    const normalizeStage = enter('normalize', 'Normalizing raw records');
    const normalized: CanonicalArticle[] = [];
    for (const batch of batches) {
      for (const record of batch.records) {
        metrics.recordsReceived += 1;
        try {
          normalized.push(normalize(record, batch.source, asOf));
        } catch (error) {
          if (error instanceof ValidationError) {
            metrics.validationFailures += 1;
            logger.warn('Record rejected by validation', { source: batch.source.name, issues: error.issues });
          } else if (error instanceof NormalizationError) {
            metrics.normalizationFailures += 1;
            logger.warn('Record skipped during normalization', { source: batch.source.name, field: error.field });
          } else {
            metrics.normalizationFailures += 1;
            logger.error('Unexpected normalization failure', { source: batch.source.name, error: errorMessage(error) });
          }
        }
      }
    }
    normalizeStage.success({
      message: `Normalized ${normalized.length} of ${metrics.recordsReceived} records`,
      data: { normalizationFailures: metrics.normalizationFailures, validationFailures: metrics.validationFailures },
    });

    const filterStage = enter('filter', 'Filtering low-quality and stale articles');
    const { accepted, rejected } = filterArticles(normalized, config.filter, asOf);
    metrics.filtered = rejected.length;
    for (const entry of rejected) {
      for (const reason of entry.reasons) {
        metrics.rejectionReasons[reason] = (metrics.rejectionReasons[reason] ?? 0) + 1;
      }
    }
    filterStage.success({ message: `Accepted ${accepted.length} articles`, data: { rejectionReasons: metrics.rejectionReasons } });

    if (accepted.length === 0) {
      warnings.push('no_articles_after_filter');
      logger.warn('No articles survived filtering', { recordsReceived: metrics.recordsReceived });
      return await finish({}, []);
    }

    const scoreStage = enter('score', 'Scoring articles');
    scoreArticles(accepted, config.scoring, asOf);
    scoreStage.success();

    const dedupStage = enter('dedup', 'Removing duplicate stories');
    const { unique, duplicates } = deduplicateArticles(accepted);
    metrics.duplicatesRemoved = duplicates.length;
    dedupStage.success({ message: `Removed ${duplicates.length} duplicates` });

    const rankStage = enter('rank', 'Ranking by category');
    const categories = rankArticles(unique);
    const ranked = flattenDigest(categories);
    metrics.ranked = ranked.length;
    rankStage.success({ data: { categories: Object.keys(categories) } });

    const summarizeStage = enter('summarize', `Summarizing ${ranked.length} articles`);
    const outcomes = await router.routeAll(ranked, controller.signal);
    for (const outcome of outcomes) {
      if (outcome.state === 'summarized') metrics.summarized += 1;
      else metrics.exhausted += 1;
      if (outcome.fromCache) metrics.servedFromCache += 1;
    }
    if (controller.signal.aborted) {
      warnings.push('run_cancelled');
    }
    summarizeStage.success({
      message: `Summarized ${metrics.summarized}, exhausted ${metrics.exhausted}`,
      data: { servedFromCache: metrics.servedFromCache },
    });

    logger.info('Digest run complete', { ...metrics });
    return await finish(categories, outcomes);
  } catch (error) {
    logger.error('Digest run failed', { error: errorMessage(error) });
    currentStage.failure(error);
    throw error;
  } finally {
    if (runTimer) clearTimeout(runTimer);
    options.signal?.removeEventListener('abort', onParentAbort);
  }
};
