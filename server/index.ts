import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import path from 'node:path';
import fs from 'node:fs/promises';
import { createNoopArtifactStore } from '../shared/artifacts';
import { loadConfig, getPublicConfig } from './config/config';
import { runDigest, type DigestDeps } from './digest/orchestrator';
import { createSseStream } from './http/sse';
import { createLogger } from './obs/logger';
import { createFsArtifactStore, sanitizeSegment } from './persistence/fsStore';
import { parseDigestRequest } from './pipeline/digestRequest';
import { handleDigestStream } from './pipeline/runDigestStream';
import { createProviderRegistry } from './summarization/geminiProvider';
import { createFsSummaryCache, createMemorySummaryCache } from './summarization/summaryCache';

const config = loadConfig();
const logger = createLogger(config);
const persist = config.persistence.mode === 'fs';
const deps: DigestDeps = {
  config,
  logger,
  providers: createProviderRegistry(config),
  cache: persist ? createFsSummaryCache(config.persistence.summariesDir) : createMemorySummaryCache(),
  store: persist ? createFsArtifactStore(config.persistence) : createNoopArtifactStore(),
};

logger.info('Config loaded', {
  environment: config.environment,
  persistence: config.persistence.mode,
  summaryLanguage: config.llm.summaryLanguage,
  difficultyRouting: config.routing.difficulty.enabled,
  hasApiKey: Boolean(config.llm.apiKey),
});

const app = express();

app.use(cors());
app.use(express.json({ limit: '10mb' }));

if (config.observability.logLevel === 'debug') {
  app.use((req, res, next) => {
    const startedAt = Date.now();
    logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
    res.on('finish', () => {
      logger.debug('HTTP response', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - startedAt,
      });
    });
    next();
  });
}

const errorCode = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const sendJsonFile = async (res: Response, filePath: string, label: string) => {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    res.type('application/json').send(content);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      res.status(404).json({ error: 'Not found' });
      return;
    }
    logger.error(`Failed to read ${label}`, { path: filePath, error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ error: `Failed to read ${label}` });
  }
};

app.get('/api/healthz', (_req: Request, res: Response) => {
  res.json({ ok: true, ts: new Date().toISOString() });
});

app.get('/api/config', (_req: Request, res: Response) => {
  res.json(getPublicConfig(config));
});

app.post('/api/digest', async (req: Request, res: Response) => {
  const parsed = parseDigestRequest(req.body);
  if (!parsed.ok) {
    res.status(400).json({ error: 'Invalid digest request', issues: parsed.issues });
    return;
  }

  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  try {
    const result = await runDigest(parsed.request.batches, deps, {
      runId: parsed.request.runId,
      asOf: parsed.request.asOf,
      signal: controller.signal,
    });
    res.json(result);
  } catch (error) {
    res.status(500).json({ error: error instanceof Error ? error.message : 'Digest run failed' });
  }
});

app.post('/api/digest-stream', async (req: Request, res: Response) => {
  const stream = createSseStream(res, {
    heartbeatMs: config.server.heartbeatIntervalMs,
    label: 'digest',
  });

  await handleDigestStream({
    body: req.body,
    deps,
    stream,
    signal: stream.controller.signal,
  });
});

// kind examples: digest
app.get('/api/runs/:runId/artifacts/:kind', async (req: Request, res: Response) => {
  const runId = String(req.params.runId || '').trim();
  const kind = String(req.params.kind || '').trim();
  if (!runId || !kind) {
    res.status(400).json({ error: 'Missing runId or kind' });
    return;
  }
  const filePath = path.join(config.persistence.outputsDir, sanitizeSegment(runId), `${sanitizeSegment(kind)}.json`);
  await sendJsonFile(res, filePath, 'artifact');
});

app.get('/api/normalized/:articleId', async (req: Request, res: Response) => {
  const articleId = String(req.params.articleId || '').trim();
  if (!articleId) {
    res.status(400).json({ error: 'Missing articleId' });
    return;
  }
  const filePath = path.join(config.persistence.normalizedDir, `${sanitizeSegment(articleId)}.json`);
  await sendJsonFile(res, filePath, 'normalized article');
});

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
