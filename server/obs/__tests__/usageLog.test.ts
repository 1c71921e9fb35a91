import { describe, expect, it, vi } from 'vitest';
import type { UsageRecord } from '../../../shared/types';
import { UsageLog } from '../usageLog';

const createTestLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const record = (articleId: string): UsageRecord => ({
  runId: 'run-1',
  articleId,
  providerId: 'gemini-flash',
  task: 'summarize',
  tokenCount: 12,
  latencyMs: 340,
  outcome: 'success',
  ts: '2026-03-10T12:00:00.000Z',
});

describe('UsageLog', () => {
  it('writes every record once and in append order', async () => {
    const written: string[] = [];
    const delays = [15, 0, 5];
    let call = 0;
    const sink = async (row: UsageRecord) => {
      const delay = delays[call % delays.length];
      call += 1;
      await new Promise((resolve) => setTimeout(resolve, delay));
      written.push(row.articleId);
    };
    const log = new UsageLog(sink, createTestLogger());

    ['a', 'b', 'c', 'd'].forEach((id) => log.append(record(id)));
    await log.flush();

    expect(written).toEqual(['a', 'b', 'c', 'd']);
    expect(log.records().map((row) => row.articleId)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('keeps going after a failed write and counts it', async () => {
    const logger = createTestLogger();
    const written: string[] = [];
    const log = new UsageLog(async (row) => {
      if (row.articleId === 'bad') throw new Error('disk full');
      written.push(row.articleId);
    }, logger);

    log.append(record('good-1'));
    log.append(record('bad'));
    log.append(record('good-2'));
    await log.flush();

    expect(written).toEqual(['good-1', 'good-2']);
    expect(log.failedWrites).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Failed to persist usage record', {
      runId: 'run-1',
      providerId: 'gemini-flash',
      error: 'disk full',
    });
  });

  it('stores frozen copies', () => {
    const log = new UsageLog(null, createTestLogger());
    const original = record('a');
    log.append(original);
    original.tokenCount = 999;
    const [stored] = log.records();
    expect(stored.tokenCount).toBe(12);
    expect(Object.isFrozen(stored)).toBe(true);
  });
});
