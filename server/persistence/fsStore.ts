import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';

export const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

export const createFsArtifactStore = (persistence: AppConfig['persistence']): ArtifactStore => {
  const ensureLayout = async () => {
    await ensureDir(persistence.rootDir);
    await ensureDir(persistence.normalizedDir);
    await ensureDir(persistence.outputsDir);
    await ensureDir(persistence.usageDir);
    await ensureDir(persistence.summariesDir);
  };

  // Articles are keyed by their stable id, so a later run overwrites the earlier copy.
  const saveNormalizedArticle = async (articleId: string, data: unknown) => {
    const target = path.join(persistence.normalizedDir, `${sanitizeSegment(articleId)}.json`);
    guardPath(persistence.rootDir, target);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const saveRunArtifact = async (runId: string, kind: string, data: unknown) => {
    const dir = path.join(persistence.outputsDir, sanitizeSegment(runId));
    await ensureDir(dir);
    const target = path.join(dir, `${sanitizeSegment(kind)}.json`);
    guardPath(persistence.rootDir, target);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const appendUsageRecord: ArtifactStore['appendUsageRecord'] = async (runId, record) => {
    const target = path.join(persistence.usageDir, `${sanitizeSegment(runId)}.jsonl`);
    guardPath(persistence.rootDir, target);
    await fs.appendFile(target, `${JSON.stringify(record)}\n`, 'utf-8');
  };

  return {
    ensureLayout,
    saveNormalizedArticle,
    saveRunArtifact,
    appendUsageRecord,
  };
};
