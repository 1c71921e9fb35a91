import type { SseStream } from '../../shared/sse';
import { runDigest, type DigestDeps } from '../digest/orchestrator';
import { parseDigestRequest } from './digestRequest';

export interface DigestStreamArgs {
  body: unknown;
  deps: DigestDeps;
  stream: SseStream;
  signal?: AbortSignal;
}

/** Runs one digest over SSE: stage events while it runs, then `digest` with the result, or `fatal`. */
export const handleDigestStream = async ({ body, deps, stream, signal }: DigestStreamArgs): Promise<void> => {
  const parsed = parseDigestRequest(body);
  if (!parsed.ok) {
    stream.sendJson('fatal', { error: 'Invalid digest request', issues: parsed.issues });
    stream.close();
    return;
  }

  try {
    const result = await runDigest(parsed.request.batches, deps, {
      runId: parsed.request.runId,
      asOf: parsed.request.asOf,
      signal,
      emit: (event) => stream.send(event),
    });
    stream.sendJson('digest', result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.logger.error('Digest stream failed', { error: message });
    stream.sendJson('fatal', { error: message });
  } finally {
    stream.close();
  }
};
