import { z } from 'zod';
import { CATEGORIES, SOURCE_TYPES } from '../../shared/types';
import type { SourceBatch } from '../digest/types';

const SourceDescriptorSchema = z.object({
  name: z.string().trim().min(1),
  type: z.enum(SOURCE_TYPES),
  category: z.enum(CATEGORIES).optional(),
  defaultOffset: z
    .string()
    .regex(/^(Z|[+-]\d{2}:\d{2})$/, 'defaultOffset must be Z or ±HH:MM')
    .optional(),
});

const SourceBatchSchema = z.object({
  source: SourceDescriptorSchema,
  records: z.array(z.record(z.unknown())).max(5000),
});

export const DigestRequestSchema = z.object({
  runId: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{1,80}$/)
    .optional(),
  asOf: z.string().datetime({ offset: true }).optional(),
  batches: z.array(SourceBatchSchema).min(1),
});

export interface DigestRequest {
  runId?: string;
  asOf?: Date;
  batches: SourceBatch[];
}

export type DigestRequestParse = { ok: true; request: DigestRequest } | { ok: false; issues: string[] };

export const parseDigestRequest = (body: unknown): DigestRequestParse => {
  const parsed = DigestRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    };
  }
  const { runId, asOf, batches } = parsed.data;
  return {
    ok: true,
    request: { runId, asOf: asOf ? new Date(asOf) : undefined, batches },
  };
};
