import { z } from 'zod';
import { CATEGORIES, SOURCE_TYPES } from '../../shared/types';
import { ValidationError } from './errors';
import type { CanonicalArticle } from './types';

const scoreSchema = z.number().int().min(0).max(100);

const requiredText = (field: string) => z.string().trim().min(1, `${field} is required`);

const ArticleFieldsSchema = z
  .object({
    id: requiredText('id'),
    title: requiredText('title'),
    sourceUrl: requiredText('sourceUrl'),
    sourceName: requiredText('sourceName'),
    sourceType: z.enum(SOURCE_TYPES),
    category: z.enum(CATEGORIES),
    publishedAt: z.string().datetime({ offset: true }),
    fetchedAt: z.string().datetime({ offset: true }),
    relevanceScore: scoreSchema.optional(),
    credibilityScore: scoreSchema.optional(),
  })
  .superRefine((value, ctx) => {
    if (Date.parse(value.fetchedAt) < Date.parse(value.publishedAt)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fetchedAt'],
        message: 'fetchedAt must not be earlier than publishedAt',
      });
    }
  });

export type CanonicalArticleInput = Omit<CanonicalArticle, 'isDuplicate' | 'isCached'> &
  Partial<Pick<CanonicalArticle, 'isDuplicate' | 'isCached'>>;

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

/**
 * Builds a canonical article, enforcing required fields, score ranges and timestamp ordering.
 * `now` is the reference for the "not published in the future" check.
 */
export const createCanonicalArticle = (input: CanonicalArticleInput, now: Date): CanonicalArticle => {
  const parsed = ArticleFieldsSchema.safeParse(input);
  const issues = parsed.success ? [] : describeIssues(parsed.error);
  const publishedMs = Date.parse(input.publishedAt);
  if (!Number.isNaN(publishedMs) && publishedMs > now.getTime()) {
    issues.push('publishedAt: must not be in the future');
  }
  if (issues.length) {
    throw new ValidationError(issues);
  }

  return {
    ...input,
    isDuplicate: input.isDuplicate ?? false,
    isCached: input.isCached ?? false,
  };
};

/** Writes scores onto an article, rejecting values outside 0-100. */
export const assignScores = (
  article: CanonicalArticle,
  scores: { relevanceScore?: number; credibilityScore?: number },
): void => {
  const issues: string[] = [];
  for (const [field, value] of Object.entries(scores)) {
    if (value != null && !scoreSchema.safeParse(value).success) {
      issues.push(`${field}: must be an integer in [0, 100] (got ${value})`);
    }
  }
  if (issues.length) {
    throw new ValidationError(issues);
  }
  if (scores.relevanceScore != null) article.relevanceScore = scores.relevanceScore;
  if (scores.credibilityScore != null) article.credibilityScore = scores.credibilityScore;
};

/** Text the filter and scorer measure as "body": the summary once present, otherwise description and content. */
export const bodyText = (article: CanonicalArticle): string => {
  if (article.summary && article.summary.trim()) {
    return article.summary.trim();
  }
  return [article.description, article.content]
    .filter((part): part is string => typeof part === 'string' && part.trim() !== '')
    .map((part) => part.trim())
    .join('\n');
};

/** Length in code points, so CJK titles measure the same as Latin ones per character. */
export const textLength = (value: string | null | undefined): number => (value ? Array.from(value.trim()).length : 0);
