import type { ProviderId } from '../../shared/types';

export type ProviderErrorKind = 'timeout' | 'rate-limited' | 'invalid-response' | 'transport';

/** One failed attempt against one provider. Triggers fallback to the next provider. */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly providerId: ProviderId;
  readonly status: number | null;

  constructor(kind: ProviderErrorKind, providerId: ProviderId, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = kind;
    this.providerId = providerId;
    this.status = options.status ?? null;
  }
}

/**
 * Every provider for an article failed. Logged by the router and resolved through the
 * summary cache; never thrown out of a run.
 */
export class RouterExhaustedError extends Error {
  readonly articleId: string;
  readonly providers: ProviderId[];
  readonly attempts: ProviderError[];

  constructor(articleId: string, providers: ProviderId[], attempts: ProviderError[]) {
    super(`All providers failed for article ${articleId} (${providers.join(' -> ') || 'none'})`);
    this.name = 'RouterExhaustedError';
    this.articleId = articleId;
    this.providers = providers;
    this.attempts = attempts;
  }
}

/** Providers are meant to throw ProviderError; anything else counts as a transport failure. */
export const asProviderError = (error: unknown, providerId: ProviderId): ProviderError =>
  error instanceof ProviderError
    ? error
    : new ProviderError('transport', providerId, error instanceof Error ? error.message : String(error), { cause: error });
