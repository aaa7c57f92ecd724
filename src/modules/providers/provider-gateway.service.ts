import { Inject, Injectable, Logger } from '@nestjs/common';
import { AppConfigService, type RetryPolicy } from '../app/app-config.service';
import { errorMessage } from '../../common/errors/error-message';
import { classifyProviderError, type ProviderFailureClass, type ProviderName } from './provider-errors';
import { GENERATION_PROVIDER, type GenerationProvider, type GenerationRequest } from './generation/generation-provider';
import { SEARCH_PROVIDER, type SearchProvider, type SearchRequest, type SearchResult } from './search/search-provider';

/** Retry bookkeeping only; never persisted. */
export type GenerationAttempt = {
  provider: ProviderName;
  ok: boolean;
  latencyMs: number;
  error?: ProviderFailureClass;
};

export type ProviderFailure = {
  kind: 'provider_unavailable';
  provider: ProviderName;
  message: string;
  /** True when a terminal error stopped retries early. */
  terminal: boolean;
};

export type ProviderResult<T> =
  | { ok: true; value: T; attempts: GenerationAttempt[] }
  | { ok: false; error: ProviderFailure; attempts: GenerationAttempt[] };

/** Delay before retry number `attempt` (1-based): doubling from the base, capped, plus jitter. */
export function backoffDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
  return Math.max(0, Math.floor(exp + random() * policy.jitterMs));
}

/**
 * Single entry point for outbound provider calls.
 * Each call is retried on its own, so a failed generation never re-issues a search that already succeeded.
 * Failures come back as values; nothing thrown by a provider escapes.
 */
@Injectable()
export class ProviderGatewayService {
  private readonly logger = new Logger(ProviderGatewayService.name);

  constructor(
    private readonly appConfig: AppConfigService,
    @Inject(SEARCH_PROVIDER) private readonly searchProvider: SearchProvider,
    @Inject(GENERATION_PROVIDER) private readonly generationProvider: GenerationProvider,
  ) {}

  async search(req: SearchRequest): Promise<ProviderResult<SearchResult[]>> {
    return await this.call('search', () => this.searchProvider.search(req));
  }

  async generate(req: GenerationRequest): Promise<ProviderResult<string>> {
    return await this.call('generate', () => this.generationProvider.generate(req));
  }

  configured(): Record<ProviderName, boolean> {
    return { search: this.searchProvider.configured(), generate: this.generationProvider.configured() };
  }

  async call<T>(provider: ProviderName, fn: () => Promise<T>): Promise<ProviderResult<T>> {
    const policy = this.appConfig.providerRetryPolicy();
    const attempts: GenerationAttempt[] = [];
    let lastMessage = 'no attempts made';
    let terminal = false;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      const startedAt = Date.now();
      try {
        const value = await fn();
        attempts.push({ provider, ok: true, latencyMs: Date.now() - startedAt });
        this.logger.debug(`[provider] ${provider} ok (attempt ${attempt}/${policy.maxAttempts})`);
        return { ok: true, value, attempts };
      } catch (err) {
        const failureClass = classifyProviderError(err);
        lastMessage = errorMessage(err);
        attempts.push({ provider, ok: false, latencyMs: Date.now() - startedAt, error: failureClass });

        if (failureClass === 'terminal') {
          terminal = true;
          this.logger.warn(`[provider] ${provider} failed terminally (attempt ${attempt}/${policy.maxAttempts}): ${lastMessage}`);
          break;
        }
        if (attempt < policy.maxAttempts) {
          const delay = backoffDelayMs(policy, attempt);
          this.logger.warn(
            `[provider] ${provider} failed (attempt ${attempt}/${policy.maxAttempts}): ${lastMessage}; retrying in ${delay}ms`,
          );
          await new Promise((r) => setTimeout(r, delay));
        } else {
          this.logger.warn(`[provider] ${provider} failed (attempt ${attempt}/${policy.maxAttempts}): ${lastMessage}; giving up`);
        }
      }
    }

    return { ok: false, error: { kind: 'provider_unavailable', provider, message: lastMessage, terminal }, attempts };
  }
}
