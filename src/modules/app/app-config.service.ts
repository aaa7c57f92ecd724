import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join, resolve } from 'node:path';

export type NodeEnv = 'development' | 'test' | 'production';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type LockConfig = {
  ttlMs: number;
  waitMs: number;
};

@Injectable()
export class AppConfigService {
  constructor(private readonly config: ConfigService) {}

  private readString(key: string): string {
    return String(this.config.get<string>(key) ?? '').trim();
  }

  private readBool(key: string, fallback: boolean): boolean {
    const v = this.readString(key).toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number): number {
    const n = Number(this.readString(key));
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  /** Like readPositiveInt, but an explicit 0 is honored (e.g. no retry delay). */
  private readNonNegativeInt(key: string, fallback: number): number {
    const raw = this.readString(key);
    if (!raw) return fallback;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
  }

  private readPath(key: string, fallback: string): string {
    return resolve(process.cwd(), this.readString(key) || fallback);
  }

  nodeEnv(): NodeEnv {
    const v = this.readString('NODE_ENV');
    return v === 'production' || v === 'test' ? v : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 5051);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  /** Null means token checks are disabled. */
  appToken(): string | null {
    return this.readString('APP_TOKEN') || null;
  }

  serpApiKey(): string | null {
    return this.readString('SERPAPI_API_KEY') || null;
  }

  openAiApiKey(): string | null {
    return this.readString('OPENAI_API_KEY') || null;
  }

  openAiModel(): string {
    return this.readString('OPENAI_MODEL') || 'gpt-4o-mini';
  }

  dataDir(): string {
    return this.readPath('DATA_DIR', 'data');
  }

  cacheFile(): string {
    return this.readPath('CACHE_FILE', join(this.dataDir(), 'cache.json'));
  }

  /** Cross-process generation lock; sits beside the cache file it guards. */
  cacheLockFile(): string {
    return `${this.cacheFile()}.lock`;
  }

  historyFile(): string {
    return this.readPath('HISTORY_FILE', join(this.dataDir(), 'history.json'));
  }

  birthdaysFile(): string {
    return this.readPath('BIRTHDAYS_FILE', 'list.txt');
  }

  anniversariesFile(): string {
    return this.readPath('ANNIVERSARIES_FILE', 'anniversaries.txt');
  }

  providerRetryPolicy(): RetryPolicy {
    return {
      maxAttempts: this.readPositiveInt('PROVIDER_MAX_ATTEMPTS', 3),
      baseDelayMs: this.readNonNegativeInt('PROVIDER_BASE_DELAY_MS', 800),
      maxDelayMs: this.readNonNegativeInt('PROVIDER_MAX_DELAY_MS', 4000),
      jitterMs: this.readNonNegativeInt('PROVIDER_JITTER_MS', 400),
    };
  }

  providerTimeoutMs(): number {
    return this.readPositiveInt('PROVIDER_TIMEOUT_MS', 20_000);
  }

  nonRepeatRounds(): number {
    return this.readPositiveInt('NON_REPEAT_ROUNDS', 3);
  }

  historyMaxPerWeekday(): number {
    return this.readPositiveInt('HISTORY_MAX_PER_WEEKDAY', 200);
  }

  /**
   * Longest a single generation can take: every round re-running search and generation,
   * each call exhausting its attempts on timeouts with the full backoff between them.
   */
  worstCaseGenerationMs(): number {
    const policy = this.providerRetryPolicy();
    let perCall = policy.maxAttempts * this.providerTimeoutMs();
    for (let n = 1; n < policy.maxAttempts; n++) {
      perCall += Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (n - 1)) + policy.jitterMs;
    }
    return this.nonRepeatRounds() * 2 * perCall;
  }

  generationLock(): LockConfig {
    // Defaults outlast the slowest generation so a waiter never gives up on a live holder.
    const floor = this.worstCaseGenerationMs() + 30_000;
    return {
      ttlMs: this.readPositiveInt('LOCK_TTL_MS', floor),
      waitMs: this.readNonNegativeInt('LOCK_WAIT_MS', floor),
    };
  }

  rateLimitTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_TTL_SECONDS', 60);
  }

  rateLimitLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_LIMIT', 60);
  }
}
