import { ConfigService } from '@nestjs/config';
import { AppConfigService } from './app-config.service';

function makeConfig(values: Record<string, string> = {}) {
  return new AppConfigService(new ConfigService(values));
}

describe('AppConfigService', () => {
  it('sizes the worst-case generation from the retry policy and round count', () => {
    // Per call: 3 × 20000 timeouts + (800 + 400) + (1600 + 400) backoff = 63200; two calls per round, three rounds.
    expect(makeConfig().worstCaseGenerationMs()).toBe(379_200);
    expect(
      makeConfig({
        PROVIDER_MAX_ATTEMPTS: '2',
        PROVIDER_TIMEOUT_MS: '1000',
        PROVIDER_BASE_DELAY_MS: '0',
        PROVIDER_JITTER_MS: '0',
        NON_REPEAT_ROUNDS: '1',
      }).worstCaseGenerationMs(),
    ).toBe(4_000);
  });

  it('defaults the generation lock to outlast the slowest generation', () => {
    const config = makeConfig();
    const lock = config.generationLock();

    expect(lock).toEqual({ ttlMs: 409_200, waitMs: 409_200 });
    expect(lock.ttlMs).toBeGreaterThan(config.worstCaseGenerationMs());
  });

  it('honors explicit lock timings', () => {
    expect(makeConfig({ LOCK_TTL_MS: '5000', LOCK_WAIT_MS: '0' }).generationLock()).toEqual({ ttlMs: 5000, waitMs: 0 });
  });
});
