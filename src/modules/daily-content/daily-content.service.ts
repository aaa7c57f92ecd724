import { Injectable, Logger } from '@nestjs/common';
import { ZodError } from 'zod';
import type {
  DailyErrorDto,
  DailyResponseDto,
  DailySuccessDto,
  ResetCacheDto,
  ResetHistoryDto,
} from '../../common/dto/daily.dto';
import { errorMessage } from '../../common/errors/error-message';
import { withFileLock } from '../../common/storage/file-lock';
import { KeyedMutex } from '../../common/storage/keyed-mutex';
import { resolveIstDay, type IstDay, type Weekday } from '../../common/time/ist-day';
import { AppConfigService } from '../app/app-config.service';
import { DailyCacheService } from '../daily-cache/daily-cache.service';
import { HistoryStoreService } from '../history/history-store.service';
import type { TodayReminders } from '../reminders/reminders.matcher';
import { RemindersService } from '../reminders/reminders.service';
import { ContentGenerationError } from './content-errors';
import { ContentGeneratorService, type GeneratedContent } from './content-generator.service';
import { buildErrorResponse, buildSuccessResponse, type ResponseDay } from './daily-response';

/**
 * At-most-once-per-day orchestration:
 * cache check, then (on a miss) generate, merge reminders and persist, all serialized per IST date.
 * Failures become error envelopes and are never cached.
 */
@Injectable()
export class DailyContentService {
  private readonly logger = new Logger(DailyContentService.name);
  private readonly inflight = new KeyedMutex();

  constructor(
    private readonly appConfig: AppConfigService,
    private readonly cache: DailyCacheService,
    private readonly generator: ContentGeneratorService,
    private readonly reminders: RemindersService,
    private readonly history: HistoryStoreService,
  ) {}

  async getDaily(now: Date = new Date()): Promise<DailyResponseDto> {
    const day = resolveIstDay(now);

    const hit = await this.readCache(day);
    if (hit) return hit;

    // Same-process callers queue here; the winner generates, the rest find its record on re-read.
    return await this.inflight.runExclusive(day.dateIst, async () => {
      const queued = await this.readCache(day);
      if (queued) return queued;
      return await this.generateUnderFileLock(day, now);
    });
  }

  /** Dry run for any weekday: real IST date, no cache or history writes. */
  async preview(weekday: Weekday | null, now: Date = new Date()): Promise<DailyResponseDto> {
    const today = resolveIstDay(now);
    const target: ResponseDay = { dateIst: today.dateIst, weekday: weekday ?? today.weekday };

    let content: GeneratedContent;
    try {
      content = await this.generator.generate(weekday ?? today.weekday, { now, dryRun: true });
    } catch (err) {
      return this.failure(target, err);
    }
    const reminders = await this.reminders.forDay(today);
    return this.assemble(target, { ...content, metadata: { ...content.metadata, preview: true } }, reminders);
  }

  async resetCache(now: Date = new Date()): Promise<ResetCacheDto> {
    const day = resolveIstDay(now);
    await this.inflight.runExclusive(day.dateIst, async () => {
      await this.cache.reset();
    });
    return { ok: true, cleared: true, date_ist: day.dateIst };
  }

  async resetHistory(weekday: Weekday | null): Promise<ResetHistoryDto> {
    await this.history.reset(weekday ?? undefined);
    return { ok: true, cleared: true, weekday: weekday ?? 'ALL' };
  }

  private async generateUnderFileLock(day: IstDay, now: Date): Promise<DailyResponseDto> {
    const lockPath = this.appConfig.cacheLockFile();
    let locked: DailyResponseDto | null;
    try {
      locked = await withFileLock(lockPath, this.appConfig.generationLock(), async () => {
        const raced = await this.readCache(day);
        if (raced) return raced;
        return await this.generateAndPersist(day, now);
      });
    } catch (err) {
      // Only lock I/O can land here; generateAndPersist never throws.
      this.logger.warn(`[daily] lock ${lockPath} unusable: ${errorMessage(err)}`);
      locked = null;
    }
    if (locked) return locked;

    this.logger.warn(`[daily] ${day.dateIst} generating without the cross-process lock`);
    const late = await this.readCache(day);
    if (late) return late;
    return await this.generateAndPersist(day, now);
  }

  private async generateAndPersist(day: IstDay, now: Date): Promise<DailyResponseDto> {
    const startedAt = Date.now();
    let content: GeneratedContent;
    try {
      content = await this.generator.generate(day.weekday, { now });
    } catch (err) {
      return this.failure(day, err);
    }

    const reminders = await this.reminders.forDay(day);
    const payload = this.assemble(day, content, reminders);
    if (!payload.success) return payload;

    // A worker that gave up waiting on the lock may finish second; the first record for the date stands.
    const stored = await this.readCache(day);
    if (stored) {
      this.logger.warn(`[daily] ${day.dateIst} already stored by another worker; discarding this generation`);
      return stored;
    }

    try {
      await this.cache.put({ date: day.dateIst, weekday: day.weekday, createdAt: now.toISOString(), payload });
    } catch (err) {
      // Serve it anyway; the next request regenerates.
      this.logger.error(`[daily] cache write failed for ${day.dateIst}: ${errorMessage(err)}`);
    }
    this.logger.log(
      `[daily] generated ${day.dateIst} ${day.weekday} ${payload.content_type} in ${Date.now() - startedAt}ms`,
    );
    return payload;
  }

  private assemble(
    day: ResponseDay,
    content: GeneratedContent,
    reminders: TodayReminders,
  ): DailySuccessDto | DailyErrorDto {
    try {
      return buildSuccessResponse({ day, content, reminders, cacheHit: false });
    } catch (err) {
      if (err instanceof ZodError) {
        const issue = err.issues[0];
        const where = issue?.path.join('.') || 'payload';
        return this.failure(day, new ContentGenerationError('generation_malformed', `${where}: ${issue?.message ?? 'invalid'}`));
      }
      return this.failure(day, err);
    }
  }

  private async readCache(day: IstDay): Promise<DailySuccessDto | null> {
    try {
      const record = await this.cache.get(day.dateIst);
      return record ? { ...record.payload, cache_hit: true } : null;
    } catch (err) {
      this.logger.error(`[daily] cache read failed for ${day.dateIst}: ${errorMessage(err)}`);
      return null;
    }
  }

  private failure(day: ResponseDay, err: unknown): DailyErrorDto {
    if (err instanceof ContentGenerationError) {
      this.logger.warn(`[daily] ${day.dateIst} ${day.weekday} failed (${err.kind}): ${err.message}`);
      return buildErrorResponse(day, err.kind, err.message);
    }
    this.logger.error(
      `[daily] ${day.dateIst} ${day.weekday} failed unexpectedly: ${errorMessage(err)}`,
      err instanceof Error ? err.stack : undefined,
    );
    return buildErrorResponse(day, 'internal_error', errorMessage(err));
  }
}
