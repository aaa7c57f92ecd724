import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { dailySuccessSchema } from '../../common/dto/daily.dto';
import { JsonFile } from '../../common/storage/json-file';
import { KeyedMutex } from '../../common/storage/keyed-mutex';
import { WEEKDAYS } from '../../common/time/ist-day';
import { AppConfigService } from '../app/app-config.service';

export const dailyRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  weekday: z.enum(WEEKDAYS),
  createdAt: z.string(),
  payload: dailySuccessSchema,
});

export type DailyRecord = z.infer<typeof dailyRecordSchema>;

/**
 * The one live day's payload, keyed explicitly by IST date.
 * A record for any other date reads as absent; the next successful generation replaces it.
 */
@Injectable()
export class DailyCacheService {
  private readonly logger = new Logger(DailyCacheService.name);
  private readonly file: JsonFile<DailyRecord>;
  private readonly writes = new KeyedMutex();

  constructor(appConfig: AppConfigService) {
    this.file = new JsonFile(appConfig.cacheFile(), dailyRecordSchema, this.logger);
  }

  async get(date: string): Promise<DailyRecord | null> {
    const record = await this.file.read();
    if (!record) return null;
    return record.date === date ? record : null;
  }

  /** Validates before writing, so a stored payload always satisfies the response contract. */
  async put(record: DailyRecord): Promise<void> {
    const valid = dailyRecordSchema.parse(record);
    await this.writes.runExclusive('cache', async () => {
      await this.file.write(valid);
    });
    this.logger.log(`[cache] stored ${valid.date} (${valid.payload.content_type})`);
  }

  async reset(): Promise<void> {
    await this.writes.runExclusive('cache', async () => {
      await this.file.remove();
    });
    this.logger.log('[cache] cleared');
  }
}
