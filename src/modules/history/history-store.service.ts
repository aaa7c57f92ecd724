import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AppConfigService } from '../app/app-config.service';
import { JsonFile } from '../../common/storage/json-file';
import { KeyedMutex } from '../../common/storage/keyed-mutex';
import { WEEKDAYS, type Weekday } from '../../common/time/ist-day';

// Lenient per weekday: a damaged or missing list reads as empty without discarding the others.
const fingerprints = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === 'string' && item.length > 0));

const historyFileSchema = z.object({
  MONDAY: fingerprints,
  TUESDAY: fingerprints,
  WEDNESDAY: fingerprints,
  THURSDAY: fingerprints,
  FRIDAY: fingerprints,
  SATURDAY: fingerprints,
  SUNDAY: fingerprints,
});

export type WeekdayHistory = Record<Weekday, string[]>;

function emptyHistory(): WeekdayHistory {
  return {
    MONDAY: [],
    TUESDAY: [],
    WEDNESDAY: [],
    THURSDAY: [],
    FRIDAY: [],
    SATURDAY: [],
    SUNDAY: [],
  };
}

/**
 * Per-weekday sets of content fingerprints, persisted as one JSON document.
 * Append-only: entries leave only through `reset()` or the per-weekday retention cap.
 */
@Injectable()
export class HistoryStoreService {
  private readonly logger = new Logger(HistoryStoreService.name);
  private readonly file: JsonFile<WeekdayHistory>;
  private readonly writes = new KeyedMutex();

  constructor(private readonly appConfig: AppConfigService) {
    this.file = new JsonFile(appConfig.historyFile(), historyFileSchema, this.logger);
  }

  async read(): Promise<WeekdayHistory> {
    const stored = await this.file.read();
    const out = emptyHistory();
    if (stored) for (const day of WEEKDAYS) out[day] = [...stored[day]];
    return out;
  }

  /** Returns false when the fingerprint was already present. */
  async append(weekday: Weekday, fingerprint: string): Promise<boolean> {
    if (!fingerprint) return false;
    return await this.writes.runExclusive('history', async () => {
      const history = await this.read();
      const entries = history[weekday];
      if (entries.includes(fingerprint)) return false;
      entries.push(fingerprint);
      const max = this.appConfig.historyMaxPerWeekday();
      if (entries.length > max) history[weekday] = entries.slice(-max);
      await this.file.write(history);
      return true;
    });
  }

  /** Administrative reset: one weekday, or every weekday when omitted. */
  async reset(weekday?: Weekday): Promise<void> {
    await this.writes.runExclusive('history', async () => {
      if (!weekday) {
        await this.file.write(emptyHistory());
        return;
      }
      const history = await this.read();
      history[weekday] = [];
      await this.file.write(history);
    });
    this.logger.log(`[history] reset ${weekday ?? 'all weekdays'}`);
  }
}
