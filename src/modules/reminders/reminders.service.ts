import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { AppConfigService } from '../app/app-config.service';
import { errnoCode } from '../../common/storage/json-file';
import { errorMessage } from '../../common/errors/error-message';
import type { IstDay } from '../../common/time/ist-day';
import { matchAnniversaries, matchBirthdays, type TodayReminders } from './reminders.matcher';
import { parseAnniversaries, parseBirthdays } from './reminders.parser';

@Injectable()
export class RemindersService {
  private readonly logger = new Logger(RemindersService.name);

  constructor(private readonly appConfig: AppConfigService) {}

  /** Re-reads both source files on every call so edits apply without a restart. */
  async forDay(day: IstDay): Promise<TodayReminders> {
    const [birthdaysText, anniversariesText] = await Promise.all([
      this.readSource(this.appConfig.birthdaysFile()),
      this.readSource(this.appConfig.anniversariesFile()),
    ]);
    return {
      birthdays: matchBirthdays(parseBirthdays(birthdaysText), day),
      anniversaries: matchAnniversaries(parseAnniversaries(anniversariesText), day),
    };
  }

  private async readSource(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        this.logger.error(`[reminders] failed to read ${path}: ${errorMessage(err)}`);
      }
      return '';
    }
  }
}
