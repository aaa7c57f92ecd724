import { APP_VERSION } from '../../common/app-version';
import {
  dailySuccessSchema,
  type DailyErrorCode,
  type DailyErrorDto,
  type DailySuccessDto,
} from '../../common/dto/daily.dto';
import type { TodayReminders } from '../reminders/reminders.matcher';
import type { GeneratedContent } from './content-generator.service';

export const ERROR_MESSAGE_MAX = 300;

export type ResponseDay = { dateIst: string; weekday: string };

export function formatReminderLines(reminders: TodayReminders): string[] {
  const lines: string[] = [];
  if (reminders.birthdays.length) lines.push(`🎉 Birthdays today: ${reminders.birthdays.join(', ')}`);
  if (reminders.anniversaries.length) {
    const pairs = reminders.anniversaries.map((a) => {
      const names = a.names.join(' & ');
      return a.years != null && a.years > 0 ? `${names} (${a.years} yrs)` : names;
    });
    lines.push(`💍 Anniversaries today: ${pairs.join(', ')}`);
  }
  return lines;
}

/** Reminder lines go above the content, separated by a blank line. */
export function mergeReminders(message: string, reminders: TodayReminders): string {
  const lines = formatReminderLines(reminders);
  return lines.length ? `${lines.join('\n')}\n\n${message}` : message;
}

/** Throws a ZodError when the assembled payload breaks the response contract. */
export function buildSuccessResponse(params: {
  day: ResponseDay;
  content: GeneratedContent;
  reminders: TodayReminders;
  cacheHit: boolean;
}): DailySuccessDto {
  const { day, content, reminders } = params;
  return dailySuccessSchema.parse({
    success: true,
    version: APP_VERSION,
    date_ist: day.dateIst,
    weekday: day.weekday,
    cache_hit: params.cacheHit,
    birthdays_today: reminders.birthdays,
    anniversaries_today: reminders.anniversaries,
    content_type: content.contentType,
    title: content.title,
    message: mergeReminders(content.message, reminders),
    items: content.items,
    metadata: content.metadata,
  });
}

export function buildErrorResponse(day: ResponseDay, code: DailyErrorCode, message: string): DailyErrorDto {
  return {
    success: false,
    version: APP_VERSION,
    date_ist: day.dateIst,
    weekday: day.weekday,
    error_code: code,
    error_message: String(message ?? '').slice(0, ERROR_MESSAGE_MAX),
  };
}
