import type { AnniversaryTodayDto } from '../../common/dto/daily.dto';
import type { AnniversaryRecord, PersonRecord } from './reminders.parser';

export type ReminderDate = { day: number; month: number; year: number };

export type TodayReminders = {
  birthdays: string[];
  anniversaries: AnniversaryTodayDto[];
};

export function matchBirthdays(records: PersonRecord[], today: Pick<ReminderDate, 'day' | 'month'>): string[] {
  return records.filter((r) => r.day === today.day && r.month === today.month).map((r) => r.name);
}

export function matchAnniversaries(records: AnniversaryRecord[], today: ReminderDate): AnniversaryTodayDto[] {
  return records
    .filter((r) => r.day === today.day && r.month === today.month)
    .map((r): AnniversaryTodayDto => ({
      names: [r.names[0], r.names[1]],
      year: r.year,
      // Ignore placeholder years (e.g. 0 or 1900) and future years.
      years: r.year != null && r.year > 1900 && today.year >= r.year ? today.year - r.year : null,
    }));
}
