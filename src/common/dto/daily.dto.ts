import { z } from 'zod';
import { WEEKDAYS } from '../time/ist-day';

export const CONTENT_TYPES = ['quote', 'joke', 'news', 'riddle', 'movies', 'prompt', 'emoji'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export const DAILY_ERROR_CODES = [
  'provider_unavailable',
  'generation_malformed',
  'internal_error',
  'unauthorized',
  'rate_limited',
  'invalid_request',
  'not_found',
] as const;

export type DailyErrorCode = (typeof DAILY_ERROR_CODES)[number];

export const anniversaryTodaySchema = z.object({
  names: z.tuple([z.string(), z.string()]),
  year: z.number().int().nullable(),
  /** Whole years since `year`; null when the year is unknown. */
  years: z.number().int().nullable(),
});

export type AnniversaryTodayDto = z.infer<typeof anniversaryTodaySchema>;

/** Every item field is a string; the set of keys depends on `content_type`. */
export const contentItemSchema = z.record(z.string(), z.string());

export type ContentItemDto = z.infer<typeof contentItemSchema>;

export const dailySuccessSchema = z.object({
  success: z.literal(true),
  version: z.string(),
  date_ist: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  weekday: z.enum(WEEKDAYS),
  cache_hit: z.boolean(),
  birthdays_today: z.array(z.string()),
  anniversaries_today: z.array(anniversaryTodaySchema),
  content_type: z.enum(CONTENT_TYPES),
  title: z.string().min(1),
  message: z.string().min(1),
  items: z.array(contentItemSchema),
  metadata: z.record(z.string(), z.unknown()),
});

export type DailySuccessDto = z.infer<typeof dailySuccessSchema>;

export type DailyErrorDto = {
  success: false;
  version: string;
  date_ist: string;
  weekday: string;
  error_code: DailyErrorCode;
  error_message: string;
};

export type DailyResponseDto = DailySuccessDto | DailyErrorDto;

export type ResetCacheDto = { ok: true; cleared: true; date_ist: string };

export type VersionDto = { ok: true; version: string; date_ist: string; weekday: string };

export type ResetHistoryDto = { ok: true; cleared: true; weekday: string };

export type HealthDto = {
  ok: true;
  version: string;
  uptimeSeconds: number;
  providers: { search: boolean; generate: boolean };
};
