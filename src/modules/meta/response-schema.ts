import { CONTENT_TYPES, DAILY_ERROR_CODES } from '../../common/dto/daily.dto';
import { WEEKDAYS } from '../../common/time/ist-day';

/** Field reference for client authors; mirrors the success and error envelopes. */
export const RESPONSE_SCHEMA_DESCRIPTION = {
  success: 'boolean',
  version: 'string',
  date_ist: 'YYYY-MM-DD (IST)',
  weekday: WEEKDAYS.join('|'),
  cache_hit: 'boolean',
  birthdays_today: ['string'],
  anniversaries_today: [{ names: ['Name1', 'Name2'], year: 2015, years: 9 }],
  content_type: CONTENT_TYPES.join('|'),
  title: 'string',
  message: 'string',
  items: 'array (structure varies by content_type)',
  metadata: 'object',
  error_code: `${DAILY_ERROR_CODES.join('|')} (present only if success=false)`,
  error_message: 'string, at most 300 characters (present only if success=false)',
} as const;
