const IST_ZONE = 'Asia/Kolkata';

export const WEEKDAYS = ['MONDAY', 'TUESDAY', 'WEDNESDAY', 'THURSDAY', 'FRIDAY', 'SATURDAY', 'SUNDAY'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type IstDay = {
  /** India Standard Time day key (YYYY-MM-DD). */
  dateIst: string;
  weekday: Weekday;
  day: number;
  month: number;
  year: number;
};

function istParts(d: Date): { yyyy: number; mm: number; dd: number } {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone: IST_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(d);
  const get = (t: string) => Number(parts.find((p) => p.type === t)?.value ?? 0);
  return { yyyy: get('year'), mm: get('month'), dd: get('day') };
}

/** Day number for the calendar day in IST. */
export function dayIndexIst(d: Date): number {
  const p = istParts(d);
  // Date.UTC expects month 0-11.
  return Math.floor(Date.UTC(p.yyyy, p.mm - 1, p.dd) / 86400000);
}

export function resolveIstDay(now: Date): IstDay {
  const p = istParts(now);
  // getUTCDay() is 0 for Sunday; WEEKDAYS starts on Monday.
  const utcDay = new Date(Date.UTC(p.yyyy, p.mm - 1, p.dd)).getUTCDay();
  const yyyy = String(p.yyyy).padStart(4, '0');
  const mm = String(p.mm).padStart(2, '0');
  const dd = String(p.dd).padStart(2, '0');
  return {
    dateIst: `${yyyy}-${mm}-${dd}`,
    weekday: WEEKDAYS[(utcDay + 6) % 7],
    day: p.dd,
    month: p.mm,
    year: p.yyyy,
  };
}
