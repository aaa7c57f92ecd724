export type PersonRecord = {
  name: string;
  day: number;
  month: number;
  year: number | null;
};

export type AnniversaryRecord = {
  names: [string, string];
  day: number;
  month: number;
  year: number | null;
};

const INT_RE = /^\s*\d+\s*$/;
// Split once on the first "&", "-" or " and " between the two names.
const PAIR_RE = /^(.*?)(?:\s*&\s*|\s*-\s*|\s+and\s+)(.*)$/;

function toInt(raw: string | undefined): number | null {
  if (raw == null || !INT_RE.test(raw)) return null;
  return Number.parseInt(raw, 10);
}

/** `DD/MM` or `DD/MM/YYYY`; an unreadable year degrades to null, an unreadable day or month drops the line. */
function parseDayMonthYear(raw: string): { day: number; month: number; year: number | null } | null {
  const parts = raw.trim().split('/');
  if (parts.length < 2) return null;
  const day = toInt(parts[0]);
  const month = toInt(parts[1]);
  if (!day || !month) return null;
  return { day, month, year: parts.length >= 3 ? toInt(parts[2]) : null };
}

function splitFirstColon(line: string): [string, string] | null {
  const i = line.indexOf(':');
  if (i < 0) return null;
  return [line.slice(0, i), line.slice(i + 1)];
}

/**
 * Parses birthday lines of the form `Name:DD/MM[/YYYY]`.
 * Blank lines, malformed lines and the `Name:Birthday` header are skipped.
 */
export function parseBirthdays(text: string): PersonRecord[] {
  const out: PersonRecord[] = [];
  for (const raw of String(text ?? '').split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.toLowerCase().startsWith('name:birthday')) continue;
    const split = splitFirstColon(line);
    if (!split) continue;
    const name = split[0].trim();
    const date = parseDayMonthYear(split[1]);
    if (!name || !date) continue;
    out.push({ name, ...date });
  }
  return out;
}

/**
 * Parses anniversary lines of the form `Name1 & Name2:DD/MM[/YYYY]`.
 * Names may also be joined by `-` or ` and `.
 */
export function parseAnniversaries(text: string): AnniversaryRecord[] {
  const out: AnniversaryRecord[] = [];
  for (const raw of String(text ?? '').split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.toLowerCase().startsWith('names:anniversary')) continue;
    const split = splitFirstColon(line);
    if (!split) continue;
    const pair = split[0].trim().match(PAIR_RE);
    if (!pair) continue;
    const first = (pair[1] ?? '').trim();
    const second = (pair[2] ?? '').trim();
    const date = parseDayMonthYear(split[1]);
    if (!first || !second || !date) continue;
    out.push({ names: [first, second], ...date });
  }
  return out;
}
