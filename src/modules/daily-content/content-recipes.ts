import { z } from 'zod';
import type { ContentItemDto, ContentType } from '../../common/dto/daily.dto';
import type { ParseListStep } from '../content-rules/content-rules';
import type { SearchResult } from '../providers/search/search-provider';
import { MalformedContentError } from './content-errors';

/** One generated (or listed) piece of content, before reminders and envelope fields are added. */
export type ContentCandidate = {
  title: string;
  message: string;
  items: ContentItemDto[];
  /** Text the non-repetition check fingerprints. */
  dedupText: string;
  metadata: Record<string, unknown>;
};

export const NEWS_SECTION_TITLE = 'Start your day with positive news';
export const MOVIES_TITLE = '🎬 Friday Watchlist (Hindi, Mumbai)';
const CHECK_IN_LEAD = 'Share 1 interesting thing that happened this week!';
const NEWS_SUMMARY_MAX = 180;

type EmojiTemplate = { emoji: string; caption: string };

const EMOJI_TEMPLATES: readonly EmojiTemplate[] = [
  { emoji: '🐼💤', caption: 'Rest day! Recharge and take it easy.' },
  { emoji: '🐼☕', caption: 'Slow morning, warm chai, zero plans.' },
  { emoji: '🐼🌿', caption: 'Lazy Sunday mode: fully activated.' },
  { emoji: '🐼🛋️', caption: 'Couch, snacks, and a long nap. Perfect.' },
  { emoji: '🐼🎋', caption: 'Munch, stretch, repeat. Happy Sunday!' },
  { emoji: '(ᵔᴥᵔ)🐼', caption: 'Panda says: rest now, conquer Monday later.' },
];

// -----------------------------
// Parsing helpers
// -----------------------------

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** Parses the first `{` .. last `}` span, which tolerates code fences and chatter around the object. */
export function extractJsonObject(raw: string): unknown {
  const text = String(raw ?? '').trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  return safeJsonParse(text.slice(start, end + 1));
}

function parseAs<T>(schema: z.ZodType<T>, raw: string, label: string): T {
  const json = extractJsonObject(raw);
  if (json === null) throw new MalformedContentError(`${label}: response was not a JSON object`);
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedContentError(`${label}: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
}

function clean(s: string | undefined): string {
  return String(s ?? '').trim();
}

function stripWrappingQuotes(s: string): string {
  return s.replace(/^["“”']+|["“”']+$/g, '').trim();
}

// -----------------------------
// Prompts
// -----------------------------

function bulletList(lines: string[]): string {
  return lines.length ? lines.map((l) => `- ${l}`).join('\n') : '- (none available)';
}

function exclusionsBlock(rejected: string[]): string {
  if (!rejected.length) return '';
  return `\n\nAlready used recently. Do not repeat or paraphrase any of these:\n${bulletList(rejected)}`;
}

export function buildGenerationPrompt(contentType: ContentType, inspiration: SearchResult[], rejected: string[]): string {
  switch (contentType) {
    case 'quote':
      return `
You are crafting a non-cliche, meaningful motivational quote suitable for an Indian audience on a Monday. Use inspiration from the list below but do not copy verbatim.

Inspiration:
${bulletList(inspiration.slice(0, 12).map((r) => `${r.title}: ${r.snippet}`))}

Return JSON with keys:
- quote (string, single punchy line, <190 chars)
- author (string, if unknown, set to "Unknown")
- source_hint (string, very short rationale)

Ensure it's uplifting, fresh, and not cringe.${exclusionsBlock(rejected)}`;
    case 'joke':
      return `
Write one clean, genuinely funny, non-offensive joke for an Indian audience. Avoid politics and vulgarity.
Style: short one-liner or Q/A.

Examples (do not copy):
${bulletList(inspiration.slice(0, 8).map((r) => r.title))}

Return JSON: {"joke": "string"}${exclusionsBlock(rejected)}`;
    case 'riddle':
      return `
Create one great riddle for an Indian audience. Prefer emoji-style if possible, else a clever text riddle. Difficulty: medium. Return also the answer.

Constraints:
- Family friendly
- Fun to share

Ideas (do not copy):
${bulletList(inspiration.slice(0, 6).map((r) => r.title))}

Return JSON: {"riddle": "", "answer": "", "type": "emoji|text"}${exclusionsBlock(rejected)}`;
    case 'prompt':
      return `
Write one short, uplifting, verifiable fun fact about India (under 160 characters) to open a weekend check-in.

Recent material:
${bulletList(inspiration.slice(0, 6).map((r) => `${r.title}: ${r.snippet}`))}

Return JSON: {"fact": "string"}${exclusionsBlock(rejected)}`;
    default:
      throw new Error(`No generation prompt for content type: ${contentType}`);
  }
}

// -----------------------------
// Generated content
// -----------------------------

const quoteSchema = z.object({
  quote: z.string(),
  author: z.string().optional(),
  source_hint: z.string().optional(),
});

const jokeSchema = z.object({ joke: z.string() });

const riddleSchema = z.object({
  riddle: z.string(),
  answer: z.string(),
  type: z.string().optional(),
});

const factSchema = z.object({ fact: z.string() });

export function parseGeneratedContent(contentType: ContentType, raw: string): ContentCandidate {
  switch (contentType) {
    case 'quote': {
      const data = parseAs(quoteSchema, raw, 'quote');
      const quote = stripWrappingQuotes(clean(data.quote));
      const author = clean(data.author) || 'Unknown';
      if (!quote) throw new MalformedContentError('quote: empty quote');
      return {
        title: 'Monday Motivation',
        message: `🚀 Monday Motivation\n\n“${quote}”\n— ${author}`,
        items: [{ quote, author }],
        dedupText: `${quote} — ${author}`,
        metadata: { source_hint: clean(data.source_hint) },
      };
    }
    case 'joke': {
      const joke = clean(parseAs(jokeSchema, raw, 'joke').joke);
      if (!joke) throw new MalformedContentError('joke: empty joke');
      return {
        title: 'Tuesday Joke',
        message: `😂 Tuesday Joker\n\n${joke}`,
        items: [{ joke }],
        dedupText: joke,
        metadata: {},
      };
    }
    case 'riddle': {
      const data = parseAs(riddleSchema, raw, 'riddle');
      const riddle = clean(data.riddle);
      const answer = clean(data.answer);
      if (!riddle || !answer) throw new MalformedContentError('riddle: riddle and answer are required');
      const type = clean(data.type).toLowerCase() === 'emoji' ? 'emoji' : 'text';
      return {
        title: 'Riddle of the Day',
        message: `🧩 Riddle\n\n${riddle}`,
        items: [{ riddle, answer, type }],
        dedupText: riddle,
        metadata: {},
      };
    }
    case 'prompt': {
      const fact = clean(parseAs(factSchema, raw, 'prompt').fact);
      if (!fact) throw new MalformedContentError('prompt: empty fact');
      return {
        title: 'Saturday Check-in',
        message: `✨ Saturday Check-in\n\n${CHECK_IN_LEAD} Fun fact: ${fact}`,
        items: [],
        dedupText: fact,
        metadata: {},
      };
    }
    default:
      throw new Error(`Content type is not generated: ${contentType}`);
  }
}

// -----------------------------
// Listed content (search results only)
// -----------------------------

const LISTING_PAGE_RE = /\b(movies|showtimes|tickets|theatres?|cinemas?)\b/i;

/** "Stree 2 (2024) - Movie | Reviews - BookMyShow" -> "Stree 2". Null for listing pages. */
export function movieTitleFromResult(resultTitle: string): string | null {
  const head = clean(resultTitle.split(/\s+[|\-–—]\s+/)[0]);
  const title = head.replace(/\s*\([^)]*\)\s*$/, '').trim();
  if (!title || LISTING_PAGE_RE.test(title)) return null;
  return title;
}

function numbered(header: string, entries: string[]): string {
  return [header, ...entries.map((e, i) => `${i + 1}. ${e}`)].join('\n\n');
}

function newsCandidate(results: SearchResult[], step: ParseListStep): ContentCandidate {
  const items = results.slice(0, step.maxItems).map((r) => ({
    title: clean(r.title),
    summary: clean(r.snippet).slice(0, NEWS_SUMMARY_MAX),
    link: clean(r.link),
  }));
  if (items.length < step.minItems) {
    throw new MalformedContentError(`news: expected at least ${step.minItems} stories, got ${items.length}`);
  }
  return {
    title: NEWS_SECTION_TITLE,
    message: numbered(
      `🗞️ ${NEWS_SECTION_TITLE}`,
      items.map((it) => `${it.title}\n   ${it.summary}\n   ${it.link}`),
    ),
    items,
    dedupText: items.map((it) => it.title).join(' '),
    metadata: {},
  };
}

function moviesCandidate(results: SearchResult[], step: ParseListStep): ContentCandidate {
  const seen = new Set<string>();
  const titles: string[] = [];
  for (const r of results) {
    const title = movieTitleFromResult(r.title);
    if (!title) continue;
    const key = title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    titles.push(title);
    if (titles.length >= step.maxItems) break;
  }
  if (titles.length < step.minItems) {
    throw new MalformedContentError(`movies: expected at least ${step.minItems} titles, got ${titles.length}`);
  }
  return {
    title: MOVIES_TITLE,
    message: numbered(MOVIES_TITLE, titles),
    items: titles.map((title) => ({ title })),
    dedupText: titles.join(' '),
    metadata: {},
  };
}

export function buildListContent(contentType: ContentType, results: SearchResult[], step: ParseListStep): ContentCandidate {
  if (contentType === 'news') return newsCandidate(results, step);
  if (contentType === 'movies') return moviesCandidate(results, step);
  throw new Error(`Content type is not listed: ${contentType}`);
}

// -----------------------------
// Template content
// -----------------------------

/** Rotates through the templates by IST day number. */
export function emojiContent(dayIndex: number): ContentCandidate {
  const i = ((dayIndex % EMOJI_TEMPLATES.length) + EMOJI_TEMPLATES.length) % EMOJI_TEMPLATES.length;
  const { emoji, caption } = EMOJI_TEMPLATES[i] ?? EMOJI_TEMPLATES[0];
  return {
    title: 'Sunday Rest',
    message: `${emoji} ${caption}`,
    items: [{ emoji, caption }],
    dedupText: `${emoji} ${caption}`,
    metadata: { template: i },
  };
}
