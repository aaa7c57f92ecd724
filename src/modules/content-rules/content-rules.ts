import type { ContentType } from '../../common/dto/daily.dto';
import type { Weekday } from '../../common/time/ist-day';

export type SearchStep = {
  kind: 'search';
  /** Alternate phrasings; list strategies move to the next one when a round must diversify. */
  queries: readonly [string, ...string[]];
  num: number;
  tbm?: 'nws';
  tbs?: string;
  /** When false, a failed search degrades to "no inspiration" instead of failing the day. */
  required: boolean;
};

export type GenerateStep = { kind: 'generate'; temperature: number };

export type ParseListStep = { kind: 'parse_list'; minItems: number; maxItems: number };

export type TemplateStep = { kind: 'template' };

export type StrategyStep = SearchStep | GenerateStep | ParseListStep | TemplateStep;

export type ContentStrategy = {
  weekday: Weekday;
  contentType: ContentType;
  steps: readonly StrategyStep[];
  /** Whether accepted content is checked against, and recorded in, the weekday history. */
  nonRepeating: boolean;
};

const CONTENT_RULES: Readonly<Record<Weekday, ContentStrategy>> = {
  MONDAY: {
    weekday: 'MONDAY',
    contentType: 'quote',
    nonRepeating: true,
    steps: [
      {
        kind: 'search',
        queries: ['site:brainyquote.com OR site:goodreads.com "motivational quotes" -cliche'],
        num: 10,
        tbs: 'qdr:y',
        required: false,
      },
      { kind: 'generate', temperature: 0.3 },
    ],
  },
  TUESDAY: {
    weekday: 'TUESDAY',
    contentType: 'joke',
    nonRepeating: true,
    steps: [
      {
        kind: 'search',
        queries: ['clean funny jokes India family friendly one liners -offensive -adult'],
        num: 10,
        tbs: 'qdr:y',
        required: false,
      },
      { kind: 'generate', temperature: 0.6 },
    ],
  },
  WEDNESDAY: {
    weekday: 'WEDNESDAY',
    contentType: 'news',
    nonRepeating: false,
    steps: [
      { kind: 'search', queries: ['positive good news India'], num: 10, tbm: 'nws', tbs: 'qdr:w', required: true },
      { kind: 'parse_list', minItems: 1, maxItems: 3 },
    ],
  },
  THURSDAY: {
    weekday: 'THURSDAY',
    contentType: 'riddle',
    nonRepeating: true,
    steps: [
      { kind: 'search', queries: ['emoji riddles India family friendly'], num: 8, tbs: 'qdr:y', required: false },
      { kind: 'generate', temperature: 0.7 },
    ],
  },
  FRIDAY: {
    weekday: 'FRIDAY',
    contentType: 'movies',
    nonRepeating: true,
    steps: [
      {
        kind: 'search',
        queries: [
          'site:in.bookmyshow.com hindi movies mumbai',
          'hindi movies now showing in mumbai theatres',
          'new hindi movie releases this week',
        ],
        num: 10,
        required: true,
      },
      { kind: 'parse_list', minItems: 1, maxItems: 8 },
    ],
  },
  SATURDAY: {
    weekday: 'SATURDAY',
    contentType: 'prompt',
    nonRepeating: true,
    steps: [
      { kind: 'search', queries: ['uplifting facts India interesting'], num: 6, tbs: 'qdr:w', required: false },
      { kind: 'generate', temperature: 0.6 },
    ],
  },
  SUNDAY: {
    weekday: 'SUNDAY',
    contentType: 'emoji',
    nonRepeating: false,
    steps: [{ kind: 'template' }],
  },
};

export function strategyFor(weekday: Weekday): ContentStrategy {
  const rule = CONTENT_RULES[weekday];
  if (!rule) throw new Error(`No content rule for weekday: ${String(weekday)}`);
  return rule;
}
