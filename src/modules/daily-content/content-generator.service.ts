import { Injectable, Logger } from '@nestjs/common';
import type { ContentItemDto, ContentType } from '../../common/dto/daily.dto';
import { errorMessage } from '../../common/errors/error-message';
import { fingerprint } from '../../common/text/fingerprint';
import { dayIndexIst, type Weekday } from '../../common/time/ist-day';
import { AppConfigService } from '../app/app-config.service';
import { strategyFor, type GenerateStep, type ParseListStep, type SearchStep } from '../content-rules/content-rules';
import { HistoryStoreService } from '../history/history-store.service';
import { ProviderGatewayService } from '../providers/provider-gateway.service';
import type { SearchResult } from '../providers/search/search-provider';
import { ContentGenerationError, MalformedContentError } from './content-errors';
import {
  buildGenerationPrompt,
  buildListContent,
  emojiContent,
  parseGeneratedContent,
  type ContentCandidate,
} from './content-recipes';

export type GeneratedContent = {
  contentType: ContentType;
  title: string;
  message: string;
  items: ContentItemDto[];
  metadata: Record<string, unknown>;
};

export type GenerateOptions = {
  /** Used for template rotation; defaults to now. */
  now?: Date;
  /** Preview mode: read history but never append to it. */
  dryRun?: boolean;
};

/** Each retry round nudges the temperature up so the model strays from what it produced before. */
const TEMPERATURE_STEP = 0.15;
const MAX_TEMPERATURE = 1;

type AttemptCounts = { search: number; generate: number };

@Injectable()
export class ContentGeneratorService {
  private readonly logger = new Logger(ContentGeneratorService.name);

  constructor(
    private readonly appConfig: AppConfigService,
    private readonly gateway: ProviderGatewayService,
    private readonly history: HistoryStoreService,
  ) {}

  /**
   * Runs the weekday's strategy.
   * Non-repeating strategies get up to NON_REPEAT_ROUNDS rounds to produce something not in the weekday history;
   * if every round repeats, the last candidate is accepted and flagged `repeat`.
   */
  async generate(weekday: Weekday, opts: GenerateOptions = {}): Promise<GeneratedContent> {
    const strategy = strategyFor(weekday);
    const now = opts.now ?? new Date();

    if (strategy.steps.some((s) => s.kind === 'template')) {
      const c = emojiContent(dayIndexIst(now));
      return this.toGenerated(strategy.contentType, c, { ...c.metadata, serp_used: false, rounds: 1, repeat: false });
    }

    const searchStep = strategy.steps.find((s): s is SearchStep => s.kind === 'search') ?? null;
    const generateStep = strategy.steps.find((s): s is GenerateStep => s.kind === 'generate') ?? null;
    const listStep = strategy.steps.find((s): s is ParseListStep => s.kind === 'parse_list') ?? null;

    const seen = strategy.nonRepeating ? new Set((await this.history.read())[weekday]) : new Set<string>();
    const maxRounds = strategy.nonRepeating ? this.appConfig.nonRepeatRounds() : 1;
    const attempts: AttemptCounts = { search: 0, generate: 0 };
    const rejected: string[] = [];

    let results: SearchResult[] | null = null;
    let serpUsed = false;
    let lastRepeat: ContentCandidate | null = null;
    let lastMalformed: string | null = null;
    let round = 0;

    while (round < maxRounds) {
      round++;

      // Generative strategies search once and reuse the results; listed ones re-search with the next query variant.
      if (searchStep && (results === null || (listStep && round > 1))) {
        const query = searchStep.queries[(round - 1) % searchStep.queries.length] ?? searchStep.queries[0];
        const res = await this.gateway.search({ query, num: searchStep.num, tbm: searchStep.tbm, tbs: searchStep.tbs });
        attempts.search += res.attempts.length;
        if (res.ok) {
          results = res.value;
          serpUsed = serpUsed || res.value.length > 0;
        } else if (!searchStep.required) {
          this.logger.warn(`[daily] ${weekday} search failed, continuing without inspiration: ${res.error.message}`);
          results = [];
        } else if (lastRepeat) {
          this.logger.warn(`[daily] ${weekday} search failed in round ${round}; keeping earlier candidate`);
          break;
        } else {
          throw new ContentGenerationError('provider_unavailable', `search failed: ${res.error.message}`);
        }
      }

      let candidate: ContentCandidate;
      try {
        if (generateStep) {
          const temperature = Math.min(MAX_TEMPERATURE, generateStep.temperature + TEMPERATURE_STEP * (round - 1));
          const prompt = buildGenerationPrompt(strategy.contentType, results ?? [], rejected);
          const res = await this.gateway.generate({ prompt, temperature, json: true });
          attempts.generate += res.attempts.length;
          if (!res.ok) {
            if (lastRepeat) {
              this.logger.warn(`[daily] ${weekday} generation failed in round ${round}; keeping earlier candidate`);
              break;
            }
            throw new ContentGenerationError('provider_unavailable', `generation failed: ${res.error.message}`);
          }
          candidate = parseGeneratedContent(strategy.contentType, res.value);
        } else if (listStep) {
          candidate = buildListContent(strategy.contentType, results ?? [], listStep);
        } else {
          throw new ContentGenerationError('internal_error', `No producing step for ${weekday}`);
        }
      } catch (err) {
        if (!(err instanceof MalformedContentError)) throw err;
        lastMalformed = err.message;
        this.logger.warn(`[daily] ${weekday} round ${round}/${maxRounds} malformed: ${err.message}`);
        continue;
      }

      const fp = fingerprint(candidate.dedupText);
      if (!strategy.nonRepeating || !seen.has(fp)) {
        return await this.accept(weekday, strategy.contentType, candidate, {
          fp,
          record: strategy.nonRepeating && !opts.dryRun,
          metadata: { serp_used: serpUsed, rounds: round, repeat: false, attempts },
        });
      }

      this.logger.log(`[daily] ${weekday} round ${round}/${maxRounds} repeated history; diversifying`);
      rejected.push(candidate.dedupText);
      lastRepeat = candidate;
    }

    if (lastRepeat) {
      this.logger.warn(`[daily] ${weekday} produced only repeats in ${round} rounds; accepting the last one`);
      return await this.accept(weekday, strategy.contentType, lastRepeat, {
        fp: fingerprint(lastRepeat.dedupText),
        record: strategy.nonRepeating && !opts.dryRun,
        metadata: { serp_used: serpUsed, rounds: round, repeat: true, attempts },
      });
    }

    throw new ContentGenerationError('generation_malformed', lastMalformed ?? `No usable content for ${weekday}`);
  }

  private async accept(
    weekday: Weekday,
    contentType: ContentType,
    candidate: ContentCandidate,
    params: { fp: string; record: boolean; metadata: Record<string, unknown> },
  ): Promise<GeneratedContent> {
    if (params.record) {
      try {
        await this.history.append(weekday, params.fp);
      } catch (err) {
        this.logger.error(`[history] append failed for ${weekday}: ${errorMessage(err)}`);
      }
    }
    return this.toGenerated(contentType, candidate, { ...candidate.metadata, ...params.metadata });
  }

  private toGenerated(
    contentType: ContentType,
    candidate: ContentCandidate,
    metadata: Record<string, unknown>,
  ): GeneratedContent {
    return { contentType, title: candidate.title, message: candidate.message, items: candidate.items, metadata };
  }
}
