import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { AppConfigService } from '../../app/app-config.service';
import { errorMessage } from '../../../common/errors/error-message';
import { ProviderError, classifyHttpStatus, isAbortError } from '../provider-errors';
import type { SearchProvider, SearchRequest, SearchResult } from './search-provider';

const SERPAPI_URL = 'https://serpapi.com/search.json';

const serpItemSchema = z
  .object({
    title: z.string().optional(),
    link: z.string().optional(),
    url: z.string().optional(),
    snippet: z.string().optional(),
    content: z.string().optional(),
  })
  .passthrough();

const serpResponseSchema = z
  .object({
    error: z.string().optional(),
    news_results: z.array(serpItemSchema).optional(),
    organic_results: z.array(serpItemSchema).optional(),
  })
  .passthrough();

export type SerpResponse = z.infer<typeof serpResponseSchema>;

/** News results (for `tbm=nws`) first, then organic; de-duplicated by link. */
export function extractSearchResults(data: SerpResponse, req: Pick<SearchRequest, 'num' | 'tbm'>): SearchResult[] {
  const containers = [...(req.tbm === 'nws' ? [data.news_results ?? []] : []), data.organic_results ?? []];
  const seen = new Set<string>();
  const out: SearchResult[] = [];
  for (const items of containers) {
    for (const item of items) {
      const title = (item.title ?? '').trim();
      const link = (item.link ?? item.url ?? '').trim();
      const snippet = (item.snippet ?? item.content ?? '').trim();
      if (!title || !link || seen.has(link)) continue;
      seen.add(link);
      out.push({ title, link, snippet });
    }
  }
  return out.slice(0, Math.max(0, req.num));
}

@Injectable()
export class SerpApiSearchProvider implements SearchProvider {
  readonly name = 'serpapi';

  constructor(private readonly appConfig: AppConfigService) {}

  configured(): boolean {
    return Boolean(this.appConfig.serpApiKey());
  }

  async search(req: SearchRequest): Promise<SearchResult[]> {
    const apiKey = this.appConfig.serpApiKey();
    if (!apiKey) throw new ProviderError('SERPAPI_API_KEY not set', 'terminal');

    const params = new URLSearchParams({
      engine: 'google',
      q: req.query,
      api_key: apiKey,
      hl: 'en',
      gl: 'in',
      num: String(req.num),
      ...(req.tbm ? { tbm: req.tbm } : {}),
      ...(req.tbs ? { tbs: req.tbs } : {}),
    });

    let body: unknown;
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.appConfig.providerTimeoutMs());
    try {
      const res = await fetch(`${SERPAPI_URL}?${params.toString()}`, { signal: controller.signal });
      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new ProviderError(`SerpAPI HTTP ${res.status}: ${text.slice(0, 180)}`, classifyHttpStatus(res.status), res.status);
      }
      body = await res.json();
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      if (isAbortError(err)) throw new ProviderError('SerpAPI request timed out', 'retryable');
      throw new ProviderError(`SerpAPI request failed: ${errorMessage(err)}`, 'retryable');
    } finally {
      clearTimeout(t);
    }

    const parsed = serpResponseSchema.safeParse(body);
    if (!parsed.success) throw new ProviderError('SerpAPI returned an unexpected body', 'retryable');
    if (parsed.data.error) {
      // An empty result set is reported through `error` with a 200.
      if (/hasn't returned any results/i.test(parsed.data.error)) return [];
      throw new ProviderError(`SerpAPI error: ${parsed.data.error}`, 'terminal');
    }
    return extractSearchResults(parsed.data, req);
  }
}
