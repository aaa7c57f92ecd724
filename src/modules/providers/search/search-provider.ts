export type SearchRequest = {
  query: string;
  num: number;
  /** Google vertical, e.g. `nws` for news. */
  tbm?: string;
  /** Time filter, e.g. `qdr:w` for the past week. */
  tbs?: string;
};

export type SearchResult = {
  title: string;
  link: string;
  snippet: string;
};

export interface SearchProvider {
  readonly name: string;
  configured(): boolean;
  /** Throws ProviderError (or any error, treated as retryable) on failure. */
  search(req: SearchRequest): Promise<SearchResult[]>;
}

export const SEARCH_PROVIDER = Symbol('SEARCH_PROVIDER');
