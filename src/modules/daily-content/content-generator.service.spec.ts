import {
  FakeGenerationProvider,
  FakeSearchProvider,
  makeAppConfig,
  makeGateway,
  makeTempDir,
  searchResult,
} from '../../../test/fakes';
import { fingerprint } from '../../common/text/fingerprint';
import { HistoryStoreService } from '../history/history-store.service';
import { ProviderError } from '../providers/provider-errors';
import { ContentGenerationError } from './content-errors';
import { ContentGeneratorService } from './content-generator.service';

describe('ContentGeneratorService', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  function makeService(params: { search?: FakeSearchProvider; generation?: FakeGenerationProvider } = {}) {
    const config = makeAppConfig({ DATA_DIR: dir });
    const { gateway, search, generation } = makeGateway({ config, ...params });
    const history = new HistoryStoreService(config);
    const service = new ContentGeneratorService(config, gateway, history);
    return { service, history, search, generation };
  }

  it('generates a fresh quote and records its fingerprint', async () => {
    const { service, history } = makeService({
      search: new FakeSearchProvider([[searchResult(1)]]),
      generation: new FakeGenerationProvider(['{"quote":"Dream big","author":"A"}']),
    });

    const out = await service.generate('MONDAY');

    expect(out.contentType).toBe('quote');
    expect(out.items).toEqual([{ quote: 'Dream big', author: 'A' }]);
    expect(out.metadata).toEqual({
      source_hint: '',
      serp_used: true,
      rounds: 1,
      repeat: false,
      attempts: { search: 1, generate: 1 },
    });
    expect((await history.read()).MONDAY).toEqual(['dream big a']);
  });

  it('rejects a repeat and diversifies with a warmer, exclusion-aware prompt', async () => {
    const { service, history, search, generation } = makeService({
      search: new FakeSearchProvider([[searchResult(1)]]),
      generation: new FakeGenerationProvider(['{"joke":"Old joke!"}', '{"joke":"New joke"}']),
    });
    await history.append('TUESDAY', fingerprint('Old joke'));

    const out = await service.generate('TUESDAY');

    expect(out.items).toEqual([{ joke: 'New joke' }]);
    expect(out.metadata).toMatchObject({ rounds: 2, repeat: false });
    expect(search.requests).toHaveLength(1);
    expect(generation.requests).toHaveLength(2);
    expect(generation.requests[1]?.prompt).toContain('Do not repeat or paraphrase any of these:\n- Old joke!');
    expect(generation.requests[1]?.temperature).toBeCloseTo(0.75);
    expect((await history.read()).TUESDAY).toEqual(['old joke', 'new joke']);
  });

  it('accepts the last candidate when every round repeats', async () => {
    const { service, history, generation } = makeService({
      generation: new FakeGenerationProvider(['{"joke":"Old joke"}']),
    });
    await history.append('TUESDAY', 'old joke');

    const out = await service.generate('TUESDAY');

    expect(out.items).toEqual([{ joke: 'Old joke' }]);
    expect(out.metadata).toMatchObject({ rounds: 3, repeat: true });
    expect(generation.requests).toHaveLength(3);
    expect((await history.read()).TUESDAY).toEqual(['old joke']);
  });

  it('never writes history on a dry run', async () => {
    const { service, history } = makeService({
      generation: new FakeGenerationProvider(['{"riddle":"What has keys but no locks?","answer":"A piano"}']),
    });

    const out = await service.generate('THURSDAY', { dryRun: true });

    expect(out.items).toEqual([{ riddle: 'What has keys but no locks?', answer: 'A piano', type: 'text' }]);
    expect((await history.read()).THURSDAY).toEqual([]);
  });

  it('continues without inspiration when the optional search fails', async () => {
    const { service, generation } = makeService({
      search: new FakeSearchProvider([new ProviderError('SERPAPI_API_KEY not set', 'terminal')]),
      generation: new FakeGenerationProvider(['{"fact":"India has 22 official languages."}']),
    });

    const out = await service.generate('SATURDAY');

    expect(out.metadata).toMatchObject({ serp_used: false, attempts: { search: 1, generate: 1 } });
    expect(generation.requests[0]?.prompt).toContain('- (none available)');
  });

  it('fails with provider_unavailable on a terminal generation error', async () => {
    const { service, generation } = makeService({
      generation: new FakeGenerationProvider([new ProviderError('OPENAI_API_KEY not set', 'terminal')]),
    });

    const err = await service.generate('MONDAY').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ContentGenerationError);
    expect(err).toMatchObject({ kind: 'provider_unavailable', message: 'generation failed: OPENAI_API_KEY not set' });
    expect(generation.requests).toHaveLength(1);
  });

  it('fails with provider_unavailable when the required news search fails', async () => {
    const { service } = makeService({
      search: new FakeSearchProvider([new ProviderError('SerpAPI HTTP 401: invalid key', 'terminal', 401)]),
    });

    await expect(service.generate('WEDNESDAY')).rejects.toMatchObject({
      kind: 'provider_unavailable',
      message: 'search failed: SerpAPI HTTP 401: invalid key',
    });
  });

  it('fails with generation_malformed when the news search finds nothing', async () => {
    const { service, search } = makeService({ search: new FakeSearchProvider([[]]) });

    await expect(service.generate('WEDNESDAY')).rejects.toMatchObject({
      kind: 'generation_malformed',
      message: 'news: expected at least 1 stories, got 0',
    });
    expect(search.requests).toHaveLength(1);
  });

  it('re-searches with the next query variant when the movie list repeats', async () => {
    const { service, history, search } = makeService({
      search: new FakeSearchProvider([
        [searchResult(1, { title: 'Chhaava - BookMyShow' })],
        [searchResult(2, { title: 'Sitaare Zameen Par (2025)' })],
      ]),
    });
    await history.append('FRIDAY', 'chhaava');

    const out = await service.generate('FRIDAY');

    expect(out.items).toEqual([{ title: 'Sitaare Zameen Par' }]);
    expect(search.requests.map((r) => r.query)).toEqual([
      'site:in.bookmyshow.com hindi movies mumbai',
      'hindi movies now showing in mumbai theatres',
    ]);
  });

  it('reports generation_malformed when every round is unusable', async () => {
    const { service, generation } = makeService({ generation: new FakeGenerationProvider(['not json']) });

    await expect(service.generate('MONDAY')).rejects.toMatchObject({
      kind: 'generation_malformed',
      message: 'quote: response was not a JSON object',
    });
    expect(generation.requests).toHaveLength(3);
  });

  it('builds Sunday from a template without calling providers', async () => {
    const { service, search, generation } = makeService();

    const out = await service.generate('SUNDAY', { now: new Date('2025-11-02T06:00:00Z') });

    expect(out).toEqual({
      contentType: 'emoji',
      title: 'Sunday Rest',
      message: '🐼💤 Rest day! Recharge and take it easy.',
      items: [{ emoji: '🐼💤', caption: 'Rest day! Recharge and take it easy.' }],
      metadata: { template: 0, serp_used: false, rounds: 1, repeat: false },
    });
    expect(search.requests).toHaveLength(0);
    expect(generation.requests).toHaveLength(0);
  });
});
