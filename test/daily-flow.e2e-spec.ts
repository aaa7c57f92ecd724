import type { DailyResponseDto } from '../src/common/dto/daily.dto';
import { FakeGenerationProvider, FakeSearchProvider, makeDailyContentService, makeTempDir, searchResult } from './fakes';

// 09:30 IST each day.
const at = (date: string) => new Date(`${date}T04:00:00Z`);

const QUOTE = (q: string) => JSON.stringify({ quote: q, author: 'Unknown' });

describe('daily flow across days', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('serves each weekday its own content type through a full week', async () => {
    const { service, generation } = makeDailyContentService({
      dir,
      search: new FakeSearchProvider([[searchResult(1, { title: 'Chhaava - BookMyShow' })]]),
      generation: new FakeGenerationProvider([
        QUOTE('Dream big'),
        '{"joke":"Why did the chai blush? It saw the biscuit dip."}',
        '{"riddle":"What has keys but no locks?","answer":"A piano"}',
        '{"fact":"India has 22 official languages."}',
      ]),
    });

    const dates = ['2025-10-27', '2025-10-28', '2025-10-29', '2025-10-30', '2025-10-31', '2025-11-01', '2025-11-02'];
    const week: DailyResponseDto[] = [];
    for (const date of dates) week.push(await service.getDaily(at(date)));

    expect(week.map((r) => (r.success ? [r.weekday, r.content_type] : r.error_code))).toEqual([
      ['MONDAY', 'quote'],
      ['TUESDAY', 'joke'],
      ['WEDNESDAY', 'news'],
      ['THURSDAY', 'riddle'],
      ['FRIDAY', 'movies'],
      ['SATURDAY', 'prompt'],
      ['SUNDAY', 'emoji'],
    ]);
    expect(generation.requests).toHaveLength(4);
  });

  it('does not repeat last Monday’s quote on the next Monday', async () => {
    const { service, history } = makeDailyContentService({
      dir,
      generation: new FakeGenerationProvider([QUOTE('Dream big'), QUOTE('Dream BIG!'), QUOTE('Act now')]),
    });

    const first = await service.getDaily(at('2025-10-27'));
    const next = await service.getDaily(at('2025-11-03'));

    expect(first).toMatchObject({ items: [{ quote: 'Dream big', author: 'Unknown' }] });
    expect(next).toMatchObject({
      date_ist: '2025-11-03',
      items: [{ quote: 'Act now', author: 'Unknown' }],
      metadata: { rounds: 2, repeat: false },
    });
    expect((await history.read()).MONDAY).toEqual(['dream big unknown', 'act now unknown']);
  });

  it('rolls over to a new cached item at IST midnight', async () => {
    const { service } = makeDailyContentService({
      dir,
      search: new FakeSearchProvider([[searchResult(1, { title: 'Sitaare Zameen Par (2025)' })]]),
      generation: new FakeGenerationProvider(['{"riddle":"What has keys but no locks?","answer":"A piano"}']),
    });

    const lateThursday = await service.getDaily(new Date('2025-10-30T18:29:59Z'));
    const sameDay = await service.getDaily(new Date('2025-10-30T18:00:00Z'));
    const friday = await service.getDaily(new Date('2025-10-30T18:30:00Z'));

    expect(lateThursday).toMatchObject({ date_ist: '2025-10-30', content_type: 'riddle', cache_hit: false });
    expect(sameDay).toMatchObject({ date_ist: '2025-10-30', cache_hit: true });
    expect(friday).toMatchObject({
      date_ist: '2025-10-31',
      weekday: 'FRIDAY',
      content_type: 'movies',
      cache_hit: false,
      items: [{ title: 'Sitaare Zameen Par' }],
    });
  });
});
