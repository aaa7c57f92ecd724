import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { makeAppConfig, makeTempDir } from '../../../test/fakes';
import { HistoryStoreService } from './history-store.service';

describe('HistoryStoreService', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  function makeService(overrides: Record<string, string> = {}) {
    return new HistoryStoreService(makeAppConfig({ DATA_DIR: dir, ...overrides }));
  }

  it('starts with an empty set for every weekday', async () => {
    const history = await makeService().read();
    expect(Object.keys(history)).toEqual(['MONDAY', 'TUESDAY', 'WEDNESDAY', 'THURSDAY', 'FRIDAY', 'SATURDAY', 'SUNDAY']);
    expect(Object.values(history).every((v) => v.length === 0)).toBe(true);
  });

  it('appends once per fingerprint and persists to disk', async () => {
    const service = makeService();

    await expect(service.append('MONDAY', 'keep going')).resolves.toBe(true);
    await expect(service.append('MONDAY', 'keep going')).resolves.toBe(false);
    await expect(service.append('MONDAY', '')).resolves.toBe(false);

    expect(await service.read()).toMatchObject({ MONDAY: ['keep going'], TUESDAY: [] });
    const onDisk: unknown = JSON.parse(await readFile(join(dir, 'history.json'), 'utf8'));
    expect(onDisk).toMatchObject({ MONDAY: ['keep going'], TUESDAY: [] });
  });

  it('keeps only the most recent entries once the cap is reached', async () => {
    const service = makeService({ HISTORY_MAX_PER_WEEKDAY: '2' });
    for (const fp of ['a', 'b', 'c']) await service.append('FRIDAY', fp);

    expect((await service.read()).FRIDAY).toEqual(['b', 'c']);
  });

  it('serializes concurrent appends without losing entries', async () => {
    const service = makeService();
    await Promise.all(['a', 'b', 'c', 'd'].map((fp) => service.append('TUESDAY', fp)));

    expect((await service.read()).TUESDAY).toEqual(['a', 'b', 'c', 'd']);
  });

  it('resets one weekday or all of them', async () => {
    const service = makeService();
    await service.append('MONDAY', 'x');
    await service.append('THURSDAY', 'y');

    await service.reset('MONDAY');
    expect(await service.read()).toMatchObject({ MONDAY: [], THURSDAY: ['y'] });

    await service.reset();
    expect((await service.read()).THURSDAY).toEqual([]);
  });

  it('keeps every weekday when the file carries unexpected keys or entries', async () => {
    await writeFile(
      join(dir, 'history.json'),
      JSON.stringify({ MONDAY: ['dream big'], TUESDAY: ['old joke', 42], SUNDAY: 'oops', version: 1 }),
      'utf8',
    );
    const service = makeService();

    await service.append('FRIDAY', 'chhaava');

    expect(await service.read()).toEqual({
      MONDAY: ['dream big'],
      TUESDAY: ['old joke'],
      WEDNESDAY: [],
      THURSDAY: [],
      FRIDAY: ['chhaava'],
      SATURDAY: [],
      SUNDAY: [],
    });
  });

  it('moves an unreadable file aside instead of overwriting it', async () => {
    const truncated = '{"MONDAY":["dream big"],"TUES';
    await writeFile(join(dir, 'history.json'), truncated, 'utf8');
    const service = makeService();

    await service.append('FRIDAY', 'chhaava');

    const files = await readdir(dir);
    const aside = files.filter((f) => f.startsWith('history.json.corrupt-'));
    expect(aside).toHaveLength(1);
    expect(await readFile(join(dir, aside[0]), 'utf8')).toBe(truncated);
    expect((await service.read()).FRIDAY).toEqual(['chhaava']);
  });
});
