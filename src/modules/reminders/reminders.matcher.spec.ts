import { matchAnniversaries, matchBirthdays } from './reminders.matcher';
import { parseAnniversaries, parseBirthdays } from './reminders.parser';

describe('matchBirthdays', () => {
  const records = parseBirthdays('Rohan:30/10\nMeera:31/10/1994\nKabir:30/10/2001');

  it('matches on day and month regardless of year, in source order', () => {
    expect(matchBirthdays(records, { day: 30, month: 10 })).toEqual(['Rohan', 'Kabir']);
  });

  it('does not match the next day', () => {
    expect(matchBirthdays(records, { day: 31, month: 10 })).toEqual(['Meera']);
    expect(matchBirthdays(records, { day: 31, month: 10 })).not.toContain('Rohan');
  });

  it('returns an empty list when nobody matches', () => {
    expect(matchBirthdays(records, { day: 1, month: 1 })).toEqual([]);
  });
});

describe('matchAnniversaries', () => {
  it('computes elapsed years when the year is known', () => {
    const records = parseAnniversaries('Vedant & Aisha:23/10/2020');
    expect(matchAnniversaries(records, { day: 23, month: 10, year: 2025 })).toEqual([
      { names: ['Vedant', 'Aisha'], year: 2020, years: 5 },
    ]);
  });

  it('leaves years null when the year is missing or implausible', () => {
    const records = parseAnniversaries('A & B:23/10\nC & D:23/10/1900\nE & F:23/10/2030');
    expect(matchAnniversaries(records, { day: 23, month: 10, year: 2025 })).toEqual([
      { names: ['A', 'B'], year: null, years: null },
      { names: ['C', 'D'], year: 1900, years: null },
      { names: ['E', 'F'], year: 2030, years: null },
    ]);
  });
});
