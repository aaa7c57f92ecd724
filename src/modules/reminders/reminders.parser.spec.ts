import { parseAnniversaries, parseBirthdays } from './reminders.parser';

describe('parseBirthdays', () => {
  it('parses names with and without a year, in source order', () => {
    const text = ['Name:Birthday', 'Rohan:30/10', 'Meera: 05/01/1994', '', 'Dev Patel:12/12/19x0'].join('\n');
    expect(parseBirthdays(text)).toEqual([
      { name: 'Rohan', day: 30, month: 10, year: null },
      { name: 'Meera', day: 5, month: 1, year: 1994 },
      { name: 'Dev Patel', day: 12, month: 12, year: null },
    ]);
  });

  it('skips lines without a colon, a usable day/month, or a name', () => {
    const text = ['just a note', 'Asha:3', 'Kabir:aa/10', ':01/01', 'Tara:00/05', 'Ira:7/8\r'].join('\n');
    expect(parseBirthdays(text)).toEqual([{ name: 'Ira', day: 7, month: 8, year: null }]);
  });
});

describe('parseAnniversaries', () => {
  it('accepts "&", "-" and "and" between the names', () => {
    const text = [
      'Names:Anniversary',
      'Vedant & Aisha:23/10/2020',
      'Arjun-Priya:01/02',
      'Sam and Alex:14/02/2015',
    ].join('\n');
    expect(parseAnniversaries(text)).toEqual([
      { names: ['Vedant', 'Aisha'], day: 23, month: 10, year: 2020 },
      { names: ['Arjun', 'Priya'], day: 1, month: 2, year: null },
      { names: ['Sam', 'Alex'], day: 14, month: 2, year: 2015 },
    ]);
  });

  it('splits only on the first separator', () => {
    expect(parseAnniversaries('Ravi & Anu & Co:05/06')).toEqual([
      { names: ['Ravi', 'Anu & Co'], day: 5, month: 6, year: null },
    ]);
  });

  it('skips lines without two names', () => {
    expect(parseAnniversaries('Solo:05/06\nA & :05/06')).toEqual([]);
  });
});
