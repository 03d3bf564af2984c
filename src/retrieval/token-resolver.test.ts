import { describe, it, expect } from 'vitest';
import {
  calendarDate,
  containsTokens,
  findUnknownTokens,
  resolveTokens,
} from './token-resolver.js';

const AT = new Date('2026-02-23T00:00:00.000Z');

describe('resolveTokens', () => {
  it('should substitute year, month and day', () => {
    expect(resolveTokens('/files/{yyyy}/{mm}/{dd}', AT)).toBe('/files/2026/02/23');
  });

  it('should substitute the two-digit year', () => {
    expect(resolveTokens('report_{yy}{mm}{dd}.csv', AT)).toBe('report_260223.csv');
  });

  it('should match tokens case-insensitively', () => {
    expect(resolveTokens('/in/{YYYY}-{Mm}-{DD}', AT)).toBe('/in/2026-02-23');
  });

  it('should leave unknown and unbalanced braces untouched', () => {
    expect(resolveTokens('/x/{foo}/{yyyy/{dd}', AT)).toBe('/x/{foo}/{yyyy/23');
  });

  it('should return patterns without tokens unchanged', () => {
    expect(resolveTokens('/static/path', AT)).toBe('/static/path');
    expect(resolveTokens('', AT)).toBe('');
  });

  it('should use the calendar date of the given zone', () => {
    const lateEvening = new Date('2026-02-23T03:00:00.000Z');
    expect(resolveTokens('{yyyy}{mm}{dd}', lateEvening)).toBe('20260223');
    expect(resolveTokens('{yyyy}{mm}{dd}', lateEvening, 'America/New_York')).toBe('20260222');
  });

  it('should resolve a leap day', () => {
    expect(resolveTokens('{dd}/{mm}', new Date('2028-02-29T12:00:00.000Z'))).toBe('29/02');
    expect(calendarDate(new Date('2028-02-29T23:59:59.999Z'))).toBe('2028-02-29');
  });

  it('should resolve the last day of the year', () => {
    const yearEnd = new Date('2026-12-31T23:30:00.000Z');
    expect(resolveTokens('{yy}/{yyyy}-{mm}-{dd}', yearEnd)).toBe('26/2026-12-31');
  });

  it('should keep the previous year in a zone still on New Year\'s Eve', () => {
    const newYearUtc = new Date('2027-01-01T03:00:00.000Z');
    expect(resolveTokens('{yyyy}{mm}{dd}', newYearUtc)).toBe('20270101');
    expect(resolveTokens('{yy}/{yyyy}/{mm}/{dd}', newYearUtc, 'America/New_York')).toBe('26/2026/12/31');
  });

  it('should fall back to UTC for an unknown zone', () => {
    expect(resolveTokens('{dd}', new Date('2026-02-23T03:00:00.000Z'), 'Nowhere/Special')).toBe('23');
  });
});

describe('calendarDate', () => {
  it('should format as YYYY-MM-DD', () => {
    expect(calendarDate(new Date('2026-01-05T23:59:59.000Z'))).toBe('2026-01-05');
    expect(calendarDate(new Date('2026-01-05T23:59:59.000Z'), 'Asia/Tokyo')).toBe('2026-01-06');
  });
});

describe('token inspection', () => {
  it('should detect supported tokens', () => {
    expect(containsTokens('/a/{MM}')).toBe(true);
    expect(containsTokens('/a/{month}')).toBe(false);
  });

  it('should list placeholders that are not date tokens', () => {
    expect(findUnknownTokens('a{foo}{yyyy}{Bar}{dd}')).toEqual(['{foo}', '{Bar}']);
    expect(findUnknownTokens('/files/{yyyy}')).toEqual([]);
  });
});
