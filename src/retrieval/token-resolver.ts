import { DateTime } from 'luxon';
import { logger } from '../logger.js';

export const SUPPORTED_TOKENS = ['yyyy', 'yy', 'mm', 'dd'] as const;
export type DateToken = (typeof SUPPORTED_TOKENS)[number];

const TOKEN_PATTERN = /\{(yyyy|yy|mm|dd)\}/gi;
const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g;

export interface CalendarParts {
  year: number;
  month: number;
  day: number;
}

function isDateToken(value: string): value is DateToken {
  return SUPPORTED_TOKENS.some((token) => token === value);
}

/**
 * Calendar date of an instant as seen in the given IANA zone.
 * An unusable zone falls back to UTC.
 */
export function calendarParts(at: Date, timeZone: string = 'UTC'): CalendarParts {
  let local = DateTime.fromJSDate(at, { zone: timeZone });
  if (!local.isValid) {
    logger.warn('Unknown token timezone, using UTC', { timeZone }, 'TokenResolver');
    local = DateTime.fromJSDate(at, { zone: 'UTC' });
  }
  return { year: local.year, month: local.month, day: local.day };
}

export function calendarDate(at: Date, timeZone: string = 'UTC'): string {
  const { year, month, day } = calendarParts(at, timeZone);
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function tokenValue(token: DateToken, parts: CalendarParts): string {
  switch (token) {
    case 'yyyy':
      return String(parts.year).padStart(4, '0');
    case 'yy':
      return String(parts.year % 100).padStart(2, '0');
    case 'mm':
      return String(parts.month).padStart(2, '0');
    case 'dd':
      return String(parts.day).padStart(2, '0');
  }
}

/**
 * Replace {yyyy} {yy} {mm} {dd} (any case) with the date of `at`.
 * Anything else, including unknown or unbalanced braces, is left as written.
 */
export function resolveTokens(pattern: string, at: Date, timeZone: string = 'UTC'): string {
  if (!pattern) return pattern;
  const parts = calendarParts(at, timeZone);
  return pattern.replace(TOKEN_PATTERN, (match, name: string) => {
    const token = name.toLowerCase();
    return isDateToken(token) ? tokenValue(token, parts) : match;
  });
}

export function containsTokens(pattern: string): boolean {
  return /\{(yyyy|yy|mm|dd)\}/i.test(pattern);
}

/**
 * Brace placeholders that are not date tokens, in order of appearance
 */
export function findUnknownTokens(pattern: string): string[] {
  const unknown: string[] = [];
  for (const match of pattern.matchAll(PLACEHOLDER_PATTERN)) {
    if (!isDateToken(match[1].toLowerCase())) {
      unknown.push(match[0]);
    }
  }
  return unknown;
}
