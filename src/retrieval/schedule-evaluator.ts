/**
 * Cron evaluation in an IANA timezone.
 *
 * Field sets come from cron-parser; the search for the next occurrence walks
 * local calendar days and maps each matching wall-clock time to an instant:
 *
 * - a wall time skipped by a spring-forward transition fires at the
 *   transition instant (the first valid instant after the gap)
 * - a wall time repeated by a fall-back transition fires once, at its
 *   first occurrence
 *
 * Day-of-month and day-of-week combine like classic cron: when both are
 * restricted a day matching either one is a match.
 */

import cronParser from 'cron-parser';
import { IANAZone } from 'luxon';
import { ValidationError } from './errors.js';
import { ScheduleDefinition } from './types.js';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
// Furthest a local wall time can sit from UTC in either direction, plus slack
const MAX_OFFSET = 15 * HOUR;
const SEARCH_DAYS = 366 * 5;

export interface CronSchedule {
  expression: string;
  minutes: number[];
  hours: number[];
  daysOfMonth: Set<number>;
  lastDayOfMonth: boolean;
  months: Set<number>;
  daysOfWeek: Set<number>;
  domRestricted: boolean;
  dowRestricted: boolean;
}

const scheduleCache = new Map<string, CronSchedule>();

// A stepped star such as */5 still restricts the field
function isWildcard(field: string): boolean {
  return field === '*' || field === '?';
}

export function parseCron(expression: string): CronSchedule {
  const trimmed = expression.trim();
  const cached = scheduleCache.get(trimmed);
  if (cached) return cached;

  const parts = trimmed.split(/\s+/);
  if (parts.length !== 5) {
    throw new ValidationError([
      `Cron expression must have 5 fields (minute hour day-of-month month day-of-week): "${expression}"`,
    ]);
  }
  if (trimmed.includes('#')) {
    throw new ValidationError([`Nth-weekday (#) cron syntax is not supported: "${expression}"`]);
  }
  if (/l/i.test(parts[4])) {
    throw new ValidationError([`Last-weekday (L) cron syntax is not supported: "${expression}"`]);
  }

  let fields: ReturnType<typeof cronParser.parseExpression>['fields'];
  try {
    fields = cronParser.parseExpression(trimmed, { utc: true }).fields;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError([`Invalid cron expression "${expression}": ${reason}`]);
  }

  const daysOfMonth = new Set<number>();
  let lastDayOfMonth = false;
  for (const value of fields.dayOfMonth) {
    if (value === 'L') {
      lastDayOfMonth = true;
    } else {
      daysOfMonth.add(value);
    }
  }

  const schedule: CronSchedule = {
    expression: trimmed,
    minutes: [...fields.minute].sort((a, b) => a - b),
    hours: [...fields.hour].sort((a, b) => a - b),
    daysOfMonth,
    lastDayOfMonth,
    months: new Set<number>(fields.month),
    daysOfWeek: new Set<number>(fields.dayOfWeek.map((day) => day % 7)),
    domRestricted: !isWildcard(parts[2]),
    dowRestricted: !isWildcard(parts[4]),
  };

  if (scheduleCache.size > 500) {
    scheduleCache.clear();
  }
  scheduleCache.set(trimmed, schedule);
  return schedule;
}

export function isValidCronExpression(expression: string): boolean {
  try {
    parseCron(expression);
    return true;
  } catch {
    return false;
  }
}

export function isValidTimezone(timezone: string): boolean {
  return timezone.trim().length > 0 && IANAZone.isValidZone(timezone);
}

function resolveZone(timezone: string): IANAZone {
  if (!isValidTimezone(timezone)) {
    throw new ValidationError([`Unknown IANA timezone: "${timezone}"`]);
  }
  return IANAZone.create(timezone);
}

function dayMatches(schedule: CronSchedule, dayStartMs: number): boolean {
  const date = new Date(dayStartMs);
  const dayOfMonth = date.getUTCDate();
  const dayOfWeek = date.getUTCDay();
  const daysInMonth = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)).getUTCDate();

  const domMatch = schedule.daysOfMonth.has(dayOfMonth) || (schedule.lastDayOfMonth && dayOfMonth === daysInMonth);
  const dowMatch = schedule.daysOfWeek.has(dayOfWeek);

  if (schedule.domRestricted && schedule.dowRestricted) {
    return domMatch || dowMatch;
  }
  // An unrestricted field holds every value, so AND reduces to the other one
  return domMatch && dowMatch;
}

/**
 * Instant for a wall-clock time, where `wallMs` encodes the local time as if
 * it were UTC.
 */
export function wallTimeToInstant(wallMs: number, zone: IANAZone): number {
  const offsets = new Set([zone.offset(wallMs - DAY), zone.offset(wallMs), zone.offset(wallMs + DAY)]);
  const candidates = [...offsets].map((offset) => wallMs - offset * MINUTE);
  const valid = candidates.filter((instant) => zone.offset(instant) * MINUTE === wallMs - instant);

  if (valid.length > 0) {
    // Repeated wall time: first occurrence
    return Math.min(...valid);
  }

  if (candidates.length < 2) {
    return wallMs - zone.offset(wallMs) * MINUTE;
  }

  // Skipped wall time: the transition instant lies between the candidates
  let low = Math.min(...candidates);
  let high = Math.max(...candidates);
  const offsetAfter = zone.offset(high);
  while (high - low > 1) {
    const middle = Math.floor((low + high) / 2);
    if (zone.offset(middle) === offsetAfter) {
      high = middle;
    } else {
      low = middle;
    }
  }
  return high;
}

/**
 * First occurrence strictly after `after`
 */
export function nextRun(cronExpression: string, timezone: string, after: Date): Date {
  const schedule = parseCron(cronExpression);
  const zone = resolveZone(timezone);
  const afterMs = after.getTime();
  if (!Number.isFinite(afterMs)) {
    throw new ValidationError(['Reference time is not a valid date']);
  }

  const localNow = new Date(afterMs + zone.offset(afterMs) * MINUTE);
  const firstDay = Date.UTC(localNow.getUTCFullYear(), localNow.getUTCMonth(), localNow.getUTCDate() - 1);

  for (let dayIndex = 0; dayIndex <= SEARCH_DAYS; dayIndex++) {
    const dayStart = firstDay + dayIndex * DAY;
    const month = new Date(dayStart).getUTCMonth() + 1;
    if (!schedule.months.has(month) || !dayMatches(schedule, dayStart)) {
      continue;
    }

    for (const hour of schedule.hours) {
      for (const minute of schedule.minutes) {
        const wallMs = dayStart + hour * HOUR + minute * MINUTE;
        if (wallMs + MAX_OFFSET < afterMs) continue;

        const instant = wallTimeToInstant(wallMs, zone);
        if (instant > afterMs) {
          return new Date(instant);
        }
      }
    }
  }

  throw new ValidationError([`Cron expression "${cronExpression}" has no occurrence within ${SEARCH_DAYS} days`]);
}

/**
 * Whether a run is due at `now`. Without a previous run, a configuration is
 * due when an occurrence fell within the minute ending at `now`.
 */
export function isDue(cronExpression: string, timezone: string, lastRun: Date | null, now: Date): boolean {
  const reference = lastRun ?? new Date(now.getTime() - MINUTE);
  return nextRun(cronExpression, timezone, reference).getTime() <= now.getTime();
}

export function nextScheduledRun(schedule: ScheduleDefinition, after: Date): Date {
  return nextRun(schedule.cronExpression, schedule.timezone, after);
}

/**
 * Human readable distance to the next run
 */
export function describeNextRun(schedule: ScheduleDefinition, from: Date = new Date()): string {
  let next: Date;
  try {
    next = nextScheduledRun(schedule, from);
  } catch {
    return 'Unable to calculate next execution time';
  }

  const untilMs = next.getTime() - from.getTime();
  if (untilMs < MINUTE) return 'In less than 1 minute';
  if (untilMs < HOUR) return `In ${Math.floor(untilMs / MINUTE)} minutes`;
  if (untilMs < DAY) return `In ${Math.floor(untilMs / HOUR)} hours`;
  return `In ${Math.floor(untilMs / DAY)} days`;
}
