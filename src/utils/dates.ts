import { differenceInCalendarDays, format, parseISO, subDays } from 'date-fns';

/** Calendar dates are stored as `yyyy-MM-dd` strings throughout */
export const DATE_FORMAT = 'yyyy-MM-dd';

export function toIsoDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function today(): string {
  return toIsoDate(new Date());
}

export function previousDay(isoDate: string): string {
  return toIsoDate(subDays(parseISO(isoDate), 1));
}

export function daysAgo(isoDate: string, days: number): string {
  return toIsoDate(subDays(parseISO(isoDate), days));
}

/**
 * Whole days between two `yyyy-MM-dd` dates, or null when either side is missing
 * or the range is negative.
 */
export function daysBetween(fromIsoDate: string | null | undefined, toIsoDateValue: string): number | null {
  if (!fromIsoDate) return null;

  const days = differenceInCalendarDays(parseISO(toIsoDateValue), parseISO(fromIsoDate));
  return Number.isNaN(days) || days < 0 ? null : days;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClock(date: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  }).formatToParts(date);

  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(part => part.type === type)?.value ?? 0);

  return {
    year: field('year'),
    month: field('month'),
    day: field('day'),
    hour: field('hour'),
    minute: field('minute'),
    second: field('second'),
  };
}

/** Milliseconds the zone is ahead of UTC at the given instant */
function zoneOffsetMs(date: Date, timeZone: string): number {
  const wall = wallClock(date, timeZone);
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return wallAsUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/** The instant a wall-clock time occurs in the zone (month is 1-12) */
export function zonedTimeToUtc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string
): Date {
  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const offset = zoneOffsetMs(new Date(guess), timeZone);
  const corrected = zoneOffsetMs(new Date(guess - offset), timeZone);
  return new Date(guess - corrected);
}

/**
 * Next occurrence of hour:minute on the zone's clock, strictly after `now`.
 */
export function nextDailyRun(hour: number, minute: number, timeZone: string, now: Date = new Date()): Date {
  const wall = wallClock(now, timeZone);
  const todayRun = zonedTimeToUtc(wall.year, wall.month, wall.day, hour, minute, timeZone);
  if (todayRun > now) return todayRun;

  const tomorrow = new Date(Date.UTC(wall.year, wall.month - 1, wall.day + 1));
  return zonedTimeToUtc(
    tomorrow.getUTCFullYear(),
    tomorrow.getUTCMonth() + 1,
    tomorrow.getUTCDate(),
    hour,
    minute,
    timeZone
  );
}
