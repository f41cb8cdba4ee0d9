/**
 * Pure calendar arithmetic on UTC instants.
 * No ephemeris, no timezones: every function reads the UTC fields of the Date.
 */

export type Season = "Spring" | "Summer" | "Autumn" | "Winter";

const MS_PER_DAY = 86_400_000;

/** Proleptic Gregorian ordinal of 1970-01-01, counting 0001-01-01 as day 1. */
export const UNIX_EPOCH_ORDINAL = 719_163;

const CUMULATIVE_DAYS = [0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Julian Day for a UTC instant.
 *
 * The integer part is the Gregorian Julian Day Number of the calendar date; the
 * time of day is counted from noon, since that is when the astronomical day starts.
 */
export function julianDay(instant: Date): number {
  const year = instant.getUTCFullYear();
  const month = instant.getUTCMonth() + 1;
  const day = instant.getUTCDate();

  const a = Math.floor((14 - month) / 12);
  const y = year + 4800 - a;
  const m = month + 12 * a - 3;

  const jdn =
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045;

  const hours =
    instant.getUTCHours() +
    instant.getUTCMinutes() / 60 +
    instant.getUTCSeconds() / 3600;

  return jdn + (hours - 12) / 24;
}

/**
 * Northern-hemisphere season for a calendar month (1-12) and day.
 *
 * Boundaries: Mar 20, Jun 21, Sep 22, Dec 21.
 */
export function seasonFor(month: number, day: number): Season {
  if ((month === 3 && day >= 20) || month === 4 || month === 5 || (month === 6 && day < 21)) {
    return "Spring";
  }
  if ((month === 6 && day >= 21) || month === 7 || month === 8 || (month === 9 && day < 22)) {
    return "Summer";
  }
  if ((month === 9 && day >= 22) || month === 10 || month === 11 || (month === 12 && day < 21)) {
    return "Autumn";
  }
  return "Winter";
}

export function season(instant: Date): Season {
  return seasonFor(instant.getUTCMonth() + 1, instant.getUTCDate());
}

/** 1-based day within the UTC calendar year. */
export function dayOfYear(instant: Date): number {
  const month = instant.getUTCMonth();
  const leapDay = month > 1 && isLeapYear(instant.getUTCFullYear()) ? 1 : 0;
  return CUMULATIVE_DAYS[month] + leapDay + instant.getUTCDate();
}

/** Whole UTC days since 1970-01-01 (negative before it). */
export function daysSinceUnixEpoch(instant: Date): number {
  return Math.floor(instant.getTime() / MS_PER_DAY);
}

/** Proleptic Gregorian day number of the UTC date; 0001-01-01 is 1. */
export function ordinalDay(instant: Date): number {
  return daysSinceUnixEpoch(instant) + UNIX_EPOCH_ORDINAL;
}

/** UTC calendar date as YYYY-MM-DD. */
export function toIsoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function addDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * MS_PER_DAY);
}
