/**
 * Everything the calculator knows about one UTC instant, in one value.
 * Recomputed per request; nothing here is cached.
 */

import { dayOfYear, julianDay, season, toIsoDate } from "./computeCalendar.js";
import {
  lunarPhaseLabel,
  lunarProgressPercent,
  nextFullMoonDate,
  nextNewMoonDate,
} from "./computeLunar.js";
import type { CalendarSnapshot } from "./schemas/calendarSnapshot.schema.js";

export function computeCalendarSnapshot(instant: Date): CalendarSnapshot {
  return {
    utc_datetime: instant.toISOString(),
    date: toIsoDate(instant),
    julian_day: julianDay(instant),
    day_of_year: dayOfYear(instant),
    season: season(instant),
    lunar_cycle_progress_pct: lunarProgressPercent(instant),
    lunar_phase_label: lunarPhaseLabel(instant),
    next_new_moon_date: nextNewMoonDate(instant),
    next_full_moon_date: nextFullMoonDate(instant),
  };
}
