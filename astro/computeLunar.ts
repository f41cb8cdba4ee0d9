/**
 * Approximate lunar cycle from the calendar alone.
 *
 * The cycle is anchored to ordinal day 0 (see computeCalendar.ordinalDay), not to an
 * observed new moon, so it drifts from the real sky. Use an ephemeris for anything
 * that has to match what is overhead.
 */

import { addDays, ordinalDay, toIsoDate } from "./computeCalendar.js";

export type LunarPhaseLabel = "New" | "Waxing" | "Full" | "Waning";

/** Mean synodic month, in days. */
export const SYNODIC_MONTH_DAYS = 29.53;

/** x modulo y, in [0, y). */
function mod(x: number, y: number): number {
  return ((x % y) + y) % y;
}

function cycleDay(instant: Date): number {
  return mod(ordinalDay(instant), SYNODIC_MONTH_DAYS);
}

/** Position within the current cycle, in [0, 100). */
export function lunarProgressPercent(instant: Date): number {
  return (cycleDay(instant) / SYNODIC_MONTH_DAYS) * 100;
}

export function daysToNewMoon(instant: Date): number {
  return mod(SYNODIC_MONTH_DAYS - cycleDay(instant), SYNODIC_MONTH_DAYS);
}

export function daysToFullMoon(instant: Date): number {
  return mod(SYNODIC_MONTH_DAYS / 2 - cycleDay(instant), SYNODIC_MONTH_DAYS);
}

/** YYYY-MM-DD (UTC) of the approximate next new moon. */
export function nextNewMoonDate(instant: Date): string {
  return toIsoDate(addDays(instant, daysToNewMoon(instant)));
}

/** YYYY-MM-DD (UTC) of the approximate next full moon. */
export function nextFullMoonDate(instant: Date): string {
  return toIsoDate(addDays(instant, daysToFullMoon(instant)));
}

export function phaseLabelForProgress(progressPercent: number): LunarPhaseLabel {
  if (progressPercent < 25) {
    return "New";
  } else if (progressPercent < 50) {
    return "Waxing";
  } else if (progressPercent < 75) {
    return "Full";
  }
  return "Waning";
}

export function lunarPhaseLabel(instant: Date): LunarPhaseLabel {
  return phaseLabelForProgress(lunarProgressPercent(instant));
}
