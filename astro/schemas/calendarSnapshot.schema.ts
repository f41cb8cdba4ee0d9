import { z } from "zod";

const SEASONS = ["Spring", "Summer", "Autumn", "Winter"] as const;
const LUNAR_PHASE_LABELS = ["New", "Waxing", "Full", "Waning"] as const;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

/**
 * Zod schema for a calendar snapshot.
 *
 * A snapshot is derived from one UTC instant and is never persisted; the schema
 * exists so callers that receive one over a boundary can check it.
 */
export const CalendarSnapshotSchema = z.object({
  utc_datetime: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
  date: IsoDateSchema,
  julian_day: z.number(),
  day_of_year: z.number().int().min(1).max(366),
  season: z.enum(SEASONS),
  lunar_cycle_progress_pct: z.number().min(0).lt(100),
  lunar_phase_label: z.enum(LUNAR_PHASE_LABELS),
  next_new_moon_date: IsoDateSchema,
  next_full_moon_date: IsoDateSchema,
});

export type CalendarSnapshot = z.infer<typeof CalendarSnapshotSchema>;
