import type { CommandContext, CommandDefinition } from "./core/CommandDefinition.js";
import { formatOneDecimal } from "./core/format.js";
import { LUNAR_CALENDAR_ENGINE } from "../astro/capabilities/probeCapabilities.js";
import { toIsoDate } from "../astro/computeCalendar.js";
import {
  lunarPhaseLabel,
  lunarProgressPercent,
  nextFullMoonDate,
  nextNewMoonDate,
  type LunarPhaseLabel,
} from "../astro/computeLunar.js";

const PHASE_SIGNIFICANCE: Record<LunarPhaseLabel, string> = {
  New: "🌑 New Moon Phase - Time for new beginnings and setting intentions",
  Waxing: "🌓 Waxing Phase - Time for growth and building momentum",
  Full: "🌕 Full Moon Phase - Time for culmination and manifestation",
  Waning: "🌗 Waning Phase - Time for release and letting go",
};

export function lunarSignificance(label: LunarPhaseLabel): string {
  return PHASE_SIGNIFICANCE[label];
}

function lunarCalendarInfo({ now, capabilities }: CommandContext): string {
  const engine = capabilities.get(LUNAR_CALENDAR_ENGINE);
  if (engine?.available) {
    return [
      "**Lunar Calendar Engine:**",
      `• ${engine.name} ${engine.version ?? "Unknown"} is installed`,
      `• Solar Date: ${toIsoDate(now)}`,
      "• Traditional Chinese calendar conversions are supported",
    ].join("\n");
  }
  return [
    "**Basic Lunar Information:**",
    "• Current date calculations available",
    "• Lunar phase estimation: Based on mathematical approximation",
    `• For precise lunar calendar data, ${LUNAR_CALENDAR_ENGINE} is needed`,
    "",
    `**Note:** Install ${LUNAR_CALENDAR_ENGINE} for full lunar calendar functionality`,
  ].join("\n");
}

function render(ctx: CommandContext): string {
  const { now } = ctx;
  return [
    "🌙 **Lunar Calendar Information** 🌙",
    "",
    lunarCalendarInfo(ctx),
    "",
    "**Additional Lunar Data:**",
    `• Next New Moon: ${nextNewMoonDate(now)}`,
    `• Next Full Moon: ${nextFullMoonDate(now)}`,
    `• Lunar Month Progress: ${formatOneDecimal(lunarProgressPercent(now))}%`,
    "",
    "**Astrological Significance:**",
    lunarSignificance(lunarPhaseLabel(now)),
  ].join("\n");
}

export const lunarCommand: CommandDefinition = {
  name: "lunar",
  description: "Current lunar phase and calendar info",
  keywords: ["moon", "lunar", "phase"],
  errorReply: "❌ Error retrieving lunar information. Please try again later.",
  render,
};
