import type { CommandContext, CommandDefinition } from "./core/CommandDefinition.js";
import { formatUtcTimestamp } from "./core/format.js";
import { capabilitiesText, summarizeCapabilities } from "../astro/capabilities/renderCapabilities.js";
import { dayOfYear, daysSinceUnixEpoch, julianDay, season } from "../astro/computeCalendar.js";

function currentData(now: Date): string {
  return [
    "**Date & Time:**",
    `• UTC: ${formatUtcTimestamp(now)}`,
    `• Julian Day: ${julianDay(now).toFixed(2)}`,
    `• Day of Year: ${dayOfYear(now)}`,
    "",
    "**Basic Calculations:**",
    `• Days since Unix Epoch: ${daysSinceUnixEpoch(now)}`,
    `• Current Season: ${season(now)}`,
    "• Time Zone Offset: UTC (Bot operates in UTC)",
  ].join("\n");
}

function render({ now, capabilities, runtime }: CommandContext): string {
  return [
    "🔮 **Detailed Compatibility Summary** 🔮",
    "",
    "**System Environment:**",
    `• Platform: ${runtime.platform} ${runtime.release}`,
    `• Node.js Version: ${runtime.nodeVersion}`,
    `• Architecture: ${runtime.arch}`,
    "",
    "**Astronomical Libraries Status:**",
    summarizeCapabilities(capabilities),
    "",
    "**Current Astronomical Data:**",
    currentData(now),
    "",
    "**Calculation Capabilities:**",
    capabilitiesText(capabilities),
    "",
    "**Integration Status:**",
    "✅ Command Routing: Fully operational",
    "✅ Error Handling: Implemented",
    "✅ Logging: Active",
    "",
    `**Last Updated:** ${formatUtcTimestamp(now)} UTC`,
    "",
    "All systems are operational and ready for astronomical calculations!",
  ].join("\n");
}

export const compatibilityCommand: CommandDefinition = {
  name: "compatibility",
  description: "Detailed compatibility analysis",
  keywords: ["compatibility", "match", "relationship"],
  errorReply: "❌ Error generating compatibility summary. Please try again later.",
  render,
};
