import {
  LUNAR_CALENDAR_ENGINE,
  PROFESSIONAL_ENGINE,
  isCapabilityAvailable,
  type CapabilitySet,
} from "./probeCapabilities.js";

const BASELINE_CALCULATIONS = [
  "Julian Day conversions",
  "Basic astronomical time calculations",
  "Seasonal determinations",
  "Date arithmetic and conversions",
  "Time zone handling (UTC base)",
];

const PROFESSIONAL_CALCULATIONS = [
  `Professional astrological calculations (${PROFESSIONAL_ENGINE})`,
  "Planetary positions and aspects",
  "House calculations",
];

const LUNAR_CALENDAR_CALCULATIONS = [
  "Lunar calendar conversions",
  "Chinese lunar date calculations",
];

/**
 * Per-source status report, one block per probed source in probe order.
 */
export function summarizeCapabilities(capabilities: CapabilitySet): string {
  const lines: string[] = [];
  for (const record of capabilities.values()) {
    if (record.available) {
      lines.push(`• ✅ **${record.name}**: Available`);
      lines.push(`  - Version: ${record.version ?? "Unknown"}`);
      lines.push(`  - ${record.description}`);
    } else {
      lines.push(`• ❌ **${record.name}**: Not Available`);
      lines.push(`  - Error: ${record.error ?? "Unknown"}`);
    }
  }
  return lines.join("\n");
}

/**
 * Bullet list of what the bot can calculate. The baseline is always listed;
 * engine-backed bullets only appear for sources that loaded.
 */
export function capabilitiesText(capabilities: CapabilitySet): string {
  const calculations = [...BASELINE_CALCULATIONS];
  if (isCapabilityAvailable(capabilities, PROFESSIONAL_ENGINE)) {
    calculations.push(...PROFESSIONAL_CALCULATIONS);
  }
  if (isCapabilityAvailable(capabilities, LUNAR_CALENDAR_ENGINE)) {
    calculations.push(...LUNAR_CALENDAR_CALCULATIONS);
  }

  return [
    "**Available Calculations:**",
    ...calculations.map((calculation) => `• ✅ ${calculation}`),
  ].join("\n");
}
