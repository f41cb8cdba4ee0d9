import type { CommandContext, CommandDefinition } from "./core/CommandDefinition.js";
import { PROFESSIONAL_ENGINE, isCapabilityAvailable } from "../astro/capabilities/probeCapabilities.js";

function render({ capabilities }: CommandContext): string {
  const professional = isCapabilityAvailable(capabilities, PROFESSIONAL_ENGINE);

  const chartInfo = professional
    ? [
        "**Professional Chart Calculations Available:**",
        `• ${PROFESSIONAL_ENGINE} is loaded and ready`,
        "• Planetary positions can be calculated",
        "• House systems supported",
        "• Aspect calculations available",
        "",
        "*Provide birth details for personalized chart*",
      ]
    : [
        "**Basic Chart Information:**",
        "• Current date and time calculations",
        "• Seasonal information",
        "• Basic astronomical data available",
        "",
        `*For professional chart calculations, ${PROFESSIONAL_ENGINE} is recommended*`,
      ];

  return [
    "⭐ **Basic Astrological Chart Information** ⭐",
    "",
    ...chartInfo,
    "",
    "**Current Planetary Positions:**",
    professional
      ? `Professional planetary position calculations available via ${PROFESSIONAL_ENGINE}`
      : "Basic astronomical time calculations available",
    "",
    "**Aspects and Transits:**",
    professional
      ? `Professional aspect calculations available via ${PROFESSIONAL_ENGINE}`
      : `For detailed aspect calculations, ${PROFESSIONAL_ENGINE} is required`,
    "",
    "*Note: For detailed natal charts, please provide birth date, time, and location.*",
  ].join("\n");
}

export const chartCommand: CommandDefinition = {
  name: "chart",
  description: "Basic astrological information",
  keywords: ["chart", "horoscope", "astrology"],
  errorReply: "❌ Error generating chart information. Please try again later.",
  render,
};
