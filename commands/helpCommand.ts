import type { CommandDefinition } from "./core/CommandDefinition.js";
import { CAPABILITY_SOURCES } from "../astro/capabilities/probeCapabilities.js";

export const helpCommand: CommandDefinition = {
  name: "help",
  description: "This help message",
  keywords: [],
  errorReply: "❌ Error showing help. Please try again later.",
  render: () =>
    [
      "🔮 **Astronomical Bot Help** 🔮",
      "",
      "**Commands:**",
      "• /start - Welcome message and overview",
      "• /help - This help message",
      "• /compatibility - Detailed compatibility analysis",
      "• /lunar - Current lunar phase and calendar info",
      "• /chart - Basic astrological information",
      "",
      "**How to use:**",
      "1. Use /compatibility to get a comprehensive compatibility summary",
      "2. Use /lunar to see current moon phase and lunar calendar details",
      "3. Use /chart for basic astrological chart information",
      "4. Send any message for general astronomical info",
      "",
      "**Optional Libraries:**",
      ...CAPABILITY_SOURCES.map((source) => `• ${source.name} - ${source.description}`),
      "",
      "Need specific calculations? Just ask!",
    ].join("\n"),
};
