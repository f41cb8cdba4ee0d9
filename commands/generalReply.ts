import { formatUtcTimestamp } from "./core/format.js";

export function generalReply(now: Date): string {
  return [
    "🌟 **Astronomical Information** 🌟",
    "",
    "Thanks for your message! I can help you with:",
    "",
    "• **Compatibility Analysis** - Use /compatibility",
    "• **Lunar Information** - Use /lunar",
    "• **Astrological Charts** - Use /chart",
    "",
    `Current system time: ${formatUtcTimestamp(now)} UTC`,
    "",
    "What would you like to explore?",
  ].join("\n");
}
