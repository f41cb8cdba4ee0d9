import type { CommandDefinition } from "./core/CommandDefinition.js";

const WELCOME = `🌟 **Welcome to Astronomical Bot!** 🌟

I'm your personal astrology and lunar calendar assistant.

**Available Commands:**
/start - Show this welcome message
/help - Get detailed help
/compatibility - Get detailed compatibility analysis
/lunar - Lunar calendar information
/chart - Basic astrological chart info

**Features:**
✨ Astrological compatibility analysis
🌙 Lunar calendar calculations
🔮 Chart interpretations
📅 Astronomical calculations

Just send me a message or use any command to get started!`;

export const startCommand: CommandDefinition = {
  name: "start",
  description: "Welcome message and overview",
  keywords: [],
  errorReply: "❌ Error showing the welcome message. Please try again later.",
  render: () => WELCOME,
};
