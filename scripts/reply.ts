// Prints the bot's reply to one message. No chat transport involved.
import { probeCapabilities } from "../astro/capabilities/probeCapabilities.js";
import { createAstroBot, systemClock } from "../commands/createAstroBot.js";
import { loadConfig } from "../lib/env.js";
import { botLog, botLogHelpers, silentLogger } from "../logging/botLog.js";

function usage() {
  console.error('Usage: tsx scripts/reply.ts [--quiet] "<message>"');
}

async function main() {
  const args = process.argv.slice(2);
  const quiet = args.includes("--quiet");
  const message = args.filter((arg) => arg !== "--quiet").join(" ");
  if (!message.trim()) {
    usage();
    process.exit(1);
  }

  const config = loadConfig();
  const logger = quiet || config.logFormat === "silent" ? silentLogger : botLog;

  const capabilities = probeCapabilities();
  const records = [...capabilities.values()];
  botLogHelpers(logger).capabilitiesProbed({
    available: records.filter((r) => r.available).map((r) => r.name),
    unavailable: records.filter((r) => !r.available).map((r) => r.name),
  });

  const fixedNow = config.fixedNow;
  const bot = createAstroBot({
    capabilities,
    clock: fixedNow ? { now: () => fixedNow } : systemClock,
    logger,
  });

  console.log(bot.reply(message));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
