import type { CapabilitySet } from "../astro/capabilities/probeCapabilities.js";
import type { CommandDefinition } from "./core/CommandDefinition.js";
import { currentRuntimeInfo, type RuntimeInfo } from "./core/runtimeInfo.js";
import { runCommand, type CommandResult } from "./core/runCommand.js";
import { COMMANDS } from "./registry.js";
import { GENERAL_ROUTE, routeMessage } from "./routeMessage.js";
import { generalReply } from "./generalReply.js";
import { botLog, botLogHelpers, type BotLogger } from "../logging/botLog.js";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export type AstroBotOptions = {
  capabilities: CapabilitySet;
  clock?: Clock;
  runtime?: RuntimeInfo;
  logger?: BotLogger;
  commands?: readonly CommandDefinition[];
};

export interface AstroBot {
  /** Reply text for one incoming message. Never throws. */
  reply(text: string): string;
  handle(text: string): CommandResult;
}

export function createAstroBot(options: AstroBotOptions): AstroBot {
  const clock = options.clock ?? systemClock;
  const runtime = options.runtime ?? currentRuntimeInfo();
  const log = options.logger ?? botLog;
  const commands = options.commands ?? COMMANDS;
  const events = botLogHelpers(log);

  function handle(text: string): CommandResult {
    const route = routeMessage(text, commands);
    events.messageRouted(route);

    const now = clock.now();
    const command = commands.find((candidate) => candidate.name === route.command);
    if (!command) {
      return { command: GENERAL_ROUTE, ok: true, text: generalReply(now) };
    }

    return runCommand(command, { now, capabilities: options.capabilities, runtime }, log);
  }

  return {
    handle,
    reply: (text) => handle(text).text,
  };
}
