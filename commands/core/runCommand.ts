import type { CommandContext, CommandDefinition } from "./CommandDefinition.js";
import { botLogHelpers, type BotLogger } from "../../logging/botLog.js";

export type CommandResult = {
  command: string;
  ok: boolean;
  text: string;
};

/**
 * Render a command. A render error is logged and answered with the command's
 * error reply; it never reaches the caller.
 */
export function runCommand(
  command: CommandDefinition,
  ctx: CommandContext,
  log: BotLogger
): CommandResult {
  const events = botLogHelpers(log);
  const startedAt = Date.now();

  try {
    const text = command.render(ctx);
    events.commandSucceeded({
      command: command.name,
      duration_ms: Date.now() - startedAt,
    });
    return { command: command.name, ok: true, text };
  } catch (err) {
    events.commandFailed({
      command: command.name,
      duration_ms: Date.now() - startedAt,
      error_message: err instanceof Error ? err.message : String(err),
    });
    return { command: command.name, ok: false, text: command.errorReply };
  }
}
