import type { CommandDefinition } from "./core/CommandDefinition.js";

export const GENERAL_ROUTE = "general";

export type MessageRoute = {
  /** A command name, or GENERAL_ROUTE. */
  command: string;
  slash: boolean;
};

/** "/Lunar@AstroBot now" -> "lunar" */
function slashCommandName(text: string): string | undefined {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s|$)/.exec(text);
  return match ? match[1].toLowerCase() : undefined;
}

export function routeMessage(
  text: string,
  commands: readonly CommandDefinition[]
): MessageRoute {
  const trimmed = text.trim();

  const slashName = slashCommandName(trimmed);
  if (slashName && commands.some((command) => command.name === slashName)) {
    return { command: slashName, slash: true };
  }

  const lowered = trimmed.toLowerCase();
  const matched = commands.find((command) =>
    command.keywords.some((keyword) => lowered.includes(keyword))
  );

  return { command: matched?.name ?? GENERAL_ROUTE, slash: false };
}
