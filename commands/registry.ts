import type { CommandDefinition } from "./core/CommandDefinition.js";
import { startCommand } from "./startCommand.js";
import { helpCommand } from "./helpCommand.js";
import { compatibilityCommand } from "./compatibilityCommand.js";
import { lunarCommand } from "./lunarCommand.js";
import { chartCommand } from "./chartCommand.js";

/** Keyword routing tries commands in this order. */
export const COMMANDS: readonly CommandDefinition[] = [
  startCommand,
  helpCommand,
  compatibilityCommand,
  lunarCommand,
  chartCommand,
];
