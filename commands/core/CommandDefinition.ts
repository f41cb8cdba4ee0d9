import type { CapabilitySet } from "../../astro/capabilities/probeCapabilities.js";
import type { RuntimeInfo } from "./runtimeInfo.js";

export interface CommandContext {
  now: Date;
  capabilities: CapabilitySet;
  runtime: RuntimeInfo;
}

export interface CommandDefinition {
  name: string;
  description: string;

  /** Lowercase words that route free text to this command. */
  keywords: readonly string[];

  /** Reply sent when render throws. */
  errorReply: string;

  render(ctx: CommandContext): string;
}
