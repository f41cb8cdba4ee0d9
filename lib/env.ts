import { z } from "zod";

export class ConfigError extends Error {
  constructor(public variable: string, detail: string) {
    super(`Invalid ${variable}: ${detail}`);
    this.name = "ConfigError";
  }
}

const EnvSchema = z.object({
  ASTRO_BOT_NOW: z
    .string()
    .datetime({ offset: true })
    .optional(),
  ASTRO_BOT_LOG: z.enum(["json", "silent"]).default("json"),
});

export type BotConfig = {
  /** Pinned clock; replies use the real time when absent. */
  fixedNow?: Date;
  logFormat: "json" | "silent";
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): BotConfig {
  const parsed = EnvSchema.safeParse({
    ASTRO_BOT_NOW: env.ASTRO_BOT_NOW || undefined,
    ASTRO_BOT_LOG: env.ASTRO_BOT_LOG || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? "environment"), issue?.message ?? "invalid value");
  }

  return {
    fixedNow: parsed.data.ASTRO_BOT_NOW ? new Date(parsed.data.ASTRO_BOT_NOW) : undefined,
    logFormat: parsed.data.ASTRO_BOT_LOG,
  };
}
