import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../env.js";

describe("loadConfig", () => {
  it("defaults to the live clock and JSON logs", () => {
    expect(loadConfig({})).toEqual({ fixedNow: undefined, logFormat: "json" });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ ASTRO_BOT_NOW: "", ASTRO_BOT_LOG: "" }).logFormat).toBe("json");
  });

  it("pins the clock from ASTRO_BOT_NOW", () => {
    const config = loadConfig({ ASTRO_BOT_NOW: "2024-03-15T06:00:00Z", ASTRO_BOT_LOG: "silent" });

    expect(config.fixedNow?.toISOString()).toBe("2024-03-15T06:00:00.000Z");
    expect(config.logFormat).toBe("silent");
  });

  it("names the variable that failed to parse", () => {
    expect(() => loadConfig({ ASTRO_BOT_NOW: "yesterday" })).toThrow(ConfigError);
    expect(() => loadConfig({ ASTRO_BOT_LOG: "verbose" })).toThrow(/^Invalid ASTRO_BOT_LOG: /);
  });
});
