import { describe, expect, it } from "vitest";
import { compatibilityCommand } from "../compatibilityCommand.js";
import { lunarCommand, lunarSignificance } from "../lunarCommand.js";
import { chartCommand } from "../chartCommand.js";
import { helpCommand } from "../helpCommand.js";
import { startCommand } from "../startCommand.js";
import { contextWith } from "./testHelpers.js";

function lines(text: string): string[] {
  return text.split("\n");
}

describe("compatibilityCommand", () => {
  it("reports runtime, calendar data and library status", () => {
    const text = lines(compatibilityCommand.render(contextWith({ luxon: "3.4.4" })));

    expect(text[0]).toBe("🔮 **Detailed Compatibility Summary** 🔮");
    expect(text).toContain("• Platform: Linux 6.1.0");
    expect(text).toContain("• Node.js Version: 20.11.1");
    expect(text).toContain("• Architecture: x64");
    expect(text).toContain("• ✅ **luxon**: Available");
    expect(text).toContain("• ❌ **swisseph**: Not Available");
    expect(text).toContain("• UTC: 2000-01-01 12:00:00");
    expect(text).toContain("• Julian Day: 2451545.00");
    expect(text).toContain("• Day of Year: 1");
    expect(text).toContain("• Days since Unix Epoch: 10957");
    expect(text).toContain("• Current Season: Winter");
    expect(text).toContain("• ✅ Julian Day conversions");
    expect(text).toContain("**Last Updated:** 2000-01-01 12:00:00 UTC");
  });
});

describe("lunarCommand", () => {
  it("prints the approximate cycle for the current instant", () => {
    const text = lines(lunarCommand.render(contextWith()));

    expect(text).toContain("• Next New Moon: 2000-01-10");
    expect(text).toContain("• Next Full Moon: 2000-01-25");
    expect(text).toContain("• Lunar Month Progress: 68.7%");
    expect(text[text.length - 1]).toBe(lunarSignificance("Full"));
  });

  it("falls back to the basic note without a lunar calendar engine", () => {
    const text = lines(lunarCommand.render(contextWith()));

    expect(text).toContain("**Basic Lunar Information:**");
    expect(text).toContain("**Note:** Install lunar-javascript for full lunar calendar functionality");
  });

  it("mentions the lunar calendar engine when it loaded", () => {
    const text = lines(lunarCommand.render(contextWith({ "lunar-javascript": "1.6.12" })));

    expect(text).toContain("• lunar-javascript 1.6.12 is installed");
    expect(text).toContain("• Solar Date: 2000-01-01");
    expect(text).not.toContain("**Basic Lunar Information:**");
  });
});

describe("chartCommand", () => {
  it("offers professional calculations when the engine loaded", () => {
    const text = lines(chartCommand.render(contextWith({ swisseph: "0.5.17" })));

    expect(text).toContain("**Professional Chart Calculations Available:**");
    expect(text).toContain("Professional aspect calculations available via swisseph");
  });

  it("recommends the engine when it is missing", () => {
    const text = lines(chartCommand.render(contextWith()));

    expect(text).toContain("**Basic Chart Information:**");
    expect(text).toContain("Basic astronomical time calculations available");
    expect(text).toContain("For detailed aspect calculations, swisseph is required");
  });
});

describe("static replies", () => {
  it("lists every command in the welcome text", () => {
    const text = startCommand.render(contextWith());
    for (const name of ["/start", "/help", "/compatibility", "/lunar", "/chart"]) {
      expect(text).toContain(name);
    }
  });

  it("lists the optional libraries in help", () => {
    expect(lines(helpCommand.render(contextWith()))).toContain(
      "• swisseph - Professional astrological calculations"
    );
  });
});
