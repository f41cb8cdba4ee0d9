import { describe, expect, it } from "vitest";
import { probeCapabilities, type CapabilityLoader } from "../probeCapabilities.js";
import { capabilitiesText, summarizeCapabilities } from "../renderCapabilities.js";

const BASELINE = [
  "• ✅ Julian Day conversions",
  "• ✅ Basic astronomical time calculations",
  "• ✅ Seasonal determinations",
  "• ✅ Date arithmetic and conversions",
  "• ✅ Time zone handling (UTC base)",
];

const PROFESSIONAL_BULLET = "• ✅ Professional astrological calculations (swisseph)";

function loaderFor(installed: Record<string, string>): CapabilityLoader {
  return (name) => {
    const version = installed[name];
    if (version === undefined) {
      throw new Error(`Cannot find module '${name}'`);
    }
    return { version };
  };
}

describe("summarizeCapabilities", () => {
  it("renders status, version and description per source", () => {
    const capabilities = probeCapabilities({
      sources: [
        { name: "swisseph", description: "Professional astrological calculations" },
        { name: "luxon", description: "luxon astronomical utilities" },
      ],
      loader: loaderFor({ swisseph: "0.5.17" }),
    });

    expect(summarizeCapabilities(capabilities)).toBe(
      [
        "• ✅ **swisseph**: Available",
        "  - Version: 0.5.17",
        "  - Professional astrological calculations",
        "• ❌ **luxon**: Not Available",
        "  - Error: Cannot find module 'luxon'",
      ].join("\n")
    );
  });
});

describe("capabilitiesText", () => {
  it("lists only the baseline when nothing is installed", () => {
    const text = capabilitiesText(probeCapabilities({ loader: loaderFor({}) }));

    expect(text.split("\n")).toEqual(["**Available Calculations:**", ...BASELINE]);
  });

  it("adds chart bullets only for the professional engine", () => {
    const text = capabilitiesText(
      probeCapabilities({ loader: loaderFor({ swisseph: "0.5.17", luxon: "3.4.4" }) })
    );
    const lines = text.split("\n");

    expect(lines.slice(1, 6)).toEqual(BASELINE);
    expect(lines.slice(6)).toEqual([
      PROFESSIONAL_BULLET,
      "• ✅ Planetary positions and aspects",
      "• ✅ House calculations",
    ]);
  });

  it("adds lunar calendar bullets without the chart bullets", () => {
    const lines = capabilitiesText(
      probeCapabilities({ loader: loaderFor({ "lunar-javascript": "1.6.12" }) })
    ).split("\n");

    expect(lines).not.toContain(PROFESSIONAL_BULLET);
    expect(lines.slice(6)).toEqual([
      "• ✅ Lunar calendar conversions",
      "• ✅ Chinese lunar date calculations",
    ]);
  });
});
