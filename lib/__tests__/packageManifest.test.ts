import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";

const manifest: unknown = JSON.parse(
  readFileSync(new URL("../../package.json", import.meta.url), "utf8")
);

function field(value: unknown, name: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, name) : undefined;
}

function keys(value: unknown): string[] {
  return typeof value === "object" && value !== null ? Object.keys(value) : [];
}

describe("package.json", () => {
  it("leaves the probed sources undeclared so installs build no native addons", () => {
    expect(field(manifest, "optionalDependencies")).toBeUndefined();
    expect(keys(field(manifest, "dependencies"))).toEqual(["zod"]);
  });

  it("runs the CLI through tsx instead of a built bin", () => {
    expect(field(manifest, "bin")).toBeUndefined();
    expect(field(field(manifest, "scripts"), "reply")).toBe("tsx scripts/reply.ts");
  });
});
