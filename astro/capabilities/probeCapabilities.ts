import { createRequire } from "node:module";

/**
 * Optional data sources the bot can mention.
 *
 * None of them is required: the calculator works without any. The probe only
 * records which ones this install could load.
 */

export interface CapabilitySource {
  name: string;
  description: string;
}

export interface CapabilityRecord {
  name: string;
  description: string;
  available: boolean;
  version?: string;
  error?: string;
}

export type CapabilitySet = ReadonlyMap<string, CapabilityRecord>;

/** Loads a module by package name, or throws. */
export type CapabilityLoader = (name: string) => unknown;

export const PROFESSIONAL_ENGINE = "swisseph";
export const LUNAR_CALENDAR_ENGINE = "lunar-javascript";

const HELPER_SOURCES = ["astronomy-engine", "luxon", "date-fns"];

export const CAPABILITY_SOURCES: readonly CapabilitySource[] = [
  {
    name: PROFESSIONAL_ENGINE,
    description: "Professional astrological calculations",
  },
  {
    name: LUNAR_CALENDAR_ENGINE,
    description: "Lunar calendar calculations",
  },
  ...HELPER_SOURCES.map((name) => ({
    name,
    description: `${name} astronomical utilities`,
  })),
];

const VERSION_FIELDS = ["version", "VERSION", "__version__"];

const require = createRequire(import.meta.url);

export const requireLoader: CapabilityLoader = (name) => require(name);

function readVersionField(value: unknown): string | undefined {
  if (value === null || (typeof value !== "object" && typeof value !== "function")) {
    return undefined;
  }
  for (const field of VERSION_FIELDS) {
    let candidate: unknown;
    // Lazy exports and proxies can throw on read; that field has no version.
    try {
      candidate = Reflect.get(value, field);
    } catch {
      continue;
    }
    if (typeof candidate === "string" && candidate.length > 0) {
      return candidate;
    }
  }
  return undefined;
}

function readVersion(name: string, mod: unknown, loader: CapabilityLoader): string {
  const direct = readVersionField(mod);
  if (direct) return direct;

  // Packages whose exports map hides package.json land in the catch.
  try {
    return readVersionField(loader(`${name}/package.json`)) ?? "Unknown";
  } catch {
    return "Unknown";
  }
}

/**
 * First line of whatever the loader threw. Node appends a require stack to
 * MODULE_NOT_FOUND messages; the first line is the part worth showing.
 */
export function describeLoadError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  const firstLine = message.split("\n")[0]?.trim() ?? "";
  return firstLine || "Unknown error";
}

export function probeCapability(
  source: CapabilitySource,
  loader: CapabilityLoader
): CapabilityRecord {
  let mod: unknown;
  try {
    mod = loader(source.name);
  } catch (err) {
    return {
      name: source.name,
      description: source.description,
      available: false,
      error: describeLoadError(err),
    };
  }

  return {
    name: source.name,
    description: source.description,
    available: true,
    version: readVersion(source.name, mod, loader),
  };
}

export type ProbeCapabilitiesOptions = {
  sources?: readonly CapabilitySource[];
  loader?: CapabilityLoader;
};

/**
 * Try to load every source once. Never throws: a source that fails to load is
 * recorded with available=false and its error message.
 */
export function probeCapabilities(
  options: ProbeCapabilitiesOptions = {}
): CapabilitySet {
  const sources = options.sources ?? CAPABILITY_SOURCES;
  const loader = options.loader ?? requireLoader;

  const capabilities = new Map<string, CapabilityRecord>();
  for (const source of sources) {
    capabilities.set(source.name, Object.freeze(probeCapability(source, loader)));
  }
  return capabilities;
}

export function isCapabilityAvailable(
  capabilities: CapabilitySet,
  name: string
): boolean {
  return capabilities.get(name)?.available === true;
}
