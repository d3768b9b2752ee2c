/**
 * Layered JSON config for the planner.
 *
 * `configs/planner/base.json` holds the full defaults; profiles under
 * `configs/planner/profiles/` are partial overrides that deep-merge on top
 * of the base.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { PlannerConfigError } from "../errors.js";
import { formatZodIssues } from "../network/schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PlannerConfigSchema = z.object({
  direction: z.enum(["forward", "both"]),
  unknownStations: z.enum(["no-route", "reject"]),
  maxAlternatives: z.number().int().min(0),
  networkFile: z.string().min(1),
});

/** What the planner does with a station name found on no line */
export type UnknownStationPolicy = PlannerConfig["unknownStations"];

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

export interface ProfileInfo {
  name: string;
  description: string;
}

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const ProfileSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  overrides: PlannerConfigSchema.partial(),
});

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  direction: "forward",
  unknownStations: "no-route",
  maxAlternatives: 3,
  networkFile: "troncales",
};

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/** Leaf-level deep merge: source values override target values. */
export function deepMerge<T extends Record<string, unknown>>(target: T, source: DeepPartial<T>): T {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find the repo's `configs/` directory.
 * Works from both source (packages/routing/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs");
    if (existsSync(join(candidate, "planner"))) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/routing/src/config
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PlannerConfigError(`Cannot read ${filePath}: ${reason}`);
  }
}

/** Load the base planner config. Falls back to hardcoded defaults when absent. */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): PlannerConfig {
  const filePath = join(configsRoot, "planner", "base.json");
  if (!existsSync(filePath)) return { ...DEFAULT_PLANNER_CONFIG };

  const merged = deepMerge(DEFAULT_PLANNER_CONFIG, toPartial(readJson(filePath), filePath));
  const parsed = PlannerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new PlannerConfigError(`Invalid planner config ${filePath}`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

function toPartial(raw: unknown, filePath: string): DeepPartial<PlannerConfig> {
  const parsed = PlannerConfigSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new PlannerConfigError(`Invalid planner config ${filePath}`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/** Load a profile, merging its overrides on top of the base. */
export function loadProfileConfig(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): PlannerConfig & { _profile: ProfileInfo } {
  const filePath = join(configsRoot, "planner", "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new PlannerConfigError(`Unknown planner profile "${profileName}"`);
  }

  const parsed = ProfileSchema.safeParse(readJson(filePath));
  if (!parsed.success) {
    throw new PlannerConfigError(`Invalid planner profile ${filePath}`, formatZodIssues(parsed.error));
  }

  const profile = parsed.data;
  return {
    ...deepMerge(loadBaseConfig(configsRoot), profile.overrides),
    _profile: { name: profile.name, description: profile.description },
  };
}

/** Base config, or the named profile on top of it. */
export function loadPlannerConfig(
  profileName?: string,
  configsRoot: string = findConfigsRoot(),
): PlannerConfig {
  if (!profileName) return loadBaseConfig(configsRoot);
  const { _profile: _p, ...config } = loadProfileConfig(profileName, configsRoot);
  return config;
}

/** List all available profiles from the profiles directory. */
export function listPlannerProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "planner", "profiles");

  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    let raw: unknown;
    try {
      raw = readJson(join(profilesDir, file));
    } catch (err) {
      console.warn(`[config] Skipping unreadable profile ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const parsed = ProfileSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[config] Skipping malformed profile ${file}`);
      continue;
    }
    profiles.push({ name: parsed.data.name, description: parsed.data.description });
  }

  return profiles;
}
