/**
 * Configuration loading for swarm-prompts.
 * Uses Zod schemas for validation.
 * @module config
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { SwarmPromptsConfig } from "./types.js";

// ============================================
// Zod Schemas
// ============================================

const configSchema = z.object({
  count: z.number().int().min(0),
  template: z.string().min(1),
  outDir: z.string().min(1),
});

// ============================================
// Defaults
// ============================================

/**
 * Default configuration values.
 */
const DEFAULT_CONFIG: SwarmPromptsConfig = {
  count: 12,
  template: ".agents/agent_prompt.md",
  outDir: ".agents/generated",
};

export type PartialConfig = Partial<SwarmPromptsConfig>;

/**
 * Check if a value is a plain object (not array, null, etc.).
 * @internal
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep only the keys a config source may set; unknown keys are dropped.
 * @internal
 */
function pickConfigKeys(source: Record<string, unknown>): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const key of ["count", "template", "outDir"] as const) {
    if (source[key] !== undefined) {
      picked[key] = source[key];
    }
  }
  return picked;
}

// ============================================
// File Loaders
// ============================================

/**
 * Safely read and parse a JSON file.
 * Returns undefined if file doesn't exist or is invalid JSON.
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return JSON.parse(content) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Load configuration from package.json "swarm" key.
 * @internal
 */
async function loadPackageJsonConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const pkg = await readJsonFile(join(projectPath, "package.json"));

  if (isPlainObject(pkg) && isPlainObject(pkg["swarm"])) {
    return pickConfigKeys(pkg["swarm"]);
  }

  return undefined;
}

/**
 * Load configuration from .swarmrc file.
 * @internal
 */
async function loadRcConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const rc = await readJsonFile(join(projectPath, ".swarmrc"));

  if (isPlainObject(rc)) {
    return pickConfigKeys(rc);
  }

  return undefined;
}

// ============================================
// Environment Variables
// ============================================

/**
 * Build a partial config from environment variables.
 * @internal
 */
function getEnvConfig(): PartialConfig {
  const partial: PartialConfig = {};

  const count = process.env["SWARM_AGENT_COUNT"];
  if (count) {
    const parsed = Number(count);
    if (count.trim() !== "" && Number.isInteger(parsed) && parsed >= 0) {
      partial.count = parsed;
    }
  }

  const template = process.env["SWARM_PROMPT_TEMPLATE"];
  if (template) {
    partial.template = template;
  }

  const outDir = process.env["SWARM_PROMPT_OUT_DIR"];
  if (outDir) {
    partial.outDir = outDir;
  }

  return partial;
}

// ============================================
// Count Parsing
// ============================================

/**
 * Parse an agent count given on the command line.
 *
 * cac hands numeric flags over as numbers and everything else as strings,
 * so both are accepted here.
 *
 * @throws {ConfigurationError} INVALID_COUNT when the value is not a
 * non-negative integer
 */
export function parseCount(value: unknown, flag = "--count"): number {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
        ? Number(value)
        : NaN;

  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(
      `Invalid ${flag}: ${String(value)}`,
      "INVALID_COUNT",
      { hint: `${flag} must be a non-negative integer` },
    );
  }

  return parsed;
}

// ============================================
// Public API
// ============================================

/**
 * Load configuration from multiple sources with priority order:
 *
 * 1. Explicit overrides, usually CLI flags (highest priority)
 * 2. Environment variables
 * 3. .swarmrc file
 * 4. package.json "swarm" key
 * 5. Default values (lowest priority)
 *
 * @param projectPath - Directory holding .swarmrc / package.json (default: process.cwd())
 * @param overrides - Explicit configuration overrides
 *
 * @example
 * ```typescript
 * const config = await loadConfig(process.cwd(), { count: 4 });
 * await generatePrompts(config);
 * ```
 */
export async function loadConfig(
  projectPath: string = process.cwd(),
  overrides?: PartialConfig,
): Promise<SwarmPromptsConfig> {
  const sources: Record<string, unknown>[] = [];

  const pkgConfig = await loadPackageJsonConfig(projectPath);
  if (pkgConfig) {
    sources.push(pkgConfig);
  }

  const rcConfig = await loadRcConfig(projectPath);
  if (rcConfig) {
    sources.push(rcConfig);
  }

  sources.push({ ...getEnvConfig() });

  if (overrides) {
    sources.push(pickConfigKeys({ ...overrides }));
  }

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const source of sources) {
    merged = { ...merged, ...source };
  }

  const parseResult = configSchema.safeParse(merged);

  if (!parseResult.success) {
    const countError = parseResult.error.issues.find((issue) =>
      issue.path.includes("count"),
    );
    if (countError) {
      throw new ConfigurationError(
        `Invalid count in configuration: ${String(merged["count"])}`,
        "INVALID_COUNT",
        { hint: "count must be a non-negative integer" },
      );
    }
    throw new ConfigurationError(
      `Invalid configuration: ${parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
      "INVALID_CONFIG",
    );
  }

  return parseResult.data;
}

/**
 * Get default configuration without loading from files.
 */
export function getDefaultConfig(): SwarmPromptsConfig {
  return { ...DEFAULT_CONFIG };
}
