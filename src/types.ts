/**
 * Type definitions for swarm-prompts.
 * @module types
 */

// ============================================
// Error Codes
// ============================================

/**
 * Error codes for ConfigurationError.
 */
export const ConfigurationErrorCode = {
  /** Template path is missing or not a readable file */
  TEMPLATE_NOT_FOUND: "TEMPLATE_NOT_FOUND",
  /** Agent count is negative or not an integer */
  INVALID_COUNT: "INVALID_COUNT",
  /** Any other invalid setting */
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ConfigurationErrorCode =
  (typeof ConfigurationErrorCode)[keyof typeof ConfigurationErrorCode];

// ============================================
// Configuration Types
// ============================================

/**
 * Resolved settings for a prompt generation run.
 */
export interface SwarmPromptsConfig {
  /** Number of agents (and prompt files) to generate */
  count: number;
  /** Path to the template containing the `{N}` placeholder */
  template: string;
  /** Directory receiving the rendered prompt files */
  outDir: string;
}

// ============================================
// Generation Types
// ============================================

/**
 * Outcome of a completed generation run.
 */
export interface GenerateResult {
  count: number;
  template: string;
  outDir: string;
  /** Written prompt files, in ascending agent order */
  files: string[];
  /** One Task(...) descriptor per agent, in ascending agent order */
  invocations: string[];
}

/** A single step of a dry-run plan. */
export interface PlanStep {
  step: number;
  action: "read_template" | "write_prompts";
  target: string;
}

/**
 * What a run would do, reported without touching the filesystem.
 */
export interface GenerationPlan {
  count: number;
  template: string;
  outDir: string;
  steps: PlanStep[];
  files: string[];
}

/**
 * Callback receiving each stdout line as soon as it is produced.
 */
export type LineSink = (line: string) => void;
