/**
 * CLI output utilities.
 * @module cli/utils/output
 */

import { INVOCATIONS_HEADER, MANIFEST_HEADER } from "../../generator.js";
import type { GenerateResult, GenerationPlan } from "../../types.js";

// ============================================
// Output Options
// ============================================

/**
 * Output formatting options.
 */
export interface OutputOptions {
  /** Output as JSON */
  json?: boolean;
  /** Suppress output */
  quiet?: boolean;
}

// ============================================
// Output Functions
// ============================================

/**
 * Output data in the appropriate format.
 *
 * @param data - Data to output
 * @param formatter - Function to format data for human-readable output
 * @param options - Output options
 */
export function output<T>(
  data: T,
  formatter: (data: T) => string,
  options: OutputOptions = {},
): void {
  if (options.quiet) return;

  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(formatter(data));
  }
}

/**
 * Print one line of human-readable output to stdout as it is produced.
 * Silent in JSON mode, where the full result is printed at the end.
 */
export function print(line: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.log(line);
}

/**
 * Output to stderr (for messages that shouldn't interfere with piping).
 *
 * @param message - Message to output
 * @param options - Output options
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return; // Suppress info messages in JSON mode
  console.error(message);
}

/**
 * Output a warning to stderr.
 *
 * @param message - Warning message
 * @param options - Output options
 */
export function warn(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(`Warning: ${message}`);
}

// ============================================
// Formatters
// ============================================

/**
 * Format a dry-run plan for human-readable output.
 */
export function formatPlan(plan: GenerationPlan): string {
  const lines: string[] = [];

  lines.push("Dry run (nothing written):");
  for (const step of plan.steps) {
    lines.push(`  ${step.step}. ${step.action} -> ${step.target}`);
  }

  if (plan.files.length > 0) {
    lines.push("");
    lines.push(`Would write ${plan.files.length} prompts:`);
    for (const file of plan.files) {
      lines.push(`  ${file}`);
    }
  } else {
    lines.push("");
    lines.push("Would write 0 prompts.");
  }

  return lines.join("\n");
}

/**
 * Format a finished run as the two stdout sections: the manifest of written
 * files, a blank line, then the Task descriptors.
 */
export function formatGenerateResult(result: GenerateResult): string {
  return [
    MANIFEST_HEADER,
    ...result.files,
    "",
    INVOCATIONS_HEADER,
    ...result.invocations,
  ].join("\n");
}
