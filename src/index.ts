/**
 * swarm-prompts - per-agent prompt files and Task invocations for a swarm
 * of coding agents.
 *
 * @example
 * ```typescript
 * import { generatePrompts, loadConfig } from 'swarm-prompts';
 *
 * // Defaults: 12 agents, .agents/agent_prompt.md -> .agents/generated
 * const config = await loadConfig();
 *
 * const result = await generatePrompts(config, (line) => console.log(line));
 * console.error(`${result.files.length} prompts written`);
 * ```
 *
 * @packageDocumentation
 */

// Generator
export {
  generatePrompts,
  planGeneration,
  loadTemplate,
  listPromptFiles,
  MANIFEST_HEADER,
  INVOCATIONS_HEADER,
} from "./generator.js";

// Prompt rendering
export {
  PLACEHOLDER_TOKEN,
  renderPrompt,
  promptFileName,
  promptFilePath,
  SUBAGENT_TYPE,
  AGENT_COMMAND,
  describeAgent,
  formatInvocation,
} from "./prompts/index.js";

// Configuration
export { loadConfig, getDefaultConfig, parseCount } from "./config.js";
export type { PartialConfig } from "./config.js";

// Errors
export { ConfigurationError } from "./errors.js";

// Types
export { ConfigurationErrorCode } from "./types.js";
export type {
  SwarmPromptsConfig,
  GenerateResult,
  GenerationPlan,
  PlanStep,
  LineSink,
} from "./types.js";
