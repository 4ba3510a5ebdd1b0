/**
 * CLI command exports.
 * @module cli/commands
 */

export { registerSpawnPromptsCommand, runSpawnPrompts } from "./spawn-prompts.js";
export type { SpawnPromptsOptions } from "./spawn-prompts.js";
export { registerPromptCommand, runPrompt } from "./prompt.js";
export type { PromptOptions, PromptResult } from "./prompt.js";
