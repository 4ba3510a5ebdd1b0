/**
 * Per-agent prompt rendering.
 * @module prompts/render
 */

import { join } from "node:path";

/** Literal marker in the template replaced by the agent index. */
export const PLACEHOLDER_TOKEN = "{N}";

/**
 * Render the prompt for one agent.
 *
 * Every literal occurrence of `{N}` is replaced by the decimal index.
 * The template is not interpreted in any other way.
 *
 * @param template - Raw template text
 * @param agentId - 1-based agent index
 */
export function renderPrompt(template: string, agentId: number): string {
  return template.split(PLACEHOLDER_TOKEN).join(String(agentId));
}

/**
 * File name for an agent's prompt: `agent_01.md`, `agent_02.md`, ...
 * Indices past 99 keep all their digits (`agent_100.md`).
 */
export function promptFileName(agentId: number): string {
  return `agent_${String(agentId).padStart(2, "0")}.md`;
}

/**
 * Path of an agent's prompt inside the output directory.
 */
export function promptFilePath(outDir: string, agentId: number): string {
  return join(outDir, promptFileName(agentId));
}
