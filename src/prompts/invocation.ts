/**
 * Task invocation descriptors for the orchestrating runtime.
 * @module prompts/invocation
 */

/** Capability tag naming the kind of sub-agent to spawn. */
export const SUBAGENT_TYPE = "general";

/** Command the spawned agent runs to join the swarm. */
export const AGENT_COMMAND = "swarm agent";

/**
 * Human-readable description of an agent's task.
 */
export function describeAgent(agentId: number): string {
  return `Agent ${agentId} process bead through pipeline`;
}

/**
 * Format a single-line `Task(...)` descriptor for one agent.
 *
 * The prompt is embedded as a JSON string literal, so newlines and quotes
 * in the prompt are escaped and the descriptor stays on one line.
 *
 * @param agentId - 1-based agent index
 * @param prompt - Full rendered prompt text
 */
export function formatInvocation(agentId: number, prompt: string): string {
  return (
    "Task(" +
    `description=${JSON.stringify(describeAgent(agentId))}, ` +
    `prompt=${JSON.stringify(prompt)}, ` +
    `subagent_type=${JSON.stringify(SUBAGENT_TYPE)}, ` +
    `command=${JSON.stringify(AGENT_COMMAND)}` +
    ")"
  );
}
