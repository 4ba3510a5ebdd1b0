/**
 * Prompt rendering and invocation formatting.
 * @module prompts
 */

export {
  PLACEHOLDER_TOKEN,
  renderPrompt,
  promptFileName,
  promptFilePath,
} from "./render.js";
export {
  SUBAGENT_TYPE,
  AGENT_COMMAND,
  describeAgent,
  formatInvocation,
} from "./invocation.js";
