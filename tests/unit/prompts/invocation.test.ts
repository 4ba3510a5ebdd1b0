/**
 * Tests for Task invocation descriptors.
 * @module tests/unit/prompts/invocation
 */

import { describe, it, expect } from "vitest";
import {
  AGENT_COMMAND,
  SUBAGENT_TYPE,
  describeAgent,
  formatInvocation,
} from "../../../src/prompts/index.js";

describe("describeAgent()", () => {
  it("should mention the agent number", () => {
    expect(describeAgent(4)).toBe("Agent 4 process bead through pipeline");
  });
});

describe("formatInvocation()", () => {
  it("should format a Task descriptor", () => {
    expect(formatInvocation(1, "Agent 1 instructions.")).toBe(
      'Task(description="Agent 1 process bead through pipeline", ' +
        'prompt="Agent 1 instructions.", ' +
        'subagent_type="general", ' +
        'command="swarm agent")',
    );
  });

  it("should keep multi-line prompts on one line", () => {
    const line = formatInvocation(2, "line one\nline two\n");

    expect(line).not.toContain("\n");
    expect(line).toContain('prompt="line one\\nline two\\n"');
  });

  it("should escape quotes and backslashes in the prompt", () => {
    const line = formatInvocation(3, 'say "hi" \\ bye');

    expect(line).toContain('prompt="say \\"hi\\" \\\\ bye"');
  });

  it("should use the fixed tags", () => {
    expect(SUBAGENT_TYPE).toBe("general");
    expect(AGENT_COMMAND).toBe("swarm agent");
  });
});
