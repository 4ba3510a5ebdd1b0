/**
 * Test fixture utilities.
 * @module tests/helpers/fixtures
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";

/**
 * Create a temporary directory for testing.
 * Returns the path and a cleanup function.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const suffix = randomBytes(8).toString("hex");
  const path = join(tmpdir(), `swarm-prompts-test-${suffix}`);
  await mkdir(path, { recursive: true });

  return {
    path,
    cleanup: async () => {
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * Write a prompt template into the directory and return its path.
 */
export async function writeTemplate(
  basePath: string,
  content: string,
  name = "agent_prompt.md",
): Promise<string> {
  const path = join(basePath, name);
  await writeFile(path, content, "utf-8");
  return path;
}

/**
 * Remove every SWARM_* variable that config loading reads.
 */
export function clearSwarmEnv(): void {
  delete process.env["SWARM_AGENT_COUNT"];
  delete process.env["SWARM_PROMPT_TEMPLATE"];
  delete process.env["SWARM_PROMPT_OUT_DIR"];
}
