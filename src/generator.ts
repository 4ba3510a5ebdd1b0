/**
 * Prompt generator: renders one prompt file per agent and the Task
 * descriptors that launch them.
 *
 * @module generator
 */

import { access, constants, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { templateNotFound } from "./errors.js";
import { formatInvocation, promptFilePath, renderPrompt } from "./prompts/index.js";
import type {
  GenerateResult,
  GenerationPlan,
  LineSink,
  SwarmPromptsConfig,
} from "./types.js";

/** Header printed before the list of written files. */
export const MANIFEST_HEADER = "# Generated prompts";

/** Header printed before the Task descriptors. */
export const INVOCATIONS_HEADER = "# Task tool calls";

/**
 * Read the template, failing with TEMPLATE_NOT_FOUND unless the path is a
 * readable regular file.
 *
 * @throws {ConfigurationError} TEMPLATE_NOT_FOUND
 */
export async function loadTemplate(path: string): Promise<string> {
  let isFile: boolean;
  try {
    isFile = (await stat(path)).isFile();
    await access(path, constants.R_OK);
  } catch (error) {
    throw templateNotFound(path, error instanceof Error ? error : undefined);
  }

  if (!isFile) {
    throw templateNotFound(path);
  }

  return readFile(path, "utf-8");
}

/**
 * File paths a run with this configuration writes, in agent order.
 */
export function listPromptFiles(outDir: string, count: number): string[] {
  const files: string[] = [];
  for (let agentId = 1; agentId <= count; agentId++) {
    files.push(promptFilePath(outDir, agentId));
  }
  return files;
}

/**
 * Describe a run without reading the template or writing anything.
 */
export function planGeneration(config: SwarmPromptsConfig): GenerationPlan {
  return {
    count: config.count,
    template: config.template,
    outDir: config.outDir,
    steps: [
      { step: 1, action: "read_template", target: config.template },
      { step: 2, action: "write_prompts", target: config.outDir },
    ],
    files: listPromptFiles(config.outDir, config.count),
  };
}

/**
 * Generate the prompt files and Task descriptors.
 *
 * Output goes to `onLine` as it is produced: the manifest header, each
 * file path right after its file is written, a blank line, the
 * descriptor header, then one descriptor per agent. Descriptors embed the
 * prompt as read back from disk.
 *
 * Existing files are overwritten. Nothing is created when the template is
 * missing.
 *
 * @param config - Count, template path and output directory
 * @param onLine - Receives each stdout line (default: discard)
 * @throws {ConfigurationError} TEMPLATE_NOT_FOUND when the template is missing
 *
 * @example
 * ```typescript
 * const result = await generatePrompts(
 *   { count: 4, template: ".agents/agent_prompt.md", outDir: ".agents/generated" },
 *   (line) => console.log(line),
 * );
 * ```
 */
export async function generatePrompts(
  config: SwarmPromptsConfig,
  onLine: LineSink = () => {},
): Promise<GenerateResult> {
  const { count, outDir } = config;
  const template = await loadTemplate(config.template);

  await mkdir(outDir, { recursive: true });

  const files = listPromptFiles(outDir, count);

  onLine(MANIFEST_HEADER);
  for (const [i, file] of files.entries()) {
    await writeFile(file, renderPrompt(template, i + 1), "utf-8");
    onLine(file);
  }

  onLine("");
  onLine(INVOCATIONS_HEADER);
  const invocations: string[] = [];
  for (const [i, file] of files.entries()) {
    const prompt = await readFile(file, "utf-8");
    const invocation = formatInvocation(i + 1, prompt);
    invocations.push(invocation);
    onLine(invocation);
  }

  return {
    count,
    template: config.template,
    outDir,
    files,
    invocations,
  };
}
