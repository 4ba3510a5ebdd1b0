/**
 * CLI prompt command - print the rendered prompt for a single agent.
 * @module cli/commands/prompt
 */

import type { CAC } from "cac";
import { loadConfig, parseCount, type PartialConfig } from "../../config.js";
import { ConfigurationError } from "../../errors.js";
import { loadTemplate } from "../../generator.js";
import { renderPrompt } from "../../prompts/index.js";
import { output, pathFlag, withErrorHandling } from "../utils/index.js";

export interface PromptOptions {
  id?: unknown;
  template?: string;
  project?: string;
  json?: boolean;
  quiet?: boolean;
}

/** Options as cac parses them; path flags may arrive as numbers. */
interface PromptFlags extends Omit<PromptOptions, "template" | "project"> {
  template?: string | number;
  project?: string | number;
}

export interface PromptResult {
  agentId: number;
  prompt: string;
}

/**
 * Render one agent's prompt without writing any file.
 */
export async function runPrompt(options: PromptOptions): Promise<PromptResult> {
  const agentId = options.id === undefined ? 1 : parseCount(options.id, "--id");
  if (agentId < 1) {
    throw new ConfigurationError(
      `Invalid --id: ${agentId}`,
      "INVALID_COUNT",
      { hint: "Agent ids start at 1" },
    );
  }

  const overrides: PartialConfig = {};
  if (options.template !== undefined) {
    overrides.template = options.template;
  }
  const config = await loadConfig(options.project ?? process.cwd(), overrides);

  const template = await loadTemplate(config.template);
  const result: PromptResult = {
    agentId,
    prompt: renderPrompt(template, agentId),
  };

  output(result, (r) => r.prompt, options);
  return result;
}

/**
 * Register the prompt command.
 */
export function registerPromptCommand(cli: CAC): void {
  cli
    .command("prompt", "Print the rendered prompt for one agent")
    .option("--id <n>", "Agent number (default: 1)")
    .option(
      "--template <path>",
      "Template with {N} placeholder (default: .agents/agent_prompt.md)",
    )
    .option(
      "--project <path>",
      "Directory holding .swarmrc / package.json (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (flags: PromptFlags) => {
      const { template, project, ...rest } = flags;
      const options: PromptOptions = { ...rest };
      const templatePath = pathFlag(template, cli.rawArgs, "--template");
      if (templatePath !== undefined) {
        options.template = templatePath;
      }
      const projectPath = pathFlag(project, cli.rawArgs, "--project");
      if (projectPath !== undefined) {
        options.project = projectPath;
      }
      await withErrorHandling(runPrompt, options)(options);
    });
}
