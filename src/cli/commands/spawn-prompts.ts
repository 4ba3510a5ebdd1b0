/**
 * CLI spawn-prompts command - render one prompt per agent and print the
 * Task invocations that launch them.
 * @module cli/commands/spawn-prompts
 */

import type { CAC, Command } from "cac";
import { loadConfig, parseCount, type PartialConfig } from "../../config.js";
import { generatePrompts, planGeneration } from "../../generator.js";
import type { GenerateResult, GenerationPlan } from "../../types.js";
import {
  CLIError,
  ExitCode,
  formatGenerateResult,
  formatPlan,
  info,
  output,
  pathFlag,
  print,
  warn,
  withErrorHandling,
} from "../utils/index.js";

export interface SpawnPromptsOptions {
  count?: unknown;
  template?: string;
  outDir?: string;
  project?: string;
  dryRun?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/** Options as cac parses them; path flags may arrive as numbers. */
interface SpawnPromptsFlags extends Omit<
  SpawnPromptsOptions,
  "template" | "outDir" | "project"
> {
  template?: string | number;
  outDir?: string | number;
  project?: string | number;
}

/**
 * Run spawn-prompts with parsed CLI options.
 *
 * In human mode the manifest and descriptors stream to stdout while files
 * are written; with --json the result is printed once at the end.
 */
export async function runSpawnPrompts(
  options: SpawnPromptsOptions,
): Promise<GenerateResult | GenerationPlan> {
  const overrides: PartialConfig = {};
  if (options.count !== undefined) {
    overrides.count = parseCount(options.count);
  }
  if (options.template !== undefined) {
    overrides.template = options.template;
  }
  if (options.outDir !== undefined) {
    overrides.outDir = options.outDir;
  }

  const config = await loadConfig(options.project ?? process.cwd(), overrides);

  if (options.dryRun) {
    const plan = planGeneration(config);
    output(plan, formatPlan, options);
    return plan;
  }

  const result = await generatePrompts(config, (line) => print(line, options));

  if (options.json) {
    output(result, formatGenerateResult, options);
  }
  if (result.count === 0) {
    warn("count is 0, no prompts were generated", options);
  }
  info(`Generated ${result.count} prompts in ${result.outDir}`, options);
  info("Launch each in parallel with your Task tool runner.", options);

  return result;
}

/**
 * Restore the exact text of path flags from raw argv.
 */
function toSpawnPromptsOptions(
  flags: SpawnPromptsFlags,
  rawArgs: readonly string[],
): SpawnPromptsOptions {
  const { template, outDir, project, ...rest } = flags;
  const options: SpawnPromptsOptions = { ...rest };

  const templatePath = pathFlag(template, rawArgs, "--template");
  if (templatePath !== undefined) {
    options.template = templatePath;
  }
  const outDirPath = pathFlag(outDir, rawArgs, "--out-dir");
  if (outDirPath !== undefined) {
    options.outDir = outDirPath;
  }
  const projectPath = pathFlag(project, rawArgs, "--project");
  if (projectPath !== undefined) {
    options.project = projectPath;
  }

  return options;
}

function addSpawnPromptsOptions(command: Command): Command {
  return command
    .option("--count <n>", "Number of agents to generate (default: 12)")
    .option(
      "--template <path>",
      "Template with {N} placeholder (default: .agents/agent_prompt.md)",
    )
    .option(
      "--out-dir <path>",
      "Directory for rendered prompt files (default: .agents/generated)",
    )
    .option(
      "--project <path>",
      "Directory holding .swarmrc / package.json (default: current directory)",
    )
    .option("--dry-run", "Show what would be written without writing")
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output");
}

/**
 * Register the spawn-prompts command, also run when no command is named
 * (`swarm-prompts --count 4`).
 */
export function registerSpawnPromptsCommand(cli: CAC): void {
  addSpawnPromptsOptions(
    cli.command(
      "spawn-prompts",
      "Generate per-agent prompt files and Task tool invocations",
    ),
  ).action(async (flags: SpawnPromptsFlags) => {
    await withErrorHandling(runSpawnPrompts, flags)(
      toSpawnPromptsOptions(flags, cli.rawArgs),
    );
  });

  addSpawnPromptsOptions(
    cli.command("[...command]", "Same as spawn-prompts"),
  ).action(async (command: string[], flags: SpawnPromptsFlags) => {
    const runDefault = async (): Promise<GenerateResult | GenerationPlan> => {
      const [unknown] = command;
      if (unknown !== undefined) {
        throw new CLIError(
          `Unknown command: ${unknown}`,
          ExitCode.GENERAL_ERROR,
          "Run swarm-prompts --help to list commands",
        );
      }
      return runSpawnPrompts(toSpawnPromptsOptions(flags, cli.rawArgs));
    };
    await withErrorHandling(runDefault, flags)();
  });
}
