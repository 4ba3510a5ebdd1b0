#!/usr/bin/env node
/**
 * CLI entry point for swarm-prompts.
 * @module cli
 */

import { cac, type CAC } from "cac";
import { handleError } from "./utils/index.js";
import {
  registerPromptCommand,
  registerSpawnPromptsCommand,
} from "./commands/index.js";

// Keep in sync with package.json
const VERSION = "0.1.0";

/**
 * Create and configure the CLI.
 */
function createCLI(): CAC {
  const cli = cac("swarm-prompts");

  registerSpawnPromptsCommand(cli);
  registerPromptCommand(cli);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI.
 */
async function main(): Promise<void> {
  const cli = createCLI();

  try {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
  } catch (error) {
    handleError(error);
  }
}

main().catch((error: unknown) => {
  handleError(error);
});
