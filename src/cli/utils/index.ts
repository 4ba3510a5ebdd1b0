/**
 * CLI utility exports.
 * @module cli/utils
 */

export {
  CLIError,
  ExitCode,
  handleError,
  toCLIError,
  withErrorHandling,
} from "./errors.js";
export type { ExitCode as ExitCodeType } from "./errors.js";

export {
  output,
  print,
  info,
  warn,
  formatPlan,
  formatGenerateResult,
} from "./output.js";
export type { OutputOptions } from "./output.js";

export { rawFlagValue, pathFlag } from "./args.js";
