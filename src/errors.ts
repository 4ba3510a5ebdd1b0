/**
 * Error handling for swarm-prompts.
 * @module errors
 */

import type { ConfigurationErrorCode } from "./types.js";

/**
 * Raised when a run cannot start because of its inputs: a missing
 * template, an invalid agent count or a malformed configuration file.
 *
 * @example
 * ```typescript
 * try {
 *   await generatePrompts(config);
 * } catch (error) {
 *   if (ConfigurationError.isConfigurationError(error)) {
 *     console.error(`${error.code}: ${error.message}`);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  /** Error code for programmatic handling */
  readonly code: ConfigurationErrorCode;

  /** Suggested fix shown by the CLI */
  readonly hint?: string;

  constructor(
    message: string,
    code: ConfigurationErrorCode,
    options: { cause?: Error; hint?: string } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "ConfigurationError";
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
  }

  /**
   * Type guard to check if an error is a ConfigurationError.
   */
  static isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
  }

  /** Check if the template could not be found */
  get isTemplateNotFound(): boolean {
    return this.code === "TEMPLATE_NOT_FOUND";
  }
}

/**
 * Create the error reported for a template path that is not a readable file.
 * @internal
 */
export function templateNotFound(path: string, cause?: Error): ConfigurationError {
  return new ConfigurationError(
    `Template not found: ${path}`,
    "TEMPLATE_NOT_FOUND",
    {
      ...(cause ? { cause } : {}),
      hint: `Ensure ${path} exists or pass --template <path>`,
    },
  );
}
