/**
 * Raw argv helpers for flags that take paths.
 * @module cli/utils/args
 */

/**
 * Last value given for `flag` in raw argv, as `--flag value` or
 * `--flag=value`. Scanning stops at `--`.
 */
export function rawFlagValue(
  rawArgs: readonly string[],
  flag: string,
): string | undefined {
  let value: string | undefined;

  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (arg === undefined || arg === "--") break;

    if (arg === flag) {
      const next = rawArgs[i + 1];
      if (next !== undefined) {
        value = next;
      }
    } else if (arg.startsWith(`${flag}=`)) {
      value = arg.slice(flag.length + 1);
    }
  }

  return value;
}

/**
 * Recover the text of a path flag.
 *
 * cac turns numeric-looking values into numbers (`007` becomes 7,
 * `1e3` becomes 1000), so a number is replaced by the token from argv.
 */
export function pathFlag(
  parsed: string | number | undefined,
  rawArgs: readonly string[],
  flag: string,
): string | undefined {
  if (parsed === undefined || typeof parsed === "string") {
    return parsed;
  }
  return rawFlagValue(rawArgs, flag) ?? String(parsed);
}
