/**
 * Environment Variables
 *
 * Read at startup and layered between the defaults and the command-line flags.
 */

/**
 * Log level: "silent", "fatal", "error", "warn", "info", "debug", "trace"
 */
export const VTREE_LOG_LEVEL = "VTREE_LOG_LEVEL";

/**
 * Prompt printed before each command line (empty by default)
 */
export const VTREE_PROMPT = "VTREE_PROMPT";

/**
 * "0", "false", "no" or "off" disables colored output
 */
export const VTREE_COLOR = "VTREE_COLOR";

/**
 * https://no-color.org - any non-empty value disables colored output
 */
export const NO_COLOR = "NO_COLOR";

const FALSY_VALUES = ["0", "false", "no", "off"];

export type EnvSource = Record<string, string | undefined>;

/**
 * Read a variable, treating empty and whitespace-only values as unset
 */
export function readEnv(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * @returns false when color is switched off, undefined when not configured
 */
export function readColorEnv(env: EnvSource): boolean | undefined {
  if (readEnv(env, NO_COLOR)) {
    return false;
  }
  const raw = readEnv(env, VTREE_COLOR);
  if (raw === undefined) {
    return undefined;
  }
  return !FALSY_VALUES.includes(raw.toLowerCase());
}
