/**
 * Runtime configuration: defaults < environment < command-line flags,
 * checked against a TypeBox schema.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "../infra/errors.js";
import { LOG_LEVELS } from "../logging/subsystem.js";
import { VTREE_LOG_LEVEL, VTREE_PROMPT, readColorEnv, readEnv, type EnvSource } from "./env-vars.js";

export const LogLevelSchema = Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)));

export const VtreeConfigSchema = Type.Object(
  {
    logLevel: LogLevelSchema,
    prompt: Type.String({ maxLength: 64 }),
    color: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type VtreeConfig = Static<typeof VtreeConfigSchema>;

/**
 * Flag values as commander hands them over: unchecked strings
 */
export interface ConfigOverrides {
  logLevel?: string;
  prompt?: string;
  color?: boolean;
}

export const DEFAULT_CONFIG: VtreeConfig = {
  logLevel: "warn",
  prompt: "",
  color: true,
};

export function resolveConfig(
  env: EnvSource = process.env,
  overrides: ConfigOverrides = {},
): VtreeConfig {
  const candidate = {
    logLevel:
      overrides.logLevel?.trim().toLowerCase() ??
      readEnv(env, VTREE_LOG_LEVEL)?.toLowerCase() ??
      DEFAULT_CONFIG.logLevel,
    prompt: overrides.prompt ?? env[VTREE_PROMPT] ?? DEFAULT_CONFIG.prompt,
    color: overrides.color ?? readColorEnv(env) ?? DEFAULT_CONFIG.color,
  };

  if (Value.Check(VtreeConfigSchema, candidate)) {
    return candidate;
  }

  const first = Value.Errors(VtreeConfigSchema, candidate).First();
  const where = first?.path ? first.path.replace(/^\//, "") : "config";
  throw new ValidationError(
    `Invalid configuration for ${where}: ${first?.message ?? "unknown error"}`,
  );
}
