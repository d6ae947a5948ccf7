/**
 * Validator configuration.
 */

import { z } from "zod";
import {
  DEFAULT_ERROR_POLICY,
  DEFAULT_EXPLICIT_ONLY,
  DEFAULT_LOG_LEVEL,
  ENV_ERROR_POLICY,
  ENV_EXPLICIT_ONLY,
  ENV_LOG_LEVEL,
} from "./constants";

/** `aggregate` collects every violation in one pass; `fail_fast` stops at the first. */
export const ErrorPolicy = z.enum(["aggregate", "fail_fast"]);
export type ErrorPolicy = z.infer<typeof ErrorPolicy>;

export const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);

export const ValidatorConfigSchema = z.object({
  errorPolicy: ErrorPolicy.default(DEFAULT_ERROR_POLICY),
  logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
  explicitOnly: z.boolean().default(DEFAULT_EXPLICIT_ONLY),
});

export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;
export type ValidatorConfigInput = z.input<typeof ValidatorConfigSchema>;

export function validateValidatorConfig(input: unknown): ValidatorConfig {
  return ValidatorConfigSchema.parse(input);
}

const BooleanFromEnv = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Build a config from environment variables. Unset variables fall back to
 * the defaults; malformed ones throw a ZodError naming the variable.
 */
export function loadValidatorConfig(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  const explicitOnly = env[ENV_EXPLICIT_ONLY]?.toLowerCase();
  return ValidatorConfigSchema.parse({
    errorPolicy: env[ENV_ERROR_POLICY] || undefined,
    logLevel: env[ENV_LOG_LEVEL]?.toLowerCase() || undefined,
    explicitOnly: explicitOnly ? BooleanFromEnv.parse(explicitOnly, { path: [ENV_EXPLICIT_ONLY] }) : undefined,
  });
}
