import { compileGuard, loadAjv } from "../schema/ajv.js";
import type { LockstepConfig } from "../types/config.js";

const NAME = { type: "string", minLength: 1, pattern: "^[^/\\\\]+$" };

/** Config schema: required fields and their value ranges. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "consumer", "manifests", "registry"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    consumer: NAME,
    producers: { type: "array", items: NAME, uniqueItems: true },
    required_repositories: { type: "array", items: NAME, uniqueItems: true },
    manifests: {
      type: "object",
      required: ["dependency", "lock", "package"],
      properties: {
        dependency: NAME,
        lock: NAME,
        package: NAME,
      },
    },
    registry: {
      type: "object",
      required: ["base_url", "path_template", "timeout_ms", "max_attempts", "backoff_ms"],
      properties: {
        base_url: { type: "string", format: "uri" },
        path_template: { type: "string", minLength: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
        max_attempts: { type: "integer", minimum: 1, maximum: 10 },
        backoff_ms: { type: "integer", minimum: 0 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: LockstepConfig }
  | { valid: false; errors: string };

/**
 * Validate a loaded config against the config schema.
 * Numeric strings coming from environment overrides are coerced in place.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const guard = compileGuard<LockstepConfig>(loadAjv({ coerceTypes: true }), CONFIG_SCHEMA);
  if (guard.check(config)) {
    return { valid: true, config };
  }
  return { valid: false, errors: guard.errors() };
}
