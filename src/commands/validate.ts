import path from "node:path";
import { loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, extra?: Pick<Diagnostic, "path">): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Validate the layered configuration. Producers that are also the consumer
 * and required repositories missing from the producer list are warnings.
 */
export function validateAll(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv }): ValidateResult {
  const configPath = opts.configDir ? path.resolve(opts.configDir) : undefined;
  const res = validateConfig(loadRawConfig(opts.envName, configPath, opts.env));
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`, { path: configPath })] };
  }

  const warnings: Diagnostic[] = [];
  const { config } = res;
  if (config.producers?.includes(config.consumer)) {
    warnings.push(diag("warn", "CONSUMER_IS_PRODUCER", `Consumer ${config.consumer} is also listed as a producer`));
  }
  for (const required of config.required_repositories ?? []) {
    if (required !== config.consumer && config.producers && !config.producers.includes(required)) {
      warnings.push(
        diag("warn", "REQUIRED_NOT_TRACKED", `Required repository ${required} is not a tracked producer`),
      );
    }
  }
  return { ok: true, warnings };
}
