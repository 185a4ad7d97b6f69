import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { LockstepConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "LOCKSTEP_";
const LIST_KEYS = new Set(["producers", "required_repositories"]);

type ConfigTree = Record<string, unknown>;

function isTree(val: unknown): val is ConfigTree {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isTree(parsed) ? parsed : {};
}

/**
 * Apply LOCKSTEP_ prefixed environment variable overrides.
 * `__` separates nesting levels: LOCKSTEP_REGISTRY__TIMEOUT_MS → registry.timeout_ms.
 * Comma-separated values are accepted for list keys (producers, required_repositories).
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    const leaf = segments[segments.length - 1];
    const parsed: unknown = LIST_KEYS.has(leaf)
      ? value.split(",").map((v) => v.trim()).filter((v) => v.length > 0)
      : value;

    let override: ConfigTree = { [leaf]: parsed };
    for (const segment of segments.slice(0, -1).reverse()) {
      override = { [segment]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 * The result is unvalidated; run it through `validateConfig` before use.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

export type LoadConfigResult =
  | { ok: true; config: LockstepConfig }
  | { ok: false; errors: string };

/** Load layered config and validate it. */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): LoadConfigResult {
  const raw = loadRawConfig(envName, configDir, env);
  const res = validateConfig(raw);
  if (!res.valid) return { ok: false, errors: res.errors };
  return { ok: true, config: res.config };
}
