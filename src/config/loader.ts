import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError } from "../errors.js";
import type { LgiConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "LGI_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Shallow overlay: arrays and scalars in `override` replace those in `base`. */
function overlay(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val !== undefined && val !== null) result[key] = val;
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply LGI_ prefixed environment variable overrides to keys the files
 * already define. List-valued keys take a comma separated value.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // LGI_RECON_COMMAND → recon_command
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!(configKey in result)) continue;
    result[configKey] = Array.isArray(result[configKey])
      ? value.split(",").map((v) => v.trim()).filter((v) => v.length > 0)
      : value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables,
 * then check the result against the config schema.
 */
export function loadConfig(
  opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {},
): LgiConfig {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = overlay(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = applyEnvOverrides(merged, opts.env ?? process.env);

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid configuration in ${dir}: ${result.errors}`);
  }
  return result.config;
}
