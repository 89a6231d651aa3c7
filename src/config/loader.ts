import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isRecord } from "../report/parse.js";
import type { ReportConfig } from "../types/config.js";
import { declaredType, validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
export const ENV_PREFIX = "REPORTCTL_";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val)) {
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${filePath}: top level must be a mapping`);
  return parsed;
}

/** Coerce to the type the schema declares; unknown keys get a best guess so validation names them. */
function coerce(value: string, type: string | undefined): string | number | boolean {
  if (type === "string") return value;
  if ((type === "integer" || type === "number" || type === undefined) && /^\d+$/.test(value)) return Number(value);
  if ((type === "boolean" || type === undefined) && (value === "true" || value === "false")) return value === "true";
  return value;
}

/**
 * Apply REPORTCTL_ prefixed environment variable overrides.
 * `__` separates nesting levels: REPORTCTL_PUBLISH__TARGET → publish.target.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter(Boolean);
    const type = declaredType(segments);
    const last = segments.pop();
    if (!last) continue;

    let node = config;
    for (const segment of segments) {
      const child = node[segment];
      const next: Record<string, unknown> = isRecord(child) ? child : {};
      node[segment] = next;
      node = next;
    }
    node[last] = coerce(value, type);
  }
  return config;
}

/**
 * Load layered config without validating it: base.yaml ← env.yaml ← environment variables.
 *
 * @param envName - Loads `config/{envName}.yaml` as override layer.
 */
export function loadRawConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;
  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) throw new ConfigError(`Config not found: ${basePath}`);

  let merged = loadYaml(basePath);

  if (envName) {
    const envPath = path.join(dir, `${envName}.yaml`);
    if (!fs.existsSync(envPath)) throw new ConfigError(`Unknown config environment: ${envName} (${envPath})`);
    merged = deepMerge(merged, loadYaml(envPath));
  }

  return applyEnvOverrides(merged, env);
}

/**
 * Load and validate the layered config.
 *
 * @throws ConfigError when a layer cannot be read or the result fails the config schema
 */
export async function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReportConfig> {
  const result = await validateConfig(loadRawConfig(envName, configDir, env));
  if (!result.valid) throw new ConfigError(`Invalid config: ${result.errors}`);
  return result.config;
}
