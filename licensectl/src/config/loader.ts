import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "LICENSECTL_";

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed object, or an empty object if not found. */
function loadYaml(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply LICENSECTL_ prefixed environment overrides.
 * LICENSECTL_OUTPUT_DIR → output_dir, LICENSECTL_BINS__NPM → bins.npm.
 */
export function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv = process.env): PlainObject {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter(Boolean);
    if (segments.length === 0) continue;

    let override: PlainObject = { [segments[segments.length - 1]]: value };
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <env>.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfig(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): PlainObject {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  return applyEnvOverrides(merged, opts.env);
}
