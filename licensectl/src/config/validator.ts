import path from "node:path";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { LicensectlConfig } from "../types/config.js";
import { ConfigError } from "../errors.js";

export type ConfigValidationResult =
  | { valid: true; config: LicensectlConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against `config.schema.json`. */
export function validateConfig(config: unknown, registry: SchemaRegistry = createRegistry()): ConfigValidationResult {
  const { valid, errors } = registry.validate("config", config, { coerce: true });
  if (!valid) return { valid: false, errors: errors ?? "invalid config" };
  // The schema mirrors LicensectlConfig field for field.
  return { valid: true, config: config as LicensectlConfig, errors: null };
}

/** Validate, throwing {@link ConfigError} on failure. */
export function requireValidConfig(config: unknown, registry?: SchemaRegistry): LicensectlConfig {
  const res = validateConfig(config, registry);
  if (!res.valid) throw new ConfigError(`Config invalid: ${res.errors}`);
  return res.config;
}

/** Resolve every path of a config against `baseDir` (paths in YAML are relative to the working directory). */
export function resolveConfigPaths(config: LicensectlConfig, baseDir: string): LicensectlConfig {
  const abs = (p: string) => path.resolve(baseDir, p);
  return {
    ...config,
    locations: Object.fromEntries(Object.entries(config.locations).map(([name, p]) => [name, abs(p)])),
    output_dir: abs(config.output_dir),
    crawl: { ...config.crawl, workdir: abs(config.crawl.workdir) },
    python: { ...config.python, site_packages: config.python.site_packages.map(abs) },
  };
}
