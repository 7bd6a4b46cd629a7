import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { resolveConfigPaths, validateConfig } from "../config/validator.js";
import { createRegistry } from "../schema/registry.js";
import { diag, type Diagnostic } from "../log/logger.js";
import { errorMessage } from "../errors.js";
import type { ConfigSource } from "./shared.js";

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/**
 * Check the layered config: it must load, match the config schema, and its
 * locations should exist (a missing location is only a warning, the scan
 * skips it).
 */
export function validateAll(opts: ConfigSource & { schemaDir?: string }): ValidateResult {
  if (opts.configDir && !fs.existsSync(opts.configDir)) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${path.resolve(opts.configDir)}`)],
    };
  }

  let raw: unknown;
  try {
    raw = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env });
  } catch (e) {
    return { ok: false, errors: [diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`)] };
  }

  const res = validateConfig(raw, createRegistry(opts.schemaDir));
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`)] };
  }

  const config = resolveConfigPaths(res.config, opts.cwd ?? process.cwd());
  const warnings: Diagnostic[] = [];
  for (const [name, root] of Object.entries(config.locations)) {
    if (!fs.existsSync(root)) {
      warnings.push(diag("warn", "LOCATION_MISSING", `Location "${name}" does not exist`, { path: root }));
    }
  }
  if (config.rules.length === 0) {
    warnings.push(diag("warn", "NO_RULES", "No manifest rules configured; a scan will find nothing"));
  }
  for (const dir of config.python.site_packages) {
    if (!fs.existsSync(dir)) {
      warnings.push(diag("warn", "SITE_PACKAGES_MISSING", "site-packages directory does not exist", { path: dir }));
    }
  }

  return { ok: true, warnings };
}
