import { loadConfig } from "../config/loader.js";
import { requireValidConfig, resolveConfigPaths } from "../config/validator.js";
import { ConfigError, LicensectlError, errorMessage, type ErrorCode } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { LicensectlConfig } from "../types/config.js";

export type ConfigSource = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  /** Base for relative paths in the config. Defaults to process.cwd(). */
  cwd?: string;
};

export type CommandFailure = { ok: false; error: { code: ErrorCode; message: string } };

/** Load, validate and resolve the layered config. Throws ConfigError. */
export function prepareConfig(source: ConfigSource, registry: SchemaRegistry): LicensectlConfig {
  let raw: unknown;
  try {
    raw = loadConfig({ configDir: source.configDir, envName: source.envName, env: source.env });
  } catch (e) {
    throw new ConfigError(`Cannot load config: ${errorMessage(e)}`);
  }
  return resolveConfigPaths(requireValidConfig(raw, registry), source.cwd ?? process.cwd());
}

/** Convert a known fatal error into a command failure; anything else propagates. */
export function toFailure(err: unknown): CommandFailure {
  if (err instanceof LicensectlError) {
    return { ok: false, error: { code: err.code, message: err.message } };
  }
  throw err;
}
