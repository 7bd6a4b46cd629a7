import { locateManifests } from "../locator/locator.js";
import { createRegistry } from "../schema/registry.js";
import type { Logger } from "../log/logger.js";
import type { ManifestEntry } from "../types/manifest.js";
import { prepareConfig, toFailure, type CommandFailure, type ConfigSource } from "./shared.js";

export type LocateResult = { ok: true; entries: ManifestEntry[] } | CommandFailure;

export function locate(opts: ConfigSource & { logger: Logger; schemaDir?: string }): LocateResult {
  try {
    const config = prepareConfig(opts, createRegistry(opts.schemaDir));
    const entries = locateManifests(config.locations, config.rules, { exclude: config.exclude, logger: opts.logger });
    return { ok: true, entries };
  } catch (e) {
    return toFailure(e);
  }
}
