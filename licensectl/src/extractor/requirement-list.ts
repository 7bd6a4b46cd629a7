import fs from "node:fs";
import type { ExtractionResult, ManifestEntry, PackageRecord } from "../types/manifest.js";
import type { MetadataResolver } from "../metadata/dist-info.js";
import type { Logger } from "../log/logger.js";
import { decodeText } from "./encoding.js";

const VERSION_OPERATORS = ["==", ">=", "~=", "!="] as const;

/**
 * Reduce one requirement line to its bare package name.
 *
 * `"foo==1.2.3"` → `"foo"`, `"bar>=1,baz"` → `"bar"`, `"  "` → `""`.
 */
export function parseRequirementName(line: string): string {
  let name = line.trim().split(",")[0];
  for (const op of VERSION_OPERATORS) {
    const at = name.indexOf(op);
    if (at !== -1) name = name.slice(0, at);
  }
  return name.trim();
}

/** Split requirement list content into package names, dropping empty lines. */
export function parseRequirementNames(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(parseRequirementName)
    .filter((name) => name !== "");
}

export function extractRequirementList(
  entry: ManifestEntry,
  resolver: MetadataResolver,
  logger: Logger,
): ExtractionResult {
  const bytes = fs.readFileSync(entry.path);
  const { encoding, text } = decodeText(bytes);
  if (encoding !== "utf-8") {
    logger.warn("NON_UTF8_MANIFEST", `Requirement list is not UTF-8 text, decoded as ${encoding}`, {
      path: entry.path,
    });
  }

  const packages: PackageRecord[] = [];
  for (const name of parseRequirementNames(text)) {
    const meta = resolver.resolve(name);
    if (!meta) {
      logger.warn("METADATA_MISSING", `No installed metadata for package "${name}"`, { path: entry.path });
      packages.push({ name, metadataResolved: false });
      continue;
    }
    packages.push({ name, version: meta.version, license: meta.license, metadataResolved: true });
  }

  return { path: entry.path, type: entry.type, location: entry.location, packages };
}
