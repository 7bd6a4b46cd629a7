import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { Logger } from "../log/logger.js";

export type PackageMetadata = {
  version?: string;
  license?: string;
};

/** Looks up metadata of a package installed in the local environment. */
export interface MetadataResolver {
  resolve(name: string): PackageMetadata | undefined;
}

type IndexedDistribution = {
  metadataFile: string;
};

/** `singleFile`: the entry may itself be the metadata file (distutils installs). */
const DIST_SUFFIXES: ReadonlyArray<{ suffix: string; file: string; singleFile: boolean }> = [
  { suffix: ".dist-info", file: "METADATA", singleFile: false },
  { suffix: ".egg-info", file: "PKG-INFO", singleFile: true },
];

/**
 * Canonical distribution name: lowercased, extras and environment markers
 * removed, runs of `-`, `_` and `.` collapsed to a single `-`.
 */
export function normalizeDistributionName(name: string): string {
  return name
    .split(";")[0]
    .replace(/\[.*$/, "")
    .trim()
    .toLowerCase()
    .replace(/[-_.]+/g, "-");
}

/** Parse the header block of a core-metadata file (RFC 822 style). */
export function parseMetadataHeaders(raw: string): Map<string, string> {
  const headers = new Map<string, string>();
  let lastKey: string | undefined;

  for (const line of raw.split(/\r?\n/)) {
    if (line.trim() === "") break;
    if (/^[ \t]/.test(line) && lastKey) {
      headers.set(lastKey, `${headers.get(lastKey) ?? ""}\n${line.trim()}`);
      continue;
    }
    const sep = line.indexOf(":");
    if (sep <= 0) continue;
    const key = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();
    // First occurrence wins; repeated headers (Classifier) are not needed here.
    if (!headers.has(key)) headers.set(key, value);
    lastKey = key;
  }

  return headers;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * Resolves package metadata from `*.dist-info/METADATA` and
 * `*.egg-info/PKG-INFO` entries of site-packages directories.
 */
export class DistInfoResolver implements MetadataResolver {
  private index: Map<string, IndexedDistribution> | null = null;

  constructor(
    private readonly sitePackages: string[],
    private readonly logger: Logger,
  ) {}

  resolve(name: string): PackageMetadata | undefined {
    const dist = this.getIndex().get(normalizeDistributionName(name));
    if (!dist) return undefined;

    let raw: string;
    try {
      raw = fs.readFileSync(dist.metadataFile, "utf8");
    } catch (e) {
      this.logger.warn("METADATA_READ_FAILED", `Cannot read package metadata: ${errorMessage(e)}`, {
        path: dist.metadataFile,
      });
      return undefined;
    }

    const headers = parseMetadataHeaders(raw);
    return {
      version: nonEmpty(headers.get("version")),
      license: nonEmpty(headers.get("license")) ?? nonEmpty(headers.get("license-expression")),
    };
  }

  private getIndex(): Map<string, IndexedDistribution> {
    if (this.index) return this.index;

    const index = new Map<string, IndexedDistribution>();
    for (const dir of this.sitePackages) {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch (e) {
        this.logger.warn("SITE_PACKAGES_UNREADABLE", `Skipping site-packages: ${errorMessage(e)}`, { path: dir });
        continue;
      }
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const kind = DIST_SUFFIXES.find((k) => entry.name.endsWith(k.suffix));
        if (!kind) continue;
        // "<name>-<version>.dist-info"; installers write "-" inside the name as "_".
        const stem = entry.name.slice(0, -kind.suffix.length);
        const distName = stem.split("-")[0];
        const key = normalizeDistributionName(distName);
        if (index.has(key)) continue;
        const metadataFile =
          kind.singleFile && entry.isFile() ? path.join(dir, entry.name) : path.join(dir, entry.name, kind.file);
        index.set(key, { metadataFile });
      }
    }

    this.index = index;
    return index;
  }
}
