import fs from "node:fs";
import path from "node:path";
import type { ExtractionResult, ManifestEntry } from "../types/manifest.js";
import { ManifestParseError, errorMessage } from "../errors.js";
import type { Logger } from "../log/logger.js";

export type DescriptorDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Read and parse a structured descriptor (package.json-style).
 * Throws {@link ManifestParseError} for a non-.json file or invalid content.
 */
export function readDescriptor(filePath: string): DescriptorDocument {
  if (path.extname(filePath).toLowerCase() !== ".json") {
    throw new ManifestParseError(filePath, "structured descriptors must be .json files");
  }

  const raw = fs.readFileSync(filePath, "utf8").replace(/^\uFEFF/, "");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ManifestParseError(filePath, errorMessage(e), { cause: e });
  }

  if (!isRecord(parsed)) {
    throw new ManifestParseError(filePath, "top-level value is not an object");
  }
  return parsed;
}

/**
 * License of a descriptor. Accepts the SPDX string form as well as the
 * deprecated `{ type }` object and `licenses: [{ type }]` array forms.
 */
export function descriptorLicense(doc: DescriptorDocument): string | undefined {
  const license = doc.license;
  if (typeof license === "string") return optionalString(license);
  if (isRecord(license)) return optionalString(license.type);

  if (license === undefined && Array.isArray(doc.licenses)) {
    const types = doc.licenses
      .map((l) => (isRecord(l) ? optionalString(l.type) : optionalString(l)))
      .filter((t): t is string => t !== undefined);
    return types.length > 0 ? types.join(" OR ") : undefined;
  }
  return undefined;
}

export function extractStructuredDescriptor(entry: ManifestEntry, logger: Logger): ExtractionResult {
  const doc = readDescriptor(entry.path);

  const name = optionalString(doc.name);
  if (name === undefined) {
    logger.info("DESCRIPTOR_NAME_MISSING", "Package descriptor has no name", { path: entry.path });
  }

  return {
    path: entry.path,
    type: entry.type,
    location: entry.location,
    packages: [
      {
        name,
        version: optionalString(doc.version),
        license: descriptorLicense(doc),
        metadataResolved: true,
      },
    ],
  };
}
