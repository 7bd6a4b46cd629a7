import type { ExtractionResult, ManifestEntry } from "../types/manifest.js";
import type { MetadataResolver } from "../metadata/dist-info.js";
import type { Logger } from "../log/logger.js";
import { UnknownEcosystemError } from "../errors.js";
import { extractRequirementList } from "./requirement-list.js";
import { extractStructuredDescriptor } from "./structured-descriptor.js";

export type ExtractContext = {
  resolver: MetadataResolver;
  logger: Logger;
};

/** Convert one manifest into exactly one extraction result. */
export function extractManifest(entry: ManifestEntry, ctx: ExtractContext): ExtractionResult {
  const type = entry.type;
  switch (type) {
    case "requirement-list":
      ctx.logger.debug("EXTRACT", "Reading requirement list", { path: entry.path });
      return extractRequirementList(entry, ctx.resolver, ctx.logger);
    case "structured-descriptor":
      ctx.logger.debug("EXTRACT", "Reading package descriptor", { path: entry.path });
      return extractStructuredDescriptor(entry, ctx.logger);
    default: {
      const unhandled: never = type;
      throw new UnknownEcosystemError(String(unhandled), entry.path);
    }
  }
}

export function extractAll(entries: ManifestEntry[], ctx: ExtractContext): ExtractionResult[] {
  return entries.map((entry) => extractManifest(entry, ctx));
}
