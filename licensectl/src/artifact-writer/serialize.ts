import type { DependencyBundle, ExtractionResult, PackageRecord } from "../types/manifest.js";
import type { SerializedBundle } from "../types/artifacts.js";

function serializePackage(pkg: PackageRecord): PackageRecord {
  const out: PackageRecord = { metadataResolved: pkg.metadataResolved };
  if (pkg.name !== undefined) out.name = pkg.name;
  if (pkg.version !== undefined) out.version = pkg.version;
  if (pkg.license !== undefined) out.license = pkg.license;
  return out;
}

/** Report records with absent fields left out rather than set to undefined. */
export function serializeResults(results: readonly ExtractionResult[]): ExtractionResult[] {
  return results.map((r) => ({ path: r.path, type: r.type, location: r.location, packages: r.packages.map(serializePackage) }));
}

export function serializeBundles(bundles: readonly DependencyBundle[]): SerializedBundle[] {
  return bundles.map((b) => ({ path: b.path, type: b.type, location: b.location, packageNames: [...b.packageNames] }));
}
