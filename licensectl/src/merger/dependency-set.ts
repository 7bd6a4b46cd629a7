import type { DependencyBundle, ManifestEntry } from "../types/manifest.js";
import type { Logger } from "../log/logger.js";
import { readDescriptor, type DescriptorDocument } from "../extractor/structured-descriptor.js";

/** Descriptor fields whose entries name dependencies, in merge order. */
export const DEPENDENCY_CATEGORIES = [
  "dependencies",
  "devDependencies",
  "peerDependencies",
  "bundledDependencies",
  "bundleDependencies",
  "optionalDependencies",
] as const;

function categoryNames(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  if (typeof value === "object" && value !== null) {
    return Object.keys(value);
  }
  return [];
}

/** Union of dependency names across every category of one descriptor. */
export function dependencyNames(doc: DescriptorDocument): Set<string> {
  const names = new Set<string>();
  for (const category of DEPENDENCY_CATEGORIES) {
    for (const name of categoryNames(doc[category])) {
      if (name.trim() !== "") names.add(name);
    }
  }
  return names;
}

/** One bundle per structured descriptor; other manifests are ignored. */
export function mergeDependencySets(entries: ManifestEntry[], logger: Logger): DependencyBundle[] {
  const bundles: DependencyBundle[] = [];

  for (const entry of entries) {
    if (entry.type !== "structured-descriptor") continue;

    const packageNames = dependencyNames(readDescriptor(entry.path));
    if (packageNames.size === 0) {
      logger.info("NO_DEPENDENCIES_DECLARED", "Package descriptor declares no dependencies", { path: entry.path });
    }
    bundles.push({ path: entry.path, type: entry.type, location: entry.location, packageNames });
  }

  return bundles;
}

/** Cross-manifest union of bundle names, in first-seen order. */
export function collectPackageNames(bundles: DependencyBundle[]): string[] {
  const all = new Set<string>();
  for (const bundle of bundles) {
    for (const name of bundle.packageNames) all.add(name);
  }
  return [...all];
}
