/** Manifest discovery and extraction records. */

/** Manifest dialects the extractor understands. */
export type EcosystemType = "requirement-list" | "structured-descriptor";

export type ManifestEntry = {
  readonly path: string;
  readonly type: EcosystemType;
  /** Name of the configured location the manifest was found under. */
  readonly location: string;
};

/**
 * One package as seen in a manifest.
 *
 * `name` is only absent for a structured descriptor without a `name` field;
 * requirement-list records always carry a non-empty name.
 */
export type PackageRecord = {
  name?: string;
  version?: string;
  license?: string;
  metadataResolved: boolean;
};

export type ExtractionResult = {
  path: string;
  type: EcosystemType;
  location: string;
  packages: PackageRecord[];
};

export type DependencyBundle = {
  path: string;
  type: "structured-descriptor";
  location: string;
  packageNames: Set<string>;
};

/** License identifier (or "NONE") → occurrence count, in descending count order. */
export type LicenseSummary = Map<string, number>;
