/** Scan manifest: integrity record of every artifact a scan wrote. */
export type ArtifactKind = "report" | "summary" | "dependencies" | "crawler_json" | "crawler_summary";

export type ScanArtifact = {
  kind: ArtifactKind;
  path: string;
  /** Schema the artifact was validated against, or null for tool pass-through output. */
  schema: string | null;
  sha256: string;
  bytes: number;
  produced_by: string;
  produced_at: string;
};

export type ScanManifest = {
  schema_version: string;
  created_at: string;
  totals: {
    manifests: number;
    packages: number;
    licenses: number;
  };
  artifacts: ScanArtifact[];
};

export type SerializedBundle = {
  path: string;
  type: "structured-descriptor";
  location: string;
  packageNames: string[];
};
