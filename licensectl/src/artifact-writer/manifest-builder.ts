import type { ScanArtifact, ScanManifest } from "../types/artifacts.js";

export const SCAN_MANIFEST_VERSION = "1.0.0";

export type ScanTotals = ScanManifest["totals"];

export function buildScanManifest(input: { totals: ScanTotals; artifacts: ScanArtifact[] }): ScanManifest {
  return {
    schema_version: SCAN_MANIFEST_VERSION,
    created_at: new Date().toISOString(),
    totals: input.totals,
    artifacts: input.artifacts,
  };
}
