import type { ExtractionResult, LicenseSummary } from "../types/manifest.js";

/** Bucket for records without a license value. */
export const NO_LICENSE = "NONE";

/**
 * Tally licenses over every package record, most frequent first.
 * Equal counts keep the order in which the license was first seen.
 */
export function summarizeLicenses(results: readonly ExtractionResult[]): LicenseSummary {
  const counts = new Map<string, number>();

  for (const result of results) {
    for (const pkg of result.packages) {
      const key = pkg.license ? pkg.license : NO_LICENSE;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  // Array.prototype.sort is stable, so ties stay in insertion order.
  return new Map([...counts.entries()].sort((a, b) => b[1] - a[1]));
}

export function countRecords(results: readonly ExtractionResult[]): number {
  return results.reduce((sum, r) => sum + r.packages.length, 0);
}

/** JSON form of a summary; key order follows the summary. */
export function summaryToObject(summary: LicenseSummary): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [license, count] of summary) out[license] = count;
  return out;
}
