import { describe, expect, it } from "vitest";
import { countRecords, summarizeLicenses, summaryToObject, NO_LICENSE } from "../src/summary/license-summary.js";
import type { ExtractionResult, PackageRecord } from "../src/types/manifest.js";

function result(licenses: Array<string | undefined>): ExtractionResult {
  const packages: PackageRecord[] = licenses.map((license, i) => ({ name: `pkg-${i}`, license, metadataResolved: true }));
  return { path: "/repo/package.json", type: "structured-descriptor", location: "repo", packages };
}

describe("license summary", () => {
  it("orders licenses by descending count", () => {
    const summary = summarizeLicenses([result(["MIT", "MIT", "ISC"])]);
    expect([...summary.entries()]).toEqual([
      ["MIT", 2],
      ["ISC", 1],
    ]);
  });

  it("keeps first-seen order for equal counts", () => {
    const summary = summarizeLicenses([result(["ISC", "MIT"]), result(["MIT", "BSD-2-Clause", "ISC"])]);
    expect([...summary.keys()]).toEqual(["ISC", "MIT", "BSD-2-Clause"]);
  });

  it("counts absent and empty licenses under NONE only", () => {
    const summary = summarizeLicenses([result([undefined, "", "MIT"])]);
    expect([...summary.entries()]).toEqual([
      [NO_LICENSE, 2],
      ["MIT", 1],
    ]);
    expect(summary.has("")).toBe(false);
  });

  it("counts add up to the number of records", () => {
    const results = [result(["MIT", undefined, "Apache-2.0"]), result([]), result(["MIT", "GPL-3.0", ""])];
    const summary = summarizeLicenses(results);
    const total = [...summary.values()].reduce((a, b) => a + b, 0);
    expect(countRecords(results)).toBe(6);
    expect(total).toBe(6);
  });

  it("is empty for no records", () => {
    expect(summarizeLicenses([]).size).toBe(0);
    expect(summarizeLicenses([result([])]).size).toBe(0);
  });

  it("serializes in summary order", () => {
    const obj = summaryToObject(summarizeLicenses([result(["ISC", "MIT", "MIT"])]));
    expect(Object.keys(obj)).toEqual(["MIT", "ISC"]);
    expect(obj).toEqual({ MIT: 2, ISC: 1 });
  });
});
