import fs from "node:fs";
import path from "node:path";
import { fileDigest } from "./checksum.js";
import { buildScanManifest, type ScanTotals } from "./manifest-builder.js";
import type { ArtifactKind, ScanArtifact, ScanManifest } from "../types/artifacts.js";
import type { SchemaName, SchemaRegistry } from "../schema/registry.js";
import { ArtifactInvalidError } from "../errors.js";

export const MANIFEST_FILE = "manifest.json";

export type WriteArtifactInput = {
  kind: ArtifactKind;
  /** Path relative to the output directory (e.g. "report.json"). */
  relativePath: string;
  content: unknown;
  schema: SchemaName;
  /** Producer recorded in the manifest (e.g. "licensectl-extract"). */
  producedBy: string;
};

/**
 * Owns the output directory of a scan. JSON artifacts are
 * schema-checked before they touch disk; files written by external tools are
 * registered afterwards so the manifest covers them too.
 */
export class ArtifactWriter {
  private artifacts: ScanArtifact[] = [];

  constructor(
    private readonly outputDir: string,
    private readonly registry: SchemaRegistry,
  ) {}

  init(): void {
    fs.mkdirSync(this.outputDir, { recursive: true });
  }

  /** Absolute path of an artifact inside the output directory. */
  pathFor(relativePath: string): string {
    return path.join(this.outputDir, relativePath);
  }

  writeArtifact(input: WriteArtifactInput): string {
    const fullPath = this.pathFor(input.relativePath);

    const { valid, errors } = this.registry.validate(input.schema, input.content);
    if (!valid) throw new ArtifactInvalidError(fullPath, errors ?? "unknown error");

    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, JSON.stringify(input.content, null, 2) + "\n", "utf8");

    this.track(input.kind, input.relativePath, this.registry.ref(input.schema), input.producedBy);
    return fullPath;
  }

  /** Record a file another process wrote into the output directory. */
  registerExternal(kind: ArtifactKind, relativePath: string, producedBy: string): void {
    this.track(kind, relativePath, null, producedBy);
  }

  writeManifest(totals: ScanTotals): ScanManifest {
    const manifest = buildScanManifest({ totals, artifacts: this.artifacts });

    const { valid, errors } = this.registry.validate("scan-manifest", manifest);
    if (!valid) throw new ArtifactInvalidError(this.pathFor(MANIFEST_FILE), errors ?? "unknown error");

    fs.writeFileSync(this.pathFor(MANIFEST_FILE), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  getArtifacts(): ScanArtifact[] {
    return [...this.artifacts];
  }

  private track(kind: ArtifactKind, relativePath: string, schema: string | null, producedBy: string): void {
    const { sha256, bytes } = fileDigest(this.pathFor(relativePath));
    this.artifacts.push({
      kind,
      path: relativePath,
      schema,
      sha256,
      bytes,
      produced_by: producedBy,
      produced_at: new Date().toISOString(),
    });
  }
}
