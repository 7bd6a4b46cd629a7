import { locateManifests } from "../locator/locator.js";
import { extractAll } from "../extractor/extractor.js";
import { mergeDependencySets } from "../merger/dependency-set.js";
import { countRecords, summarizeLicenses, summaryToObject } from "../summary/license-summary.js";
import { DistInfoResolver, type MetadataResolver } from "../metadata/dist-info.js";
import { SpawnCommandRunner, type CommandRunner } from "../orchestrator/command-runner.js";
import { crawlNodeLicenses, installRequirements, type CrawlOutcome } from "../orchestrator/crawl.js";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { serializeBundles, serializeResults } from "../artifact-writer/serialize.js";
import { createRegistry } from "../schema/registry.js";
import type { Logger } from "../log/logger.js";
import type { LicenseSummary } from "../types/manifest.js";
import type { ScanManifest } from "../types/artifacts.js";
import { prepareConfig, toFailure, type CommandFailure, type ConfigSource } from "./shared.js";

export type ScanOptions = ConfigSource & {
  logger: Logger;
  /** Overrides `crawl.enabled`. */
  crawl?: boolean;
  /** Overrides `python.install_requirements`. */
  installRequirements?: boolean;
  schemaDir?: string;
  runner?: CommandRunner;
  resolver?: MetadataResolver;
};

export type ScanResult =
  | {
      ok: true;
      outputDir: string;
      manifests: number;
      packages: number;
      summary: LicenseSummary;
      crawl: CrawlOutcome | null;
      manifest: ScanManifest;
    }
  | CommandFailure;

/**
 * Full pipeline: locate → (pip install) → extract → summarize → merge →
 * (install + crawl) → write artifacts. Any fatal error stops the run.
 */
export async function scan(opts: ScanOptions): Promise<ScanResult> {
  const { logger } = opts;
  try {
    const registry = createRegistry(opts.schemaDir);
    const config = prepareConfig(opts, registry);
    const runner = opts.runner ?? new SpawnCommandRunner(logger);

    const entries = locateManifests(config.locations, config.rules, { exclude: config.exclude, logger });
    logger.info("MANIFESTS_FOUND", `Found ${entries.length} manifest(s)`);

    if (opts.installRequirements ?? config.python.install_requirements) {
      await installRequirements(entries, { runner, bins: config.bins, logger });
    }

    const resolver = opts.resolver ?? new DistInfoResolver(config.python.site_packages, logger);
    const results = extractAll(entries, { resolver, logger });
    const summary = summarizeLicenses(results);
    const packages = countRecords(results);
    const bundles = mergeDependencySets(entries, logger);

    const writer = new ArtifactWriter(config.output_dir, registry);
    writer.init();
    writer.writeArtifact({
      kind: "report",
      relativePath: config.outputs.report,
      content: serializeResults(results),
      schema: "report",
      producedBy: "licensectl-extract",
    });
    writer.writeArtifact({
      kind: "summary",
      relativePath: config.outputs.summary,
      content: summaryToObject(summary),
      schema: "license-summary",
      producedBy: "licensectl-summary",
    });
    writer.writeArtifact({
      kind: "dependencies",
      relativePath: config.outputs.dependencies,
      content: serializeBundles(bundles),
      schema: "dependencies",
      producedBy: "licensectl-merge",
    });

    let crawl: CrawlOutcome | null = null;
    if (opts.crawl ?? config.crawl.enabled) {
      crawl = await crawlNodeLicenses(bundles, {
        runner,
        bins: config.bins,
        workdir: config.crawl.workdir,
        outputs: {
          json: writer.pathFor(config.outputs.crawler_json),
          summary: writer.pathFor(config.outputs.crawler_summary),
        },
        logger,
      });
      if (!crawl.skipped) {
        writer.registerExternal("crawler_json", config.outputs.crawler_json, "license-checker");
        writer.registerExternal("crawler_summary", config.outputs.crawler_summary, "license-checker");
      }
    } else {
      logger.info("CRAWL_DISABLED", "Node license crawl disabled");
    }

    const manifest = writer.writeManifest({ manifests: results.length, packages, licenses: summary.size });
    logger.info("SCAN_DONE", `Wrote ${manifest.artifacts.length} artifact(s)`, { path: writer.getOutputDir() });

    return { ok: true, outputDir: writer.getOutputDir(), manifests: results.length, packages, summary, crawl, manifest };
  } catch (e) {
    return toFailure(e);
  }
}
