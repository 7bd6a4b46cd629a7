import fs from "node:fs";
import path from "node:path";
import type { BinsConfig } from "../types/config.js";
import type { DependencyBundle, ManifestEntry } from "../types/manifest.js";
import type { Logger } from "../log/logger.js";
import { collectPackageNames } from "../merger/dependency-set.js";
import type { CommandRunner } from "./command-runner.js";

export const CRAWLER_PACKAGE = "license-checker";

/** Flags for a bulk install that tolerates missing or legacy peer constraints. */
export const BULK_INSTALL_FLAGS = ["--force", "--allow-missing", "--legacy-peer-deps"] as const;

export type CrawlContext = {
  runner: CommandRunner;
  bins: BinsConfig;
  /** Directory the dependency set is installed into and crawled from. */
  workdir: string;
  outputs: {
    json: string;
    summary: string;
  };
  logger: Logger;
};

export type CrawlOutcome =
  | { skipped: true; installed: [] }
  | { skipped: false; installed: string[]; jsonFile: string; summaryFile: string };

function crawlerBin(workdir: string): string {
  return path.join(workdir, "node_modules", ".bin", CRAWLER_PACKAGE);
}

/** Install the license crawler into the workdir unless it is already there. */
export async function ensureCrawler(ctx: CrawlContext): Promise<boolean> {
  fs.mkdirSync(ctx.workdir, { recursive: true });
  if (fs.existsSync(crawlerBin(ctx.workdir))) {
    ctx.logger.debug("CRAWLER_PRESENT", `${CRAWLER_PACKAGE} already installed`, { path: ctx.workdir });
    return false;
  }

  ctx.logger.info("CRAWLER_INSTALL", `Installing ${CRAWLER_PACKAGE}`, { path: ctx.workdir });
  await ctx.runner.run(ctx.bins.npm, ["install", CRAWLER_PACKAGE], { cwd: ctx.workdir });
  return true;
}

/**
 * Install every dependency named by the bundles, then crawl the installed
 * tree for licenses. An empty dependency set is a no-op.
 */
export async function crawlNodeLicenses(bundles: DependencyBundle[], ctx: CrawlContext): Promise<CrawlOutcome> {
  const names = collectPackageNames(bundles);
  if (names.length === 0) {
    ctx.logger.info("CRAWL_SKIPPED", "No node dependencies declared; skipping install and license crawl");
    return { skipped: true, installed: [] };
  }

  await ensureCrawler(ctx);

  ctx.logger.info("NODE_INSTALL", `Installing ${names.length} node module(s); this can take a long time`, {
    path: ctx.workdir,
  });
  await ctx.runner.run(ctx.bins.npm, ["install", ...BULK_INSTALL_FLAGS, ...names], { cwd: ctx.workdir });

  ctx.logger.info("LICENSE_CRAWL", "Crawling installed modules for licenses");
  await ctx.runner.run(ctx.bins.npx, [CRAWLER_PACKAGE, "--json"], { cwd: ctx.workdir, outputFile: ctx.outputs.json });
  await ctx.runner.run(ctx.bins.npx, [CRAWLER_PACKAGE, "--summary"], {
    cwd: ctx.workdir,
    outputFile: ctx.outputs.summary,
  });

  return { skipped: false, installed: names, jsonFile: ctx.outputs.json, summaryFile: ctx.outputs.summary };
}

/** `pip install -r` every requirement list so its packages' metadata can be resolved. */
export async function installRequirements(
  entries: ManifestEntry[],
  ctx: Pick<CrawlContext, "runner" | "bins" | "logger">,
): Promise<number> {
  let count = 0;
  for (const entry of entries) {
    if (entry.type !== "requirement-list") continue;
    ctx.logger.info("PIP_INSTALL", "Installing requirement list", { path: entry.path });
    await ctx.runner.run(ctx.bins.pip, ["install", "-r", entry.path], { cwd: path.dirname(entry.path) });
    count++;
  }
  return count;
}
