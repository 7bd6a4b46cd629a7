import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { ManifestRule } from "../types/config.js";
import type { ManifestEntry } from "../types/manifest.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../log/logger.js";

export type LocateOptions = {
  /** Directory globs (relative to the location root) that are never entered. */
  exclude?: string[];
  /** Defaults to the platform's file system semantics. */
  caseInsensitive?: boolean;
  logger: Logger;
};

function platformIsCaseInsensitive(): boolean {
  return process.platform === "win32" || process.platform === "darwin";
}

/** Build a predicate for one rule pattern. */
export function compileRulePattern(pattern: string, nocase: boolean): (relPath: string) => boolean {
  if (pattern.includes("/")) {
    const full = pattern.startsWith("**/") ? pattern : `**/${pattern}`;
    return (relPath) => minimatch(relPath, full, { nocase, dot: true });
  }
  return (relPath) => minimatch(path.posix.basename(relPath), pattern, { nocase, dot: true });
}

/**
 * Walk `root` and return every file path relative to it (posix separators).
 * Unreadable subtrees are reported and skipped.
 */
function walkFiles(root: string, isExcluded: (relDir: string) => boolean, logger: Logger): string[] {
  const files: string[] = [];

  const visit = (relDir: string) => {
    const absDir = path.join(root, relDir);
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(absDir, { withFileTypes: true });
    } catch (e) {
      logger.warn("TRAVERSAL_FAILED", `Skipping unreadable directory: ${errorMessage(e)}`, { path: absDir });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (isExcluded(rel)) {
          logger.debug("DIR_EXCLUDED", `Excluded directory ${rel}`, { path: path.join(root, rel) });
          continue;
        }
        visit(rel);
      } else if (entry.isFile()) {
        files.push(rel);
      } else if (entry.isSymbolicLink()) {
        const absPath = path.join(root, rel);
        let target: fs.Stats;
        try {
          target = fs.statSync(absPath);
        } catch (e) {
          logger.warn("TRAVERSAL_FAILED", `Skipping unresolvable link: ${errorMessage(e)}`, { path: absPath });
          continue;
        }
        // Linked files count; linked directories are never entered.
        if (target.isFile()) files.push(rel);
      }
    }
  };

  visit("");
  return files;
}

/**
 * Find every manifest under every location for every rule.
 *
 * Entries are ordered by location, then rule, then path. A rule that matches
 * nothing contributes nothing.
 */
export function locateManifests(
  locations: Record<string, string>,
  rules: ManifestRule[],
  opts: LocateOptions,
): ManifestEntry[] {
  const nocase = opts.caseInsensitive ?? platformIsCaseInsensitive();
  const excludes = (opts.exclude ?? []).map((p) => compileRulePattern(p, nocase));
  const isExcluded = (relDir: string) => excludes.some((match) => match(relDir));
  const matchers = rules.map((rule) => ({ rule, match: compileRulePattern(rule.pattern, nocase) }));

  const results: ManifestEntry[] = [];

  for (const [location, root] of Object.entries(locations)) {
    const absRoot = path.resolve(root);
    opts.logger.debug("LOCATION_SCAN", `Scanning location "${location}"`, { path: absRoot });

    const files = walkFiles(absRoot, isExcluded, opts.logger);

    for (const { rule, match } of matchers) {
      const hits = files.filter((rel) => match(rel));
      opts.logger.debug("RULE_MATCHES", `Rule "${rule.pattern}" matched ${hits.length} file(s) in "${location}"`, {
        details: { location, pattern: rule.pattern, count: hits.length },
      });
      for (const rel of hits) {
        results.push({ path: path.join(absRoot, ...rel.split("/")), type: rule.type, location });
      }
    }
  }

  return results;
}
