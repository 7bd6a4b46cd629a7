export { locateManifests, compileRulePattern } from "./locator/locator.js";
export { extractManifest, extractAll, type ExtractContext } from "./extractor/extractor.js";
export { parseRequirementName, parseRequirementNames } from "./extractor/requirement-list.js";
export { readDescriptor, descriptorLicense } from "./extractor/structured-descriptor.js";
export { detectTextEncoding, decodeText, looksLikeText } from "./extractor/encoding.js";
export { DistInfoResolver, normalizeDistributionName, type MetadataResolver, type PackageMetadata } from "./metadata/dist-info.js";
export { mergeDependencySets, collectPackageNames, dependencyNames, DEPENDENCY_CATEGORIES } from "./merger/dependency-set.js";
export { summarizeLicenses, summaryToObject, countRecords, NO_LICENSE } from "./summary/license-summary.js";
export { crawlNodeLicenses, ensureCrawler, installRequirements, type CrawlContext, type CrawlOutcome } from "./orchestrator/crawl.js";
export { SpawnCommandRunner, type CommandRunner, type CommandResult, type RunOptions } from "./orchestrator/command-runner.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig, requireValidConfig } from "./config/validator.js";
export { createLogger, createMemoryLogger, type Logger, type Diagnostic } from "./log/logger.js";
export { scan, type ScanResult } from "./commands/scan.js";
export * from "./errors.js";
export type * from "./types/manifest.js";
export type * from "./types/config.js";
