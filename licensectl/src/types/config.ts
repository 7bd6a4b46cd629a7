/** Configuration types for the layered config (base.yaml ← env.yaml ← LICENSECTL_*). */
import type { EcosystemType } from "./manifest.js";

export type ManifestRule = {
  /** Glob matched against the file name, or against the relative path when it contains "/". */
  pattern: string;
  type: EcosystemType;
};

export type OutputsConfig = {
  report: string;
  summary: string;
  dependencies: string;
  crawler_json: string;
  crawler_summary: string;
};

export type BinsConfig = {
  npm: string;
  npx: string;
  pip: string;
};

export type CrawlConfig = {
  enabled: boolean;
  workdir: string;
};

export type PythonConfig = {
  site_packages: string[];
  install_requirements: boolean;
};

export type LicensectlConfig = {
  schema_version: string;
  locations: Record<string, string>;
  rules: ManifestRule[];
  exclude?: string[];
  output_dir: string;
  outputs: OutputsConfig;
  bins: BinsConfig;
  crawl: CrawlConfig;
  python: PythonConfig;
};
