#!/usr/bin/env node

import { Command } from "commander";
import { scan } from "./commands/scan.js";
import { locate } from "./commands/locate.js";
import { validateAll } from "./commands/validate.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import type { CommandFailure } from "./commands/shared.js";
import { createLogger, formatDiagnostic, type OutputFormat } from "./log/logger.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat; verbose?: boolean };

const program = new Command();

program
  .name("licensectl")
  .description("Inventory package licenses declared by requirement lists and package descriptors")
  .version("0.1.0");

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (defaults to the bundled config)")
    .option("--env <name>", "Config overlay to apply on top of base.yaml (e.g. ci)")
    .option("--format <format>", "Output format: human|jsonl", "human")
    .option("--verbose", "Include debug diagnostics");
}

function fail(res: CommandFailure, format: OutputFormat): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
  } else {
    console.error(res.error.message);
  }
  process.exit(exitCodeFor(res.error.code));
}

withCommonOptions(
  program
    .command("scan")
    .description("Locate manifests, extract packages, summarize licenses and crawl node dependencies")
    .option("--no-crawl", "Skip installing and crawling node dependencies")
    .option("--install-requirements", "pip install every requirement list before reading metadata"),
).action(async (opts: CommonOpts & { crawl: boolean; installRequirements?: boolean }) => {
  const logger = createLogger({ format: opts.format, verbose: opts.verbose });
  const res = await scan({
    configDir: opts.config,
    envName: opts.env,
    logger,
    // commander sets crawl=true unless --no-crawl is given; only the flag overrides config.
    crawl: opts.crawl ? undefined : false,
    installRequirements: opts.installRequirements,
  });

  if (!res.ok) fail(res, opts.format);

  if (opts.format === "jsonl") {
    for (const [license, count] of res.summary) {
      process.stdout.write(JSON.stringify({ license, count }) + "\n");
    }
    process.stdout.write(
      JSON.stringify({ level: "info", code: "OK", outputDir: res.outputDir, manifests: res.manifests, packages: res.packages }) + "\n",
    );
  } else {
    console.log(`${res.manifests} manifest(s), ${res.packages} package record(s)`);
    for (const [license, count] of res.summary) console.log(`${String(count).padStart(6)}  ${license}`);
    console.log(`Artifacts written to ${res.outputDir}`);
  }
});

withCommonOptions(program.command("locate").description("List the manifests a scan would read")).action(
  (opts: CommonOpts) => {
    const logger = createLogger({ format: opts.format, verbose: opts.verbose });
    const res = locate({ configDir: opts.config, envName: opts.env, logger });
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      for (const entry of res.entries) process.stdout.write(JSON.stringify(entry) + "\n");
    } else {
      if (res.entries.length === 0) {
        console.log("No manifests found.");
        return;
      }
      for (const entry of res.entries) console.log(`${entry.type}  ${entry.location}  ${entry.path}`);
    }
  },
);

withCommonOptions(program.command("validate").description("Validate the layered config")).action((opts: CommonOpts) => {
  const res = validateAll({ configDir: opts.config, envName: opts.env });

  if (!res.ok) {
    for (const err of res.errors) {
      if (opts.format === "jsonl") process.stdout.write(formatDiagnostic(err, "jsonl") + "\n");
      else console.error(err.message);
    }
    process.exit(EXIT.INVALID_CONFIG);
  }

  for (const w of res.warnings) process.stderr.write(formatDiagnostic(w, opts.format) + "\n");
  if (opts.format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
  } else {
    console.log("OK");
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.SCAN_FAILED);
});
