import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { crawlNodeLicenses, ensureCrawler, installRequirements, type CrawlContext } from "../src/orchestrator/crawl.js";
import { SpawnCommandRunner } from "../src/orchestrator/command-runner.js";
import { createMemoryLogger } from "../src/log/logger.js";
import type { DependencyBundle } from "../src/types/manifest.js";
import { ToolExitError, ToolMissingError } from "../src/errors.js";
import { FakeRunner } from "./fake-runner.js";
import { makeTree, removeTree } from "./helpers.js";

const bundle = (file: string, names: string[]): DependencyBundle => ({
  path: file,
  type: "structured-descriptor",
  location: "repo",
  packageNames: new Set(names),
});

describe("node license crawl", () => {
  let tmp: string;
  let workdir: string;

  beforeEach(() => {
    tmp = makeTree("licensectl-crawl-", {});
    workdir = path.join(tmp, "crawl");
  });

  afterEach(() => {
    removeTree(tmp);
  });

  const context = (runner: FakeRunner): CrawlContext => ({
    runner,
    bins: { npm: "npm", npx: "npx", pip: "pip" },
    workdir,
    outputs: { json: path.join(tmp, "out", "licenses.json"), summary: path.join(tmp, "out", "licenses.txt") },
    logger: createMemoryLogger(),
  });

  it("installs the crawler, the dependency set, then writes both reports", async () => {
    const runner = new FakeRunner();
    const outcome = await crawlNodeLicenses(
      [bundle("/repo/web/package.json", ["react", "vitest"]), bundle("/repo/api/package.json", ["fastify", "react"])],
      context(runner),
    );

    expect(runner.commandLines()).toEqual([
      "npm install license-checker",
      "npm install --force --allow-missing --legacy-peer-deps react vitest fastify",
      "npx license-checker --json",
      "npx license-checker --summary",
    ]);
    expect(runner.calls.every((c) => c.cwd === workdir)).toBe(true);
    expect(runner.calls[2].outputFile).toBe(path.join(tmp, "out", "licenses.json"));
    expect(runner.calls[3].outputFile).toBe(path.join(tmp, "out", "licenses.txt"));
    expect(outcome).toEqual({
      skipped: false,
      installed: ["react", "vitest", "fastify"],
      jsonFile: path.join(tmp, "out", "licenses.json"),
      summaryFile: path.join(tmp, "out", "licenses.txt"),
    });
    expect(fs.readFileSync(path.join(tmp, "out", "licenses.json"), "utf8")).toBe("license-checker --json output\n");
  });

  it("does not reinstall a crawler that is already present", async () => {
    const bin = path.join(workdir, "node_modules", ".bin", "license-checker");
    fs.mkdirSync(path.dirname(bin), { recursive: true });
    fs.writeFileSync(bin, "");

    const runner = new FakeRunner();
    expect(await ensureCrawler(context(runner))).toBe(false);
    await crawlNodeLicenses([bundle("/repo/package.json", ["react"])], context(runner));

    expect(runner.commandLines()[0]).toBe("npm install --force --allow-missing --legacy-peer-deps react");
    expect(runner.calls).toHaveLength(3);
  });

  it("treats an empty dependency set as a no-op", async () => {
    const runner = new FakeRunner();
    const ctx = context(runner);
    const outcome = await crawlNodeLicenses([bundle("/repo/package.json", [])], ctx);

    expect(outcome).toEqual({ skipped: true, installed: [] });
    expect(runner.calls).toEqual([]);
    expect(fs.existsSync(workdir)).toBe(false);
  });

  it("stops at the first failing tool", async () => {
    const runner = new FakeRunner((call) =>
      call.args.includes("--legacy-peer-deps") ? new ToolExitError(call.command, call.args, 1, "ERESOLVE") : undefined,
    );

    await expect(crawlNodeLicenses([bundle("/repo/package.json", ["react"])], context(runner))).rejects.toBeInstanceOf(
      ToolExitError,
    );
    expect(runner.calls).toHaveLength(2);
  });

  it("uses the configured binaries", async () => {
    const runner = new FakeRunner();
    await crawlNodeLicenses([bundle("/repo/package.json", ["react"])], {
      ...context(runner),
      bins: { npm: "/opt/node/bin/npm", npx: "/opt/node/bin/npx", pip: "pip3" },
    });
    expect(runner.calls.map((c) => c.command)).toEqual([
      "/opt/node/bin/npm",
      "/opt/node/bin/npm",
      "/opt/node/bin/npx",
      "/opt/node/bin/npx",
    ]);
  });
});

describe("requirement installs", () => {
  it("pip installs each requirement list from its own directory", async () => {
    const runner = new FakeRunner();
    const count = await installRequirements(
      [
        { path: "/repo/requirements.txt", type: "requirement-list", location: "repo" },
        { path: "/repo/web/package.json", type: "structured-descriptor", location: "repo" },
        { path: "/repo/svc/requirements-dev.txt", type: "requirement-list", location: "repo" },
      ],
      { runner, bins: { npm: "npm", npx: "npx", pip: "pip3" }, logger: createMemoryLogger() },
    );

    expect(count).toBe(2);
    expect(runner.calls).toEqual([
      { command: "pip3", args: ["install", "-r", "/repo/requirements.txt"], cwd: "/repo", outputFile: undefined },
      { command: "pip3", args: ["install", "-r", "/repo/svc/requirements-dev.txt"], cwd: "/repo/svc", outputFile: undefined },
    ]);
  });
});

describe("spawn command runner", () => {
  it("reports a missing binary distinctly", async () => {
    const logger = createMemoryLogger();
    const runner = new SpawnCommandRunner(logger);

    const err = await runner.run("licensectl-no-such-binary", ["--json"], { cwd: process.cwd() }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ToolMissingError);
    expect(err).toMatchObject({ code: "TOOL_MISSING", command: "licensectl-no-such-binary" });
    expect(logger.codes()).toEqual(["EXEC", "TOOL_MISSING"]);
  });

  it("closes the output file when spawn rejects its arguments", async () => {
    const tmp = makeTree("licensectl-spawn-", {});
    const openSync = vi.spyOn(fs, "openSync");
    const closeSync = vi.spyOn(fs, "closeSync");
    try {
      const runner = new SpawnCommandRunner(createMemoryLogger());
      const err = await runner
        .run("npm", ["install", "bad\u0000name"], { cwd: tmp, outputFile: path.join(tmp, "out.txt") })
        .catch((e: unknown) => e);

      expect(err).toHaveProperty("code", "ERR_INVALID_ARG_VALUE");
      expect(openSync).toHaveBeenCalledTimes(1);
      expect(closeSync).toHaveBeenCalledWith(openSync.mock.results[0]?.value);
    } finally {
      openSync.mockRestore();
      closeSync.mockRestore();
      removeTree(tmp);
    }
  });
});
