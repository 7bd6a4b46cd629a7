import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { scan } from "../src/commands/scan.js";
import { locate } from "../src/commands/locate.js";
import { createMemoryLogger } from "../src/log/logger.js";
import { ToolMissingError } from "../src/errors.js";
import { FakeRunner } from "./fake-runner.js";
import { makeTree, removeTree } from "./helpers.js";

function writeConfig(dir: string, root: string, extra: Record<string, unknown> = {}): string {
  const configDir = path.join(dir, "config");
  fs.mkdirSync(configDir, { recursive: true });
  const config = {
    schema_version: "1.0.0",
    locations: { repo: path.join(root, "repo") },
    rules: [
      { pattern: "requirements*.txt", type: "requirement-list" },
      { pattern: "package.json", type: "structured-descriptor" },
    ],
    exclude: ["node_modules"],
    output_dir: path.join(root, "out"),
    outputs: {
      report: "report.json",
      summary: "license-summary.json",
      dependencies: "node-dependencies.json",
      crawler_json: "node-licenses.json",
      crawler_summary: "node-licenses-summary.txt",
    },
    bins: { npm: "npm", npx: "npx", pip: "pip" },
    crawl: { enabled: true, workdir: path.join(root, "crawl") },
    python: { site_packages: [], install_requirements: false },
    ...extra,
  };
  // JSON is valid YAML.
  fs.writeFileSync(path.join(configDir, "base.yaml"), JSON.stringify(config, null, 2));
  return configDir;
}

describe("scan command", () => {
  let root: string;
  let configDir: string;

  beforeEach(() => {
    root = makeTree("licensectl-scan-", {
      "repo/requirements.txt": "pkg-x==2.0\n\n pkg-y \n",
      "repo/app/package.json": JSON.stringify({
        name: "app",
        version: "1.0.0",
        license: "MIT",
        dependencies: { lodash: "^4.17.21" },
        devDependencies: { lodash: "^4.17.21", vitest: "^2.1.8" },
      }),
      "repo/app/node_modules/lodash/package.json": JSON.stringify({ name: "lodash", license: "MIT" }),
      "repo/tools/package.json": JSON.stringify({ name: "tools", private: true }),
    });
    configDir = writeConfig(root, root);
  });

  afterEach(() => {
    removeTree(root);
  });

  const readJson = (file: string): unknown => JSON.parse(fs.readFileSync(path.join(root, "out", file), "utf8"));

  it("runs the whole pipeline and writes every artifact", async () => {
    const runner = new FakeRunner();
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner });
    if (!res.ok) throw new Error(res.error.message);

    expect(res.manifests).toBe(3);
    expect(res.packages).toBe(4);
    expect([...res.summary.entries()]).toEqual([
      ["NONE", 3],
      ["MIT", 1],
    ]);
    expect(runner.commandLines()).toEqual([
      "npm install license-checker",
      "npm install --force --allow-missing --legacy-peer-deps lodash vitest",
      "npx license-checker --json",
      "npx license-checker --summary",
    ]);

    expect(readJson("license-summary.json")).toEqual({ NONE: 3, MIT: 1 });
    expect(readJson("node-dependencies.json")).toEqual([
      {
        path: path.join(root, "repo", "app", "package.json"),
        type: "structured-descriptor",
        location: "repo",
        packageNames: ["lodash", "vitest"],
      },
      { path: path.join(root, "repo", "tools", "package.json"), type: "structured-descriptor", location: "repo", packageNames: [] },
    ]);
    expect(readJson("report.json")).toEqual([
      {
        path: path.join(root, "repo", "requirements.txt"),
        type: "requirement-list",
        location: "repo",
        packages: [
          { name: "pkg-x", metadataResolved: false },
          { name: "pkg-y", metadataResolved: false },
        ],
      },
      {
        path: path.join(root, "repo", "app", "package.json"),
        type: "structured-descriptor",
        location: "repo",
        packages: [{ name: "app", version: "1.0.0", license: "MIT", metadataResolved: true }],
      },
      {
        path: path.join(root, "repo", "tools", "package.json"),
        type: "structured-descriptor",
        location: "repo",
        packages: [{ name: "tools", metadataResolved: true }],
      },
    ]);

    expect(res.manifest.artifacts.map((a) => a.kind)).toEqual([
      "report",
      "summary",
      "dependencies",
      "crawler_json",
      "crawler_summary",
    ]);
    expect(res.manifest.totals).toEqual({ manifests: 3, packages: 4, licenses: 2 });
    expect(fs.existsSync(path.join(root, "out", "manifest.json"))).toBe(true);
  });

  it("skips the crawl when disabled", async () => {
    const runner = new FakeRunner();
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner, crawl: false });
    if (!res.ok) throw new Error(res.error.message);

    expect(res.crawl).toBeNull();
    expect(runner.calls).toEqual([]);
    expect(res.manifest.artifacts).toHaveLength(3);
  });

  it("pip installs requirement lists when asked", async () => {
    const runner = new FakeRunner();
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner, crawl: false, installRequirements: true });

    expect(res.ok).toBe(true);
    expect(runner.commandLines()).toEqual([`pip install -r ${path.join(root, "repo", "requirements.txt")}`]);
  });

  it("resolves installed metadata from site-packages", async () => {
    fs.mkdirSync(path.join(root, "site", "pkg_x-2.0.dist-info"), { recursive: true });
    fs.writeFileSync(path.join(root, "site", "pkg_x-2.0.dist-info", "METADATA"), "Name: pkg-x\nVersion: 2.0\nLicense: BSD\n");
    configDir = writeConfig(root, root, { python: { site_packages: [path.join(root, "site")], install_requirements: false } });

    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner: new FakeRunner(), crawl: false });
    if (!res.ok) throw new Error(res.error.message);

    expect([...res.summary.entries()]).toEqual([
      ["NONE", 2],
      ["BSD", 1],
      ["MIT", 1],
    ]);
  });

  it("aborts on an unparsable descriptor", async () => {
    fs.writeFileSync(path.join(root, "repo", "tools", "package.json"), "{ nope");
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner: new FakeRunner() });

    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("MANIFEST_PARSE_FAILED");
  });

  it("surfaces a missing tool", async () => {
    const runner = new FakeRunner((call) => new ToolMissingError(call.command));
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner });

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("TOOL_MISSING");
      expect(res.error.message).toContain("Executable not found: npm");
    }
  });

  it("reports an invalid config", async () => {
    fs.writeFileSync(path.join(configDir, "base.yaml"), "schema_version: \"1.0.0\"\n");
    const res = await scan({ configDir, env: {}, logger: createMemoryLogger(), runner: new FakeRunner() });

    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe("CONFIG_INVALID");
  });
});

describe("locate command", () => {
  it("lists manifests in rule order", () => {
    const root = makeTree("licensectl-locate-cmd-", {
      "repo/requirements.txt": "flask\n",
      "repo/package.json": "{}",
    });
    try {
      const res = locate({ configDir: writeConfig(root, root), env: {}, logger: createMemoryLogger() });
      if (!res.ok) throw new Error(res.error.message);
      expect(res.entries.map((e) => [path.basename(e.path), e.type])).toEqual([
        ["requirements.txt", "requirement-list"],
        ["package.json", "structured-descriptor"],
      ]);
    } finally {
      removeTree(root);
    }
  });
});
