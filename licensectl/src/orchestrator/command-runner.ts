import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { ToolExitError, ToolMissingError } from "../errors.js";
import type { Logger } from "../log/logger.js";

export type RunOptions = {
  cwd: string;
  /** When set, combined stdout/stderr go to this file instead of being captured. */
  outputFile?: string;
};

export type CommandResult = {
  code: number;
  /** Combined stdout/stderr; empty when redirected to a file. */
  output: string;
};

/** Runs external tools. Implementations reject on failure; there is no partial success. */
export interface CommandRunner {
  run(command: string, args: string[], opts: RunOptions): Promise<CommandResult>;
}

const OUTPUT_TAIL_CHARS = 4000;

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function readTail(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8").slice(-OUTPUT_TAIL_CHARS);
  } catch {
    return "";
  }
}

/**
 * Spawns tools without a shell and waits for them to exit. No timeout is
 * applied: package installs may legitimately run for a long time.
 */
export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: string[], opts: RunOptions): Promise<CommandResult> {
    this.logger.debug("EXEC", `Executing: ${[command, ...args].join(" ")}`, { path: opts.cwd });

    let fd: number | undefined;
    if (opts.outputFile) {
      fs.mkdirSync(path.dirname(opts.outputFile), { recursive: true });
      fd = fs.openSync(opts.outputFile, "w");
    }
    const closeFd = () => {
      if (fd !== undefined) {
        fs.closeSync(fd);
        fd = undefined;
      }
    };

    return new Promise<CommandResult>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: opts.cwd,
          shell: false,
          stdio: ["ignore", fd ?? "pipe", fd ?? "pipe"],
        });
      } catch (e) {
        // Argument validation throws before any child exists.
        closeFd();
        reject(e);
        return;
      }

      let settled = false;
      const chunks: Buffer[] = [];
      child.stdout?.on("data", (d: Buffer) => chunks.push(d));
      child.stderr?.on("data", (d: Buffer) => chunks.push(d));

      child.on("error", (err) => {
        closeFd();
        if (settled) return;
        settled = true;
        if (isErrnoException(err) && err.code === "ENOENT") {
          this.logger.error("TOOL_MISSING", `${command} was not found on PATH`);
          reject(new ToolMissingError(command));
          return;
        }
        reject(err);
      });

      child.on("close", (code) => {
        closeFd();
        if (settled) return;
        settled = true;
        const output = opts.outputFile ? "" : Buffer.concat(chunks).toString("utf8");
        if (code !== 0) {
          const detail = opts.outputFile ? readTail(opts.outputFile) : output.slice(-OUTPUT_TAIL_CHARS);
          this.logger.error("TOOL_FAILED", `${command} exited with code ${code ?? "null"}`, {
            details: { args, output: detail },
          });
          reject(new ToolExitError(command, args, code, detail));
          return;
        }
        resolve({ code, output });
      });
    });
  }
}
