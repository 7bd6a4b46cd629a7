export type LogLevel = "debug" | "info" | "warn" | "error";

export type Diagnostic = {
  level: LogLevel;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export type Logger = {
  log(diagnostic: Diagnostic): void;
  debug(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void;
  info(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void;
  warn(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void;
  error(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void;
};

export function diag(
  level: LogLevel,
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

function bind(sink: (d: Diagnostic) => void): Logger {
  return {
    log: sink,
    debug: (code, message, extra) => sink(diag("debug", code, message, extra)),
    info: (code, message, extra) => sink(diag("info", code, message, extra)),
    warn: (code, message, extra) => sink(diag("warn", code, message, extra)),
    error: (code, message, extra) => sink(diag("error", code, message, extra)),
  };
}

/** Render a diagnostic as a single line in the given format. */
export function formatDiagnostic(d: Diagnostic, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  const where = d.path ? ` (${d.path})` : "";
  return `[${d.level}] ${d.message}${where}`;
}

/**
 * Logger for CLI runs. Diagnostics go to stderr so stdout stays free for
 * command output; debug lines are dropped unless `verbose` is set.
 */
export function createLogger(opts: {
  format?: OutputFormat;
  verbose?: boolean;
  write?: (line: string) => void;
} = {}): Logger {
  const format = opts.format ?? "human";
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));
  return bind((d) => {
    if (d.level === "debug" && !opts.verbose) return;
    write(formatDiagnostic(d, format));
  });
}

export type MemoryLogger = Logger & { diagnostics: Diagnostic[]; codes(): string[] };

/** Logger that keeps every diagnostic in memory. */
export function createMemoryLogger(): MemoryLogger {
  const diagnostics: Diagnostic[] = [];
  const logger = bind((d) => {
    diagnostics.push(d);
  });
  return { ...logger, diagnostics, codes: () => diagnostics.map((d) => d.code) };
}
