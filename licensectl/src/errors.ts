export type ErrorCode =
  | "CONFIG_INVALID"
  | "MANIFEST_PARSE_FAILED"
  | "UNKNOWN_ECOSYSTEM"
  | "TOOL_FAILED"
  | "TOOL_MISSING"
  | "ARTIFACT_INVALID";

/** Base class for every fatal error a scan can raise. */
export class LicensectlError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends LicensectlError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export class ManifestParseError extends LicensectlError {
  constructor(
    readonly manifestPath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super("MANIFEST_PARSE_FAILED", `Cannot parse manifest ${manifestPath}: ${reason}`, options);
  }
}

export class UnknownEcosystemError extends LicensectlError {
  constructor(readonly ecosystemType: string, manifestPath: string) {
    super("UNKNOWN_ECOSYSTEM", `Unknown ecosystem type "${ecosystemType}" for manifest ${manifestPath}`);
  }
}

export class ToolExitError extends LicensectlError {
  constructor(
    readonly command: string,
    readonly args: string[],
    readonly exitCode: number | null,
    readonly output: string,
  ) {
    super("TOOL_FAILED", `Command failed with exit code ${exitCode ?? "null"}: ${[command, ...args].join(" ")}`);
  }
}

export class ToolMissingError extends LicensectlError {
  constructor(readonly command: string) {
    super(
      "TOOL_MISSING",
      `Executable not found: ${command}. Install it or point the matching "bins" entry of the config at it.`,
    );
  }
}

export class ArtifactInvalidError extends LicensectlError {
  constructor(artifactPath: string, errors: string) {
    super("ARTIFACT_INVALID", `Artifact ${artifactPath} does not match its schema: ${errors}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
