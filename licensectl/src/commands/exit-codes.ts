import type { ErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  SCAN_FAILED: 1,
  INVALID_CONFIG: 2,
  TOOL_FAILED: 3,
  TOOL_MISSING: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_ERROR: Record<ErrorCode, ExitCode> = {
  CONFIG_INVALID: EXIT.INVALID_CONFIG,
  MANIFEST_PARSE_FAILED: EXIT.SCAN_FAILED,
  UNKNOWN_ECOSYSTEM: EXIT.SCAN_FAILED,
  ARTIFACT_INVALID: EXIT.SCAN_FAILED,
  TOOL_FAILED: EXIT.TOOL_FAILED,
  TOOL_MISSING: EXIT.TOOL_MISSING,
};

export function exitCodeFor(code: ErrorCode): ExitCode {
  return EXIT_BY_ERROR[code];
}
