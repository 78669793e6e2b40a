export const ERROR_CODES = [
  "INVALID_VERSION",
  "TOO_MANY_ARGUMENTS",
  "UNKNOWN_OPTION",
  "UNSUPPORTED_REPO",
  "FETCH_FAILED",
  "MANIFEST_PARSE_FAILED",
  "NO_HASH_FILE",
  "UNTRUSTED_SIGNATURE",
  "UNSUPPORTED_PLATFORM",
  "CHECKSUM_MISMATCH",
  "EXTRACTION_FAILED",
  "CONFIG_INVALID",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Fatal pipeline failure. Every code is terminal for the invocation;
 * `details` carries whatever the stage had on hand for diagnostics.
 */
export class PipelineError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
