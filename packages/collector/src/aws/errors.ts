// =============================================================================
// AWS Error Handling
// =============================================================================

/**
 * Extract the error code from an SDK v3 error.
 *
 * SDK v3 errors carry the service code in `.name`; a few shapes use `.Code`
 * or `.code` instead (network errors surface as `ECONNRESET` etc. on `.code`).
 */
export function getAwsErrorCode(err: unknown): string {
  if (!err || typeof err !== "object") return "Unknown";
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("Code" in err && typeof err.Code === "string") return err.Code;
  if ("name" in err && typeof err.name === "string" && err.name !== "Error") return err.name;
  return "Unknown";
}

const TRANSIENT_CODES = new Set([
  "Throttling",
  "ThrottlingException",
  "RequestLimitExceeded",
  "LimitExceededException",
  "TooManyRequestsException",
  "ServiceUnavailable",
  "InternalFailure",
  "InternalServiceError",
  "RequestTimeout",
  "TimeoutError",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

/** Throttling, server faults and network failures are worth retrying later */
export function isTransientAwsError(err: unknown): boolean {
  if (err && typeof err === "object" && "$fault" in err && err.$fault === "server") {
    return true;
  }
  return TRANSIENT_CODES.has(getAwsErrorCode(err));
}
