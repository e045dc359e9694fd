export type StorageFailureReason =
  | "lock_timeout"
  | "serialization_failure"
  | "deadlock"
  | "constraint_violation"
  | "invalid_value"
  | "connection"
  | "unknown";

// postgres.js reports transport problems with its own codes instead of a SQLSTATE
const CONNECTION_ERROR_CODES = new Set([
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "CONNECT_TIMEOUT",
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
]);

const RETRYABLE_REASONS: ReadonlySet<StorageFailureReason> = new Set([
  "lock_timeout",
  "serialization_failure",
  "deadlock",
  "connection",
]);

/**
 * Finds the first string `code` on the error or on its `cause` chain.
 * drizzle wraps driver errors, so the SQLSTATE is not always on the top-level error.
 */
export function findErrorCode(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return null;
}

export function classifyStorageError(error: unknown): StorageFailureReason {
  const code = findErrorCode(error);
  if (!code) {
    return "unknown";
  }

  if (code === "55P03") {
    return "lock_timeout";
  }
  if (code === "40001") {
    return "serialization_failure";
  }
  if (code === "40P01") {
    return "deadlock";
  }
  // Class 23: integrity constraint violation
  if (code.startsWith("23")) {
    return "constraint_violation";
  }
  // Class 22: data exception (bad uuid text, numeric overflow)
  if (code.startsWith("22")) {
    return "invalid_value";
  }
  // Class 08: connection exception
  if (code.startsWith("08") || CONNECTION_ERROR_CODES.has(code)) {
    return "connection";
  }
  return "unknown";
}

export function isRetryableStorageFailure(reason: StorageFailureReason): boolean {
  return RETRYABLE_REASONS.has(reason);
}
