import { randomUUID } from "node:crypto";

/** Header carrying the correlation id on every upstream request. */
export const CORRELATION_HEADER = "X-Request-ID";

/**
 * Returns a random 32 hex character identifier. The same value names the
 * invocation in the audit trail and travels upstream in {@link CORRELATION_HEADER}.
 */
export function generateRequestId(): string {
  return randomUUID().replace(/-/g, "");
}
