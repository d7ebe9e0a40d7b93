/**
 * Canonical taxonomy of the failures surfaced by the gateway. Each entry maps
 * a category to the JSON-RPC error code used when the failure crosses the MCP
 * boundary and to its default message.
 */
export const GATEWAY_ERROR_TAXONOMY = {
  CONFIGURATION_ERROR: { code: -32603, message: "Gateway misconfigured" },
  VALIDATION_ERROR: { code: -32602, message: "Invalid params" },
  RATE_LIMITED: { code: -32002, message: "Rate limit exceeded" },
  TIMEOUT: { code: -32003, message: "Request timeout" },
  UPSTREAM_ERROR: { code: -32010, message: "Upstream request failed" },
} as const;

/** Union of the supported error categories. */
export type GatewayErrorCategory = keyof typeof GATEWAY_ERROR_TAXONOMY;

/** Field-level reason attached to validation failures. */
export interface FieldIssue {
  /** Argument name, suffixed with `[index]` for list entries. */
  readonly field: string;
  /** Machine-readable constraint identifier (`max_terms`, `dataset_id_pattern`, ...). */
  readonly constraint: string;
  readonly message: string;
}

/** Structured diagnostics serialised alongside an error. */
export interface GatewayErrorData {
  category: GatewayErrorCategory;
  request_id?: string;
  hint?: string;
  issues?: readonly FieldIssue[];
  meta?: Record<string, unknown>;
  status?: number | null;
}

export interface GatewayErrorOptions {
  requestId?: string;
  hint?: string;
  issues?: readonly FieldIssue[];
  meta?: Record<string, unknown>;
  status?: number | null;
  cause?: unknown;
}

function createErrorData(category: GatewayErrorCategory, options: GatewayErrorOptions): GatewayErrorData {
  const snapshot: GatewayErrorData = { category };
  if (options.requestId !== undefined) {
    snapshot.request_id = options.requestId;
  }
  if (options.hint !== undefined) {
    snapshot.hint = options.hint;
  }
  if (options.issues !== undefined) {
    snapshot.issues = options.issues;
  }
  if (options.meta !== undefined) {
    snapshot.meta = options.meta;
  }
  if (options.status !== undefined) {
    snapshot.status = options.status;
  }
  return snapshot;
}

/**
 * Base class for every typed error raised by the gateway. Subclasses fix the
 * category while keeping the options bag for hints and metadata.
 */
export class GatewayError extends Error {
  readonly category: GatewayErrorCategory;
  readonly code: number;
  readonly data: GatewayErrorData;

  constructor(category: GatewayErrorCategory, message?: string, options: GatewayErrorOptions = {}) {
    const taxonomy = GATEWAY_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    this.data = createErrorData(category, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** JSON view exposed to callers; never includes the cause chain. */
  toJSON(): { category: GatewayErrorCategory; code: number; message: string; data: GatewayErrorData } {
    return { category: this.category, code: this.code, message: this.message, data: this.data };
  }
}

/**
 * Unknown tool, missing secret or invalid settings. Fatal at startup and never
 * retried.
 */
export class ConfigurationError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

/** Caller arguments rejected by the input validator. */
export class ValidationError extends GatewayError {
  readonly issues: readonly FieldIssue[];

  constructor(issues: readonly FieldIssue[], options: GatewayErrorOptions = {}) {
    const summary = issues.map((issue) => issue.message).join("; ");
    super("VALIDATION_ERROR", summary.length > 0 ? summary : undefined, { ...options, issues });
    this.issues = issues;
  }
}

/** Raised when the token bucket guarding a tool is empty. */
export class RateLimitExceeded extends GatewayError {
  readonly key: string;
  readonly retryAfterMs: number | null;

  constructor(key: string, retryAfterMs: number | null, options: GatewayErrorOptions = {}) {
    const hint =
      retryAfterMs !== null ? `Try again in ${(retryAfterMs / 1000).toFixed(1)} seconds.` : undefined;
    super("RATE_LIMITED", `Rate limit exceeded for ${key}.`, {
      ...options,
      ...(hint !== undefined ? { hint } : {}),
      meta: { ...options.meta, key, retry_after_ms: retryAfterMs },
    });
    this.key = key;
    this.retryAfterMs = retryAfterMs;
  }
}

/** Machine-readable reason carried by {@link UpstreamError}. */
export type UpstreamErrorCode =
  | "E-UPSTREAM-HTTP"
  | "E-UPSTREAM-NETWORK"
  | "E-UPSTREAM-TIMEOUT"
  | "E-UPSTREAM-MALFORMED"
  | "E-UPSTREAM-ABORTED"
  | "E-UPSTREAM-NOT-FOUND";

export interface UpstreamErrorOptions extends GatewayErrorOptions {
  readonly upstreamCode: UpstreamErrorCode;
  readonly attempts?: number;
  readonly recoverable?: boolean;
}

/**
 * Failure talking to the upstream retrieval service: non-2xx status, malformed
 * payload, or a transport failure that survived every retry.
 */
export class UpstreamError extends GatewayError {
  readonly upstreamCode: UpstreamErrorCode;
  readonly status: number | null;
  readonly recoverable: boolean;
  attempts: number;

  constructor(message: string, options: UpstreamErrorOptions) {
    const category: GatewayErrorCategory =
      options.upstreamCode === "E-UPSTREAM-TIMEOUT" || options.upstreamCode === "E-UPSTREAM-ABORTED"
        ? "TIMEOUT"
        : "UPSTREAM_ERROR";
    super(category, message, {
      ...options,
      status: options.status ?? null,
      meta: { ...options.meta, upstream_code: options.upstreamCode },
    });
    this.upstreamCode = options.upstreamCode;
    this.status = options.status ?? null;
    this.recoverable = options.recoverable ?? false;
    this.attempts = options.attempts ?? 1;
  }
}
