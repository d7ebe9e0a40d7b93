import { setTimeout as delay } from "node:timers/promises";

import { CORRELATION_HEADER, generateRequestId } from "../infra/correlation.js";
import type { StructuredLogger } from "../logger.js";
import { UpstreamError } from "../rpc/errors.js";

/**
 * Retry behaviour of the upstream client, expressed as plain data so it can
 * be derived from settings and asserted in tests.
 */
export interface RetryPolicy {
  /** Total attempts per logical call, first one included. */
  readonly maxAttempts: number;
  /** Fixed pause between two consecutive attempts. */
  readonly delayMs: number;
  /** Inclusive status range treated as recoverable (server errors by default). */
  readonly retryableStatus: { readonly min: number; readonly max: number };
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 500,
  retryableStatus: { min: 500, max: 599 },
};

export type UpstreamMethod = "GET" | "POST";

/** Description of one logical upstream call. */
export interface UpstreamRequest {
  readonly method: UpstreamMethod;
  /** Path relative to the configured base URL, starting with `/`. */
  readonly path: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly body?: unknown;
  /**
   * Statuses handed back to the caller as a response instead of an error,
   * without retry. Used by operations that implement their own fallback.
   */
  readonly tolerateStatuses?: readonly number[];
}

export interface UpstreamResponse {
  readonly status: number;
  /** Parsed JSON body, `null` for tolerated statuses without a JSON body. */
  readonly payload: unknown;
  /** Raw body text exactly as received. */
  readonly body: string;
  /** Number of attempts spent on this call. */
  readonly attempts: number;
}

export interface UpstreamCallOptions {
  /** Correlation id forwarded in {@link CORRELATION_HEADER}; generated when absent. */
  readonly correlationId?: string;
  /** Caller cancellation. Aborting stops the current attempt and the retry loop. */
  readonly signal?: AbortSignal;
}

export interface UpstreamClientOptions {
  readonly baseUrl: string;
  readonly apiKey?: string | null;
  readonly timeoutMs: number;
  readonly retry?: RetryPolicy;
  readonly userAgent?: string;
  readonly logger?: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
  /** Pause between attempts. Tests replace it to avoid real waits. */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : undefined);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function abortedError(cause?: unknown): UpstreamError {
  return new UpstreamError("Upstream call abandoned: the caller cancelled the request", {
    upstreamCode: "E-UPSTREAM-ABORTED",
    status: null,
    recoverable: false,
    cause,
  });
}

/**
 * Extracts a human-readable reason from an error body: the `detail` or
 * `message` field of a JSON object, the JSON document itself, or the raw text.
 */
export function describeErrorBody(body: string, statusText: string): string {
  let detail = "";
  try {
    const payload: unknown = JSON.parse(body);
    if (payload && typeof payload === "object" && !Array.isArray(payload)) {
      const record: Record<string, unknown> = { ...payload };
      const raw = record["detail"] ?? record["message"];
      if (raw === undefined || raw === null) {
        detail = JSON.stringify(payload);
      } else if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
        detail = String(raw);
      } else {
        detail = JSON.stringify(raw);
      }
    } else {
      detail = String(payload);
    }
  } catch {
    detail = body;
  }
  detail = detail.trim();
  return detail.length > 0 ? detail : statusText;
}

/**
 * HTTP client for the upstream retrieval service. Each logical call runs an
 * explicit bounded loop: one request per attempt under a fixed timeout, a
 * fixed pause between attempts, and retries only for transport failures,
 * timeouts and server-side statuses. The JSON body of a successful response is
 * returned untouched.
 */
export class UpstreamClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly userAgent: string;
  private readonly logger?: StructuredLogger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? null;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.userAgent = options.userAgent ?? "glossary-retrieval-mcp/0.1";
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async call(request: UpstreamRequest, options: UpstreamCallOptions = {}): Promise<UpstreamResponse> {
    const correlationId = options.correlationId ?? generateRequestId();
    const url = this.buildUrl(request);
    const headers = this.buildHeaders(correlationId, request.body !== undefined);
    const maxAttempts = Math.max(1, this.retry.maxAttempts);
    let attempt = 0;
    let lastError: UpstreamError | undefined;

    while (attempt < maxAttempts) {
      if (options.signal?.aborted) {
        throw abortedError(options.signal.reason);
      }
      attempt += 1;
      try {
        const response = await this.attempt(url, request, headers, options.signal);
        return { ...response, attempts: attempt };
      } catch (error) {
        const failure = error instanceof UpstreamError ? error : abortedError(error);
        failure.attempts = attempt;
        lastError = failure;
        if (!failure.recoverable || attempt >= maxAttempts) {
          throw failure;
        }
        this.logger?.warn("upstream_retry_scheduled", {
          request_id: correlationId,
          path: request.path,
          attempt,
          max_attempts: maxAttempts,
          delay_ms: this.retry.delayMs,
          upstream_code: failure.upstreamCode,
          status: failure.status,
        });
        try {
          await this.sleep(this.retry.delayMs, options.signal);
        } catch (sleepError) {
          throw abortedError(sleepError);
        }
      }
    }

    throw lastError ?? abortedError();
  }

  private buildUrl(request: UpstreamRequest): URL {
    const url = new URL(`${this.baseUrl}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private buildHeaders(correlationId: string, withJsonBody: boolean): Headers {
    const headers = new Headers({
      Accept: "application/json",
      "User-Agent": this.userAgent,
      [CORRELATION_HEADER]: correlationId,
    });
    if (this.apiKey) {
      headers.set("Authorization", `Bearer ${this.apiKey}`);
    }
    if (withJsonBody) {
      headers.set("Content-Type", "application/json");
    }
    return headers;
  }

  private isRetryableStatus(status: number): boolean {
    return status >= this.retry.retryableStatus.min && status <= this.retry.retryableStatus.max;
  }

  /** Performs a single attempt and classifies its failure, if any. */
  private async attempt(
    url: URL,
    request: UpstreamRequest,
    headers: Headers,
    signal: AbortSignal | undefined,
  ): Promise<Omit<UpstreamResponse, "attempts">> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      let response: Response;
      let body: string;
      try {
        response = await this.fetchImpl(url, {
          method: request.method,
          headers,
          ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
          signal: controller.signal,
        });
        body = await response.text();
      } catch (error) {
        if (timedOut) {
          throw new UpstreamError(`Upstream request timed out after ${this.timeoutMs}ms`, {
            upstreamCode: "E-UPSTREAM-TIMEOUT",
            recoverable: true,
            cause: error,
          });
        }
        if (signal?.aborted || isAbortError(error)) {
          throw abortedError(error);
        }
        throw new UpstreamError("Failed to reach the upstream service", {
          upstreamCode: "E-UPSTREAM-NETWORK",
          recoverable: true,
          cause: error,
        });
      }

      if (request.tolerateStatuses?.includes(response.status)) {
        return { status: response.status, payload: parseJsonOrNull(body), body };
      }

      if (!response.ok) {
        const detail = describeErrorBody(body, response.statusText);
        throw new UpstreamError(`Upstream request failed with status ${response.status}: ${detail}`, {
          upstreamCode: "E-UPSTREAM-HTTP",
          status: response.status,
          recoverable: this.isRetryableStatus(response.status),
        });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (error) {
        throw new UpstreamError("Invalid JSON received from upstream service", {
          upstreamCode: "E-UPSTREAM-MALFORMED",
          status: response.status,
          recoverable: false,
          cause: error,
        });
      }
      return { status: response.status, payload, body };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

function parseJsonOrNull(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
