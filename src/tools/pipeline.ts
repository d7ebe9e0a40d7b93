import { performance } from "node:perf_hooks";

import type { AuditStatus, ToolAuditLogger } from "../audit/toolAudit.js";
import { generateRequestId } from "../infra/correlation.js";
import type { TokenBucketLimiter } from "../infra/tokenBucket.js";
import type { StructuredLogger } from "../logger.js";
import { type GatewayError, RateLimitExceeded, UpstreamError, ValidationError } from "../rpc/errors.js";
import type { UpstreamClient } from "../upstream/client.js";
import { executeOperation } from "../upstream/operations.js";
import type { InputValidator, SanitizedArguments } from "./inputValidator.js";
import type { ToolRegistry } from "./registry.js";

export type InvocationStage =
  | "received"
  | "validating"
  | "rate_limiting"
  | "calling_upstream"
  | "auditing"
  | "completed";

/** Per-invocation bookkeeping. Never shared between invocations. */
export interface InvocationContext {
  readonly requestId: string;
  readonly toolName: string;
  readonly startedAt: number;
  stage: InvocationStage;
  readonly sanitizedArguments: SanitizedArguments;
}

export type InvocationResult =
  | {
      readonly status: "success";
      readonly requestId: string;
      /** Parsed upstream payload, untouched. */
      readonly payload: unknown;
      /** Upstream body text, byte for byte. */
      readonly body: string;
      readonly attempts: number;
    }
  | { readonly status: "validation_error"; readonly requestId: string; readonly error: ValidationError }
  | { readonly status: "rate_limited"; readonly requestId: string; readonly error: RateLimitExceeded };

export interface InvokeOptions {
  /** Correlation id chosen by the caller; generated when omitted. */
  readonly requestId?: string;
  /** Cancels the upstream call and the retry loop. */
  readonly signal?: AbortSignal;
}

export interface InvocationPipelineOptions {
  readonly registry: ToolRegistry;
  readonly validator: InputValidator;
  readonly limiter: TokenBucketLimiter;
  readonly client: UpstreamClient;
  readonly audit: ToolAuditLogger;
  readonly logger?: StructuredLogger;
  /** Monotonic clock used for `duration_ms`. */
  readonly now?: () => number;
  /** Observer notified on every stage transition. */
  readonly onStageChange?: (context: Readonly<InvocationContext>) => void;
}

/**
 * Single path taken by every tool call:
 * `received → validating → rate_limiting → calling_upstream → auditing → completed`,
 * with early exits to `auditing` after a validation failure or a rate-limit
 * rejection. Each invocation consumes at most one token and emits exactly one
 * audit record, except for configuration failures (an unknown tool, or a
 * descriptor unable to build its upstream operation) which are raised before
 * a token is spent.
 */
export class InvocationPipeline {
  private readonly registry: ToolRegistry;
  private readonly validator: InputValidator;
  private readonly limiter: TokenBucketLimiter;
  private readonly client: UpstreamClient;
  private readonly audit: ToolAuditLogger;
  private readonly logger?: StructuredLogger;
  private readonly now: () => number;
  private readonly onStageChange?: (context: Readonly<InvocationContext>) => void;

  constructor(options: InvocationPipelineOptions) {
    this.registry = options.registry;
    this.validator = options.validator;
    this.limiter = options.limiter;
    this.client = options.client;
    this.audit = options.audit;
    this.logger = options.logger;
    this.now = options.now ?? (() => performance.now());
    this.onStageChange = options.onStageChange;
  }

  /**
   * Runs one invocation.
   *
   * @throws ConfigurationError for a tool outside the active registry, or when
   * the descriptor cannot map the validated arguments to an operation.
   * @throws UpstreamError once the upstream call failed for good, after auditing it.
   */
  async invoke(toolName: string, args: unknown, options: InvokeOptions = {}): Promise<InvocationResult> {
    const descriptor = this.registry.resolve(toolName);
    const context: InvocationContext = {
      requestId: options.requestId ?? generateRequestId(),
      toolName: descriptor.name,
      startedAt: this.now(),
      stage: "received",
      sanitizedArguments: this.validator.summarize(descriptor, args),
    };
    this.notify(context);

    this.advance(context, "validating");
    const validation = this.validator.validate(descriptor, args);
    if (!validation.ok) {
      const error = new ValidationError(validation.issues, { requestId: context.requestId });
      this.complete(context, "validation_error", error);
      return { status: "validation_error", requestId: context.requestId, error };
    }

    const operation = descriptor.toOperation(validation.value);

    this.advance(context, "rate_limiting");
    const decision = this.limiter.admit(descriptor.rateLimitKey);
    if (!decision.admitted) {
      const error = new RateLimitExceeded(decision.key, decision.retryAfterMs, { requestId: context.requestId });
      this.complete(context, "rate_limited", error);
      return { status: "rate_limited", requestId: context.requestId, error };
    }

    this.advance(context, "calling_upstream");
    try {
      const response = await executeOperation(this.client, operation, {
        correlationId: context.requestId,
        ...(options.signal ? { signal: options.signal } : {}),
      });
      this.complete(context, "success");
      return {
        status: "success",
        requestId: context.requestId,
        payload: response.payload,
        body: response.body,
        attempts: response.attempts,
      };
    } catch (error) {
      const failure =
        error instanceof UpstreamError
          ? error
          : new UpstreamError("Upstream call failed unexpectedly", {
              upstreamCode: "E-UPSTREAM-NETWORK",
              requestId: context.requestId,
              cause: error,
            });
      this.complete(context, "upstream_error", failure);
      throw failure;
    }
  }

  private advance(context: InvocationContext, stage: InvocationStage): void {
    context.stage = stage;
    this.notify(context);
  }

  private notify(context: InvocationContext): void {
    this.onStageChange?.({ ...context });
  }

  /** Audits the final status, then closes the invocation. */
  private complete(context: InvocationContext, status: AuditStatus, error?: GatewayError): void {
    this.advance(context, "auditing");
    const durationMs = Math.max(0, Math.round((this.now() - context.startedAt) * 1000) / 1000);
    this.audit.record({
      event: "tool_invocation",
      tool: context.toolName,
      status,
      request_id: context.requestId,
      duration_ms: durationMs,
      arguments: context.sanitizedArguments,
      timestamp: new Date().toISOString(),
      ...(error ? { error: { category: error.category, code: error.code, message: error.message } } : {}),
    });
    if (error) {
      this.logger?.debug("tool_invocation_rejected", {
        request_id: context.requestId,
        tool: context.toolName,
        status,
        category: error.category,
      });
    }
    this.advance(context, "completed");
  }
}
