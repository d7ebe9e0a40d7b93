/**
 * Helpers turning pipeline outcomes into MCP `CallToolResult` envelopes so
 * every tool answers with the same shape.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { GatewayError } from "../rpc/errors.js";
import type { InvocationResult } from "./pipeline.js";

/** Structured payload type surfaced by MCP tool responses. */
type ToolStructuredContent = NonNullable<CallToolResult["structuredContent"]>;

interface BuildToolResponseParams {
  /** Text exposed on the MCP textual channel. */
  readonly text: string;
  /** Structured JSON payload surfaced under `structuredContent`, when any. */
  readonly structured?: ToolStructuredContent;
  readonly isError: boolean;
}

export function buildToolResponse({ text, structured, isError }: BuildToolResponseParams): CallToolResult {
  return {
    isError,
    content: [{ type: "text", text }],
    ...(structured !== undefined ? { structuredContent: structured } : {}),
  };
}

function asStructuredContent(payload: unknown): ToolStructuredContent | undefined {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return undefined;
  }
  return { ...payload };
}

/**
 * Success envelope: the text channel carries the upstream body exactly as
 * received; object payloads are mirrored under `structuredContent`.
 */
export function buildToolSuccessResult(body: string, payload: unknown): CallToolResult {
  const structured = asStructuredContent(payload);
  return buildToolResponse({ text: body, isError: false, ...(structured ? { structured } : {}) });
}

/** Error envelope carrying `{ error: { category, code, message, ... } }`. */
export function buildToolErrorResult(error: GatewayError, requestId?: string): CallToolResult {
  const structured = {
    error: {
      ...error.data,
      category: error.category,
      code: error.code,
      message: error.message,
      ...(requestId !== undefined ? { request_id: requestId } : {}),
    },
  };
  return buildToolResponse({ text: JSON.stringify(structured), structured, isError: true });
}

/** Maps an {@link InvocationResult} onto the MCP envelope. */
export function toToolResult(result: InvocationResult): CallToolResult {
  switch (result.status) {
    case "success":
      return buildToolSuccessResult(result.body, result.payload);
    case "validation_error":
    case "rate_limited":
      return buildToolErrorResult(result.error, result.requestId);
  }
}

/** Envelope for a failure escaping the pipeline (upstream or configuration). */
export function toToolFailure(error: unknown, requestId: string): CallToolResult {
  if (error instanceof GatewayError) {
    return buildToolErrorResult(error, requestId);
  }
  throw error;
}
