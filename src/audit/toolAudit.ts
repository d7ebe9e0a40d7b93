import process from "node:process";

import type { StructuredLogger } from "../logger.js";
import type { GatewayErrorCategory } from "../rpc/errors.js";
import type { SanitizedArguments } from "../tools/inputValidator.js";

export type AuditStatus = "success" | "validation_error" | "rate_limited" | "upstream_error";

/** One record per tool invocation, frozen once built. */
export interface AuditEvent {
  readonly event: "tool_invocation";
  readonly tool: string;
  readonly status: AuditStatus;
  readonly request_id: string;
  readonly duration_ms: number;
  readonly arguments: SanitizedArguments;
  readonly timestamp: string;
  readonly error?: {
    readonly category: GatewayErrorCategory;
    readonly code: number;
    readonly message: string;
  };
}

export interface ToolAuditLoggerOptions {
  /** Destination of audit records. Use a dedicated child logger running at `info`. */
  readonly logger: StructuredLogger;
  /** Secondary channel receiving audit delivery failures. Defaults to stderr. */
  readonly errorChannel?: (line: string) => void;
}

/**
 * Emits audit records synchronously. A failing sink is reported on the error
 * channel and never reaches the caller; when the error channel fails as well
 * the record is counted as dropped.
 */
export class ToolAuditLogger {
  private readonly logger: StructuredLogger;
  private readonly errorChannel: (line: string) => void;
  private dropped = 0;

  constructor(options: ToolAuditLoggerOptions) {
    this.logger = options.logger;
    this.errorChannel = options.errorChannel ?? ((line) => process.stderr.write(line));
  }

  /** Records that could not be delivered to any channel. */
  get droppedCount(): number {
    return this.dropped;
  }

  record(event: AuditEvent): void {
    const frozen = Object.freeze({ ...event, arguments: Object.freeze({ ...event.arguments }) });
    try {
      this.logger.info("tool_invocation", frozen);
    } catch (error) {
      this.reportFailure(frozen, error);
    }
  }

  private reportFailure(event: AuditEvent, error: unknown): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: "error",
      logger: this.logger.name,
      message: "audit_record_failed",
      payload: {
        tool: event.tool,
        request_id: event.request_id,
        status: event.status,
        reason: error instanceof Error ? error.message : String(error),
      },
    });
    try {
      this.errorChannel(`${line}\n`);
    } catch {
      this.dropped += 1;
    }
  }
}
