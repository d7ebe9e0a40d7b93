import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { ToolAuditLogger } from "./audit/toolAudit.js";
import { collectRedactionTokens, type GatewaySettings } from "./config/settings.js";
import { generateRequestId } from "./infra/correlation.js";
import { TokenBucketLimiter } from "./infra/tokenBucket.js";
import { StructuredLogger } from "./logger.js";
import { buildToolInputShape } from "./rpc/toolSchemas.js";
import { InputValidator } from "./tools/inputValidator.js";
import { InvocationPipeline } from "./tools/pipeline.js";
import { buildToolRegistry, type ToolRegistry } from "./tools/registry.js";
import { toToolFailure, toToolResult } from "./tools/shared.js";
import { UpstreamClient } from "./upstream/client.js";

export const SERVER_NAME = "glossary-retrieval-mcp";
export const SERVER_VERSION = "0.1.0";

/** Collaborators replaced by tests or embedding hosts. */
export interface GatewayRuntimeDependencies {
  readonly logger?: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Monotonic clock driving token refills. */
  readonly clock?: () => number;
  /** Receives audit delivery failures. */
  readonly auditErrorChannel?: (line: string) => void;
}

export interface GatewayRuntime {
  readonly settings: GatewaySettings;
  readonly server: McpServer;
  readonly registry: ToolRegistry;
  readonly pipeline: InvocationPipeline;
  readonly limiter: TokenBucketLimiter;
  readonly logger: StructuredLogger;
  close(): Promise<void>;
}

/**
 * Wires settings into the gateway components and registers every tool of the
 * active toolset on a fresh {@link McpServer}.
 *
 * @throws ConfigurationError when the registry rejects the settings.
 */
export function createGatewayRuntime(
  settings: GatewaySettings,
  deps: GatewayRuntimeDependencies = {},
): GatewayRuntime {
  const logger =
    deps.logger ??
    new StructuredLogger({
      name: "gateway",
      level: settings.logLevel,
      logFile: settings.logFile,
      redactSecrets: collectRedactionTokens(settings),
    });

  const registry = buildToolRegistry(settings);
  const validator = new InputValidator(registry.list(), settings);
  const limiter = new TokenBucketLimiter({
    capacity: settings.rateLimitCapacity,
    refillIntervalMs: settings.rateLimitIntervalMs,
    overrides: settings.toolRateLimits,
    ...(deps.clock ? { now: deps.clock } : {}),
  });
  const client = new UpstreamClient({
    baseUrl: settings.apiBaseUrl,
    apiKey: settings.apiKey,
    timeoutMs: settings.httpTimeoutMs,
    retry: {
      maxAttempts: settings.retryAttempts,
      delayMs: settings.retryWaitMs,
      retryableStatus: { min: 500, max: 599 },
    },
    userAgent: `${SERVER_NAME}/${SERVER_VERSION}`,
    logger: logger.child("gateway.upstream"),
    ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
    ...(deps.sleep ? { sleep: deps.sleep } : {}),
  });
  const audit = new ToolAuditLogger({
    logger: logger.child("gateway.audit", { level: "info" }),
    ...(deps.auditErrorChannel ? { errorChannel: deps.auditErrorChannel } : {}),
  });
  const pipeline = new InvocationPipeline({ registry, validator, limiter, client, audit, logger });

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  for (const descriptor of registry.list()) {
    server.registerTool(
      descriptor.name,
      {
        title: descriptor.title,
        description: descriptor.description,
        inputSchema: buildToolInputShape(descriptor),
      },
      async (input, extra): Promise<CallToolResult> => {
        const requestId = generateRequestId();
        try {
          const result = await pipeline.invoke(descriptor.name, input, { requestId, signal: extra.signal });
          return toToolResult(result);
        } catch (error) {
          logger.warn("tool_invocation_failed", {
            tool: descriptor.name,
            request_id: requestId,
            message: error instanceof Error ? error.message : String(error),
          });
          return toToolFailure(error, requestId);
        }
      },
    );
  }

  logger.info("gateway_runtime_ready", {
    toolset: registry.toolset,
    tools: registry.list().map((descriptor) => descriptor.name),
    upstream: settings.apiBaseUrl,
  });

  return {
    settings,
    server,
    registry,
    pipeline,
    limiter,
    logger,
    async close() {
      await server.close();
      limiter.reset();
    },
  };
}
