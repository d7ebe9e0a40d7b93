import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createServer as createHttpServer, type Server as NodeHttpServer, type ServerResponse } from "node:http";

import type { StructuredLogger } from "./logger.js";
import { CORRELATION_HEADER, generateRequestId } from "./infra/correlation.js";
import { createHttpSessionId, type HttpRuntimeOptions } from "./serverOptions.js";

/** Event-loop delay budget considered healthy by `/healthz`. */
const HEALTH_EVENT_LOOP_DELAY_BUDGET_MS = 100;

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Port actually bound, useful when listening on port 0. */
  port: number;
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : 0;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload), "utf8");
}

/** Answers `/healthz` after measuring how long the event loop takes to yield. */
async function handleHealthCheck(res: ServerResponse, logger: StructuredLogger, requestId: string): Promise<void> {
  const before = Date.now();
  await new Promise((resolve) => setImmediate(resolve));
  const delayMs = Date.now() - before;
  const healthy = delayMs <= HEALTH_EVENT_LOOP_DELAY_BUDGET_MS;
  writeJson(res, healthy ? 200 : 503, { ok: healthy, event_loop_delay_ms: delayMs });
  logger.debug("http_healthz", { request_id: requestId, delay_ms: delayMs, status: res.statusCode });
}

/**
 * Serves the MCP server over the Streamable HTTP transport on
 * {@link HttpRuntimeOptions.path}, plus a `/healthz` health check.
 */
export async function startHttpServer(
  server: McpServer,
  options: HttpRuntimeOptions,
  logger: StructuredLogger,
): Promise<HttpServerHandle> {
  const httpTransport = new StreamableHTTPServerTransport({
    sessionIdGenerator: options.stateless ? undefined : () => createHttpSessionId(),
    enableJsonResponse: options.enableJson,
  });

  httpTransport.onerror = (error) => {
    logger.error("http_transport_error", { message: error.message });
  };

  await server.connect(httpTransport);

  const httpServer = createHttpServer(async (req, res) => {
    const headerId = req.headers[CORRELATION_HEADER.toLowerCase()];
    const requestId = typeof headerId === "string" && headerId.length > 0 ? headerId : generateRequestId();
    res.setHeader(CORRELATION_HEADER, requestId);
    const requestUrl = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (requestUrl.pathname === "/healthz") {
      await handleHealthCheck(res, logger, requestId);
      return;
    }

    if (requestUrl.pathname !== options.path) {
      writeJson(res, 404, { jsonrpc: "2.0", id: null, error: { code: -32601, message: "Method not found" } });
      return;
    }

    try {
      await httpTransport.handleRequest(req, res);
    } catch (error) {
      logger.error("http_request_failure", {
        message: error instanceof Error ? error.message : String(error),
        request_id: requestId,
      });
      if (!res.headersSent) {
        writeJson(res, 500, { jsonrpc: "2.0", id: null, error: { code: -32603, message: "Internal error" } });
      } else {
        res.end();
      }
    }
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: error.message });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error.message });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(options.port, options.host, () => {
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        path: options.path,
        json: options.enableJson,
        stateless: options.stateless,
      });
      resolve();
    });
  });

  return {
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      await httpTransport.close();
    },
    port: extractListeningPort(httpServer),
  };
}
