#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { collectRedactionTokens, loadGatewaySettings } from "./config/settings.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { GatewayError } from "./rpc/errors.js";
import { createGatewayRuntime, type GatewayRuntime } from "./runtime.js";
import { parseGatewayCliOptions, type GatewayCliOptions } from "./serverOptions.js";

/** Logger used before the settings are known. */
const bootLogger = new StructuredLogger({ name: "gateway" });

function describeFailure(error: unknown): Record<string, unknown> {
  if (error instanceof GatewayError) {
    return error.toJSON();
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

/**
 * Parses the CLI, loads the settings from the environment and serves the
 * gateway on the selected transport until SIGINT or SIGTERM.
 */
async function main(): Promise<void> {
  let options: GatewayCliOptions;
  try {
    options = parseGatewayCliOptions(process.argv.slice(2));
  } catch (error) {
    bootLogger.error("cli_options_invalid", describeFailure(error));
    process.exit(2);
  }

  let runtime: GatewayRuntime;
  try {
    const settings = loadGatewaySettings(process.env);
    const effective = options.logFile ? { ...settings, logFile: options.logFile } : settings;
    const logger = new StructuredLogger({
      name: "gateway",
      level: effective.logLevel,
      logFile: effective.logFile,
      redactSecrets: collectRedactionTokens(effective),
    });
    runtime = createGatewayRuntime(effective, { logger });
  } catch (error) {
    bootLogger.error("gateway_configuration_invalid", describeFailure(error));
    process.exit(1);
  }

  const { logger, server } = runtime;
  const cleanup: Array<() => Promise<void>> = [];

  if (options.transport === "streamable-http") {
    try {
      const handle = await startHttpServer(server, options.http, logger);
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", describeFailure(error));
      process.exit(1);
    }
  } else {
    await server.connect(new StdioServerTransport());
    logger.info("stdio_listening");
  }
  cleanup.push(() => runtime.close());

  logger.info("gateway_started", { transport: options.transport, toolset: runtime.registry.toolset });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", describeFailure(error));
      }
    }
    process.exit(0);
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    bootLogger.error("gateway_crashed", describeFailure(error));
    process.exit(1);
  });
}
