#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { createMcpServer } from "./gateway/mcpBridge.js";
import { createGatewayRuntime } from "./gateway/runtime.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { parseGatewayRuntimeOptions, type GatewayRuntimeCliOptions } from "./serverOptions.js";

export * from "./gateway/runtime.js";

/**
 * Bootstraps the gateway when the module is executed directly via the CLI.
 * Options are parsed, the runtime is wired, transports are started and
 * shutdown hooks are registered.
 */
async function main(): Promise<void> {
  let options: GatewayRuntimeCliOptions;
  try {
    options = parseGatewayRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger({ stream: "stderr" }).error("cli_options_invalid", { message });
    process.exit(1);
  }

  // stdout belongs to the MCP framing whenever stdio is served.
  const logger = new StructuredLogger({
    logFile: options.logFile,
    stream: options.enableStdio ? "stderr" : "stdout",
  });

  if (!options.enableStdio && !options.http.enabled) {
    logger.error("no_transport_enabled", {});
    await logger.flush();
    process.exit(1);
  }

  const runtime = createGatewayRuntime({
    monitor: options.monitor,
    router: options.router,
    ledgerFile: options.ledgerFile,
    logger,
  });
  runtime.start();

  const cleanup: Array<() => Promise<void>> = [];

  if (options.http.enabled) {
    try {
      const handle = await startHttpServer(runtime, options.http, logger);
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await runtime.stop();
      process.exit(1);
    }
  }

  if (options.enableStdio) {
    const server = createMcpServer(runtime.dispatcher, runtime.serverInfo, logger);
    await server.connect(new StdioServerTransport());
    cleanup.push(() => server.close());
    logger.info("stdio_listening");
  }

  logger.info("runtime_started", {
    stdio: options.enableStdio,
    http: options.http.enabled,
    load_policy: options.router.loadPolicy,
    max_concurrent_executions: options.router.maxConcurrent,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_signal", { signal });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      }
    }
    await runtime.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    new StructuredLogger({ stream: "stderr" }).error("runtime_start_failed", { message });
    process.exit(1);
  });
}
