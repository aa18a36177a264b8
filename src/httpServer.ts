import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { serializeRegistration } from "./catalog/schemas.js";
import type { GatewayRuntime } from "./gateway/runtime.js";
import { PayloadTooLargeError, readRequestBody } from "./http/body.js";
import { applySecurityHeaders, ensureRequestId } from "./http/headers.js";
import { runWithRequestContext } from "./infra/requestContext.js";
import { StructuredLogger } from "./logger.js";
import { GatewayError, toGatewayError } from "./rpc/errors.js";
import type { HttpRuntimeOptions } from "./serverOptions.js";

/** Subset of the Node.js response API touched by the gateway handler. */
export interface HttpResponseLike {
  statusCode: number;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  end(chunk?: string): unknown;
}

export type HttpTransportRequest = IncomingMessage;

export type GatewayHttpHandler = (
  req: HttpTransportRequest,
  res: HttpResponseLike,
  signal?: AbortSignal,
) => Promise<void>;

/** Collaborators the HTTP surface needs from the runtime. */
export type HttpGatewayDependencies = Pick<GatewayRuntime, "dispatcher" | "catalog" | "breakers" | "router">;

const WORKER_ROUTE = /^\/workers\/([^/]+)$/;
const HEARTBEAT_ROUTE = /^\/workers\/([^/]+)\/heartbeat$/;

function sendJson(res: HttpResponseLike, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
}

function statusForError(error: GatewayError): number {
  switch (error.category) {
    case "VALIDATION_ERROR":
    case "PROTOCOL_ERROR":
      return 400;
    default:
      return 500;
  }
}

function sendGatewayError(res: HttpResponseLike, error: GatewayError): void {
  sendJson(res, statusForError(error), { error: { code: error.code, message: error.message, data: error.data } });
}

function decodeSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Builds the request handler serving the JSON-RPC endpoint and the worker
 * registration routes. The handler is exercised directly by the tests through
 * in-memory request/response doubles.
 */
export function createGatewayHttpHandler(
  deps: HttpGatewayDependencies,
  logger?: StructuredLogger,
): GatewayHttpHandler {
  const readBodyOrReject = async (req: IncomingMessage, res: HttpResponseLike): Promise<string | null> => {
    try {
      return (await readRequestBody(req)).raw;
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        logger?.warn("http_payload_too_large", { limit: error.limit, path: req.url });
        sendJson(res, 413, { error: { code: 413, message: error.message } });
        return null;
      }
      throw error;
    }
  };

  const handleRpc = async (req: IncomingMessage, res: HttpResponseLike, signal?: AbortSignal): Promise<void> => {
    const raw = await readBodyOrReject(req, res);
    if (raw === null) {
      return;
    }
    const response = await deps.dispatcher.handleText(raw, { transport: "http", signal });
    if (response === null) {
      res.statusCode = 204;
      res.end();
      return;
    }
    sendJson(res, 200, response);
  };

  const handleRegister = async (req: IncomingMessage, res: HttpResponseLike): Promise<void> => {
    const raw = await readBodyOrReject(req, res);
    if (raw === null) {
      return;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      sendJson(res, 400, { error: { code: -32700, message: "Parse error", data: { hint: "body must be valid JSON" } } });
      return;
    }
    sendJson(res, 201, deps.dispatcher.registerWorker(payload));
  };

  const listWorkers = (res: HttpResponseLike): void => {
    const workers = deps.catalog.listAll().map((worker) => ({
      ...serializeRegistration(worker),
      active: worker.active,
      health: worker.health,
      current_load: worker.currentLoad,
      consecutive_failures: worker.consecutiveFailures,
      deactivation_reason: worker.deactivationReason,
      breaker: deps.breakers.stateOf(worker.id),
    }));
    sendJson(res, 200, { total: workers.length, workers });
  };

  const healthz = (res: HttpResponseLike): void => {
    const workers = deps.catalog.listAll();
    sendJson(res, 200, {
      status: "ok",
      workers: {
        total: workers.length,
        active: workers.filter((worker) => worker.active).length,
        healthy: workers.filter((worker) => worker.active && worker.health === "healthy").length,
      },
      running_executions: deps.router.runningExecutions,
    });
  };

  return async (req, res, signal) => {
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);
    const method = (req.method ?? "GET").toUpperCase();
    const path = new URL(req.url ?? "/", "http://gateway.local").pathname;

    await runWithRequestContext({ requestId, transport: "http" }, async () => {
      try {
        if (path === "/rpc") {
          if (method !== "POST") {
            sendJson(res, 405, { error: { code: 405, message: "Method Not Allowed" } });
            return;
          }
          await handleRpc(req, res, signal);
          return;
        }
        if (path === "/healthz" && method === "GET") {
          healthz(res);
          return;
        }
        if (path === "/workers") {
          if (method === "POST") {
            await handleRegister(req, res);
            return;
          }
          if (method === "GET") {
            listWorkers(res);
            return;
          }
          sendJson(res, 405, { error: { code: 405, message: "Method Not Allowed" } });
          return;
        }
        const heartbeat = HEARTBEAT_ROUTE.exec(path);
        if (heartbeat && method === "POST") {
          const workerId = decodeSegment(heartbeat[1]);
          if (!deps.catalog.heartbeat(workerId)) {
            sendJson(res, 404, { ok: false, error: { code: 404, message: `unknown or inactive worker '${workerId}'` } });
            return;
          }
          sendJson(res, 200, { ok: true });
          return;
        }
        const worker = WORKER_ROUTE.exec(path);
        if (worker && method === "DELETE") {
          const removed = deps.catalog.deregister(decodeSegment(worker[1]));
          sendJson(res, 200, { ok: true, removed });
          return;
        }
        sendJson(res, 404, { error: { code: 404, message: "Not Found" } });
      } catch (error) {
        const gatewayError = toGatewayError(error);
        if (statusForError(gatewayError) >= 500) {
          logger?.error("http_request_failed", { method, path, error });
        }
        sendGatewayError(res, gatewayError);
      }
    });
  };
}

export interface HttpServerHandle {
  readonly port: number;
  readonly host: string;
  close(): Promise<void>;
}

/**
 * Starts the HTTP listener. A request whose client disconnects before the
 * response is written aborts the routed invocation.
 */
export async function startHttpServer(
  deps: HttpGatewayDependencies,
  options: HttpRuntimeOptions,
  logger: StructuredLogger,
): Promise<HttpServerHandle> {
  const handler = createGatewayHttpHandler(deps, logger);
  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const abort = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        abort.abort();
      }
    });
    handler(req, res, abort.signal).catch((error: unknown) => {
      logger.error("http_handler_crashed", { error });
      if (!res.headersSent) {
        sendJson(res, 500, { error: { code: -32000, message: "Internal error" } });
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? (address satisfies AddressInfo).port : options.port;
  logger.info("http_listening", { host: options.host, port, path: "/rpc" });

  return {
    port,
    host: options.host,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
