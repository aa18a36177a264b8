/**
 * HTTP surface of the gateway exercised through in-memory request/response
 * doubles: JSON-RPC endpoint, worker routes, health summary and headers.
 */
import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";

import { createGatewayRuntime, type GatewayRuntime } from "../../src/gateway/runtime.js";
import { MAX_BODY_BYTES } from "../../src/http/body.js";
import { createGatewayHttpHandler, type GatewayHttpHandler } from "../../src/httpServer.js";
import { FakeWorkerTransport } from "../helpers/fakeTransport.js";
import { MemoryHttpResponse, createHttpRequest, createJsonRpcRequest, readJsonBody } from "../helpers/http.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

const REGISTRATION = {
  instance_id: "w1",
  address: "http://127.0.0.1:9001",
  tools: [{ tool_id: "echo", description: "Echoes its input" }],
};

describe("http/gateway handler", () => {
  let runtime: GatewayRuntime;
  let logger: RecordingLogger;
  let handler: GatewayHttpHandler;

  beforeEach(() => {
    logger = new RecordingLogger();
    runtime = createGatewayRuntime({ transport: new FakeWorkerTransport(), logger, now: () => 0 });
    handler = createGatewayHttpHandler(runtime, logger);
  });

  describe("POST /rpc", () => {
    it("answers JSON-RPC requests with 200", async () => {
      const response = new MemoryHttpResponse();
      await handler(createJsonRpcRequest({ jsonrpc: "2.0", id: 1, method: "ping" }), response);

      expect(response.statusCode).to.equal(200);
      expect(response.headers["content-type"]).to.equal("application/json");
      expect(readJsonBody(response)).to.deep.equal({ jsonrpc: "2.0", id: 1, result: {} });
    });

    it("reports JSON-RPC errors inside a 200 response", async () => {
      const response = new MemoryHttpResponse();
      await handler(createJsonRpcRequest("{not json"), response);

      expect(response.statusCode).to.equal(200);
      expect(readJsonBody(response)).to.have.nested.property("error.code", -32700);
    });

    it("answers notifications with 204 and an empty body", async () => {
      const response = new MemoryHttpResponse();
      await handler(createJsonRpcRequest({ jsonrpc: "2.0", method: "ping" }), response);

      expect(response.statusCode).to.equal(204);
      expect(response.body).to.equal("");
    });

    it("rejects other verbs with 405", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("GET", "/rpc"), response);

      expect(response.statusCode).to.equal(405);
      expect(readJsonBody(response)).to.deep.equal({ error: { code: 405, message: "Method Not Allowed" } });
    });

    it("rejects oversized bodies with 413", async () => {
      const response = new MemoryHttpResponse();
      await handler(createJsonRpcRequest("x".repeat(MAX_BODY_BYTES + 1)), response);

      expect(response.statusCode).to.equal(413);
      expect(readJsonBody(response)).to.deep.equal({ error: { code: 413, message: "Payload Too Large" } });
      expect(logger.find("http_payload_too_large")[0]?.payload).to.deep.equal({ limit: MAX_BODY_BYTES, path: "/rpc" });
    }).timeout(10_000);
  });

  describe("worker routes", () => {
    it("registers a worker with 201", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("POST", "/workers", { "content-type": "application/json" }, REGISTRATION), response);

      expect(response.statusCode).to.equal(201);
      expect(readJsonBody(response)).to.deep.equal({ ok: true, instance_id: "w1", tools: ["echo"] });
      expect(runtime.catalog.get("w1")?.active).to.equal(true);
    });

    it("rejects an invalid registration with 400", async () => {
      const response = new MemoryHttpResponse();
      await handler(
        createHttpRequest("POST", "/workers", {}, { instance_id: "w1", address: "ftp://127.0.0.1" }),
        response,
      );

      expect(response.statusCode).to.equal(400);
      expect(readJsonBody(response)).to.have.nested.property("error.code", -32602);
      expect(readJsonBody(response)).to.have.nested.property(
        "error.data.hint",
        "address: must use the http or https scheme",
      );
    });

    it("rejects an unparsable registration body with 400", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("POST", "/workers", {}, "{broken"), response);

      expect(response.statusCode).to.equal(400);
      expect(readJsonBody(response)).to.have.nested.property("error.code", -32700);
    });

    it("lists workers in their wire shape with runtime state", async () => {
      runtime.catalog.register(REGISTRATION);
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("GET", "/workers"), response);

      expect(response.statusCode).to.equal(200);
      expect(readJsonBody(response)).to.deep.equal({
        total: 1,
        workers: [
          {
            instance_id: "w1",
            name: "w1",
            address: "http://127.0.0.1:9001",
            weight: 100,
            health_check_url: "http://127.0.0.1:9001/health",
            ttl_seconds: 300,
            tools: [
              {
                tool_id: "echo",
                name: "echo",
                description: "Echoes its input",
                input_schema: { type: "object", properties: {} },
                timeout_seconds: 300,
                retry_attempts: 3,
              },
            ],
            active: true,
            health: "healthy",
            current_load: 0,
            consecutive_failures: 0,
            deactivation_reason: null,
            breaker: "closed",
          },
        ],
      });
    });

    it("accepts heartbeats from registered workers and 404s unknown ones", async () => {
      runtime.catalog.register(REGISTRATION);

      const known = new MemoryHttpResponse();
      await handler(createHttpRequest("POST", "/workers/w1/heartbeat"), known);
      expect(known.statusCode).to.equal(200);
      expect(readJsonBody(known)).to.deep.equal({ ok: true });

      const unknown = new MemoryHttpResponse();
      await handler(createHttpRequest("POST", "/workers/ghost/heartbeat"), unknown);
      expect(unknown.statusCode).to.equal(404);
      expect(readJsonBody(unknown)).to.deep.equal({
        ok: false,
        error: { code: 404, message: "unknown or inactive worker 'ghost'" },
      });
    });

    it("deregisters workers, decoding the path segment", async () => {
      runtime.catalog.register({ ...REGISTRATION, instance_id: "worker one" });

      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("DELETE", "/workers/worker%20one"), response);

      expect(response.statusCode).to.equal(200);
      expect(readJsonBody(response)).to.deep.equal({ ok: true, removed: true });
      expect(runtime.catalog.get("worker one")?.active).to.equal(false);
    });
  });

  it("summarises catalog health on /healthz", async () => {
    runtime.catalog.register(REGISTRATION);
    runtime.catalog.register({ ...REGISTRATION, instance_id: "w2" });
    runtime.catalog.deregister("w2");

    const response = new MemoryHttpResponse();
    await handler(createHttpRequest("GET", "/healthz"), response);

    expect(readJsonBody(response)).to.deep.equal({
      status: "ok",
      workers: { total: 2, active: 1, healthy: 1 },
      running_executions: 0,
    });
  });

  it("answers unknown routes with 404", async () => {
    const response = new MemoryHttpResponse();
    await handler(createHttpRequest("GET", "/metrics"), response);

    expect(response.statusCode).to.equal(404);
    expect(readJsonBody(response)).to.deep.equal({ error: { code: 404, message: "Not Found" } });
  });

  describe("headers", () => {
    it("applies the security headers to every response", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("GET", "/nowhere"), response);

      expect(response.headers).to.include({
        "x-content-type-options": "nosniff",
        "x-frame-options": "DENY",
        "referrer-policy": "no-referrer",
        "cache-control": "no-store",
      });
    });

    it("forwards the caller's request id", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("GET", "/healthz", { "X-Request-Id": " req-42 " }), response);

      expect(response.headers["x-request-id"]).to.equal("req-42");
    });

    it("mints a request id when none is supplied", async () => {
      const response = new MemoryHttpResponse();
      await handler(createHttpRequest("GET", "/healthz"), response);

      expect(response.headers["x-request-id"]).to.match(/^[0-9a-f-]{36}$/);
    });
  });
});
