import {
  CallToolResultSchema,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodTypeAny } from "zod";

import { toValidationError } from "../catalog/schemas.js";
import type { ToolSchema } from "../catalog/types.js";
import { runWithRequestContext, type RequestTransport } from "../infra/requestContext.js";
import { StructuredLogger } from "../logger.js";
import {
  JSON_RPC_INVALID_REQUEST,
  JSON_RPC_METHOD_NOT_FOUND,
  JSON_RPC_PARSE_ERROR,
  ProtocolError,
  ValidationError,
  toGatewayError,
  toJsonRpc,
  type JsonRpcResponse,
} from "../rpc/errors.js";
import { findHubTool, HUB_TOOLS, type HubToolContext } from "./hubTools.js";

export type JsonRpcId = string | number | null;

/** Per-request information supplied by the transport. */
export interface DispatchOptions {
  transport: RequestTransport;
  /** Aborted when the client goes away; forwarded to the router. */
  signal?: AbortSignal;
}

const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string().trim().min(1),
    capabilities: z.record(z.unknown()).optional(),
    clientInfo: z.object({ name: z.string(), version: z.string() }).passthrough().optional(),
  })
  .passthrough();

const ListToolsParamsSchema = z.object({ cursor: z.string().optional() }).passthrough();

const CallToolParamsSchema = z
  .object({
    name: z.string().trim().min(1, "name must not be empty"),
    arguments: z.record(z.unknown()).optional(),
  })
  .passthrough();

const InstanceParamsSchema = z.object({ instance_id: z.string().trim().min(1) }).strict();

function parseParams<S extends ZodTypeAny>(schema: S, params: unknown, method: string): z.infer<S> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw toValidationError(parsed.error, `invalid params for '${method}'`);
  }
  return parsed.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Shapes a tool output into an MCP `CallToolResult`. Workers that already
 * answer with MCP content are passed through untouched.
 */
export function toCallToolResult(output: unknown, meta?: Record<string, unknown>): CallToolResult {
  if (isPlainObject(output) && Array.isArray(output.content)) {
    const passthrough = CallToolResultSchema.safeParse(output);
    if (passthrough.success) {
      const result = passthrough.data;
      return meta ? { ...result, _meta: { ...result._meta, ...meta } } : result;
    }
  }
  const structuredContent = isPlainObject(output) ? output : { result: output ?? null };
  return {
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
    structuredContent,
    ...(meta ? { _meta: meta } : {}),
  };
}

/** Normalises a declared schema into the object schema MCP tools must expose. */
export function toToolInputSchema(schema: ToolSchema): Tool["inputSchema"] {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((entry): entry is string => typeof entry === "string")
    : undefined;
  return { ...schema, type: "object", properties, ...(required ? { required } : {}) };
}

type MethodHandler = (params: unknown, options: DispatchOptions) => Promise<unknown>;

/**
 * JSON-RPC front door of the gateway. Validates envelopes, routes the finite
 * set of supported methods and converts every failure into a structured
 * JSON-RPC error.
 */
export class GatewayDispatcher {
  private readonly context: HubToolContext;
  private readonly logger?: StructuredLogger;
  private readonly methods: ReadonlyMap<string, MethodHandler>;

  constructor(context: HubToolContext, logger?: StructuredLogger) {
    this.context = context;
    this.logger = logger;
    this.methods = new Map<string, MethodHandler>([
      ["initialize", async (params) => this.initialize(params)],
      ["ping", async () => ({})],
      [
        "tools/list",
        async (params) => {
          parseParams(ListToolsParamsSchema, params, "tools/list");
          return { tools: this.listTools() };
        },
      ],
      [
        "tools/call",
        async (params, options) => {
          const call = parseParams(CallToolParamsSchema, params, "tools/call");
          return this.callTool(call.name, call.arguments ?? {}, options.signal);
        },
      ],
      ["workers/register", async (params) => this.registerWorker(params)],
      [
        "workers/deregister",
        async (params) => {
          const { instance_id } = parseParams(InstanceParamsSchema, params, "workers/deregister");
          return { ok: true, removed: this.context.catalog.deregister(instance_id) };
        },
      ],
      [
        "workers/heartbeat",
        async (params) => {
          const { instance_id } = parseParams(InstanceParamsSchema, params, "workers/heartbeat");
          this.heartbeat(instance_id);
          return { ok: true };
        },
      ],
    ]);
  }

  /** Parses a raw body and dispatches it. Unparsable JSON yields `-32700`. */
  async handleText(body: string, options: DispatchOptions): Promise<JsonRpcResponse | null> {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      return toJsonRpc(
        null,
        new ProtocolError("Parse error", { code: JSON_RPC_PARSE_ERROR, hint: "body must be valid JSON" }),
      );
    }
    return this.handle(payload, options);
  }

  /**
   * Dispatches one JSON-RPC envelope. Notifications (no `id`) are executed and
   * produce no response.
   */
  async handle(payload: unknown, options: DispatchOptions): Promise<JsonRpcResponse | null> {
    let envelope: { id: JsonRpcId; method: string; params: unknown; notification: boolean };
    try {
      envelope = this.validateEnvelope(payload);
    } catch (error) {
      return toJsonRpc(this.extractId(payload), toGatewayError(error));
    }

    const { id, method, params, notification } = envelope;
    const context = { requestId: id, method, transport: options.transport };
    return runWithRequestContext(context, async (): Promise<JsonRpcResponse | null> => {
      const handler = this.methods.get(method);
      try {
        if (!handler) {
          throw new ProtocolError("Method not found", {
            code: JSON_RPC_METHOD_NOT_FOUND,
            hint: `unknown method '${method}'`,
          });
        }
        const result = await handler(params, options);
        return notification ? null : { jsonrpc: "2.0", id, result };
      } catch (error) {
        const gatewayError = toGatewayError(error);
        if (gatewayError.category === "INTERNAL") {
          this.logger?.error("jsonrpc_request_failed", { method, error });
        } else {
          this.logger?.warn("jsonrpc_request_rejected", {
            method,
            code: gatewayError.code,
            category: gatewayError.category,
            message: gatewayError.message,
          });
        }
        return notification ? null : toJsonRpc(id, gatewayError);
      }
    });
  }

  /** Negotiates the protocol version: echoed when supported, latest otherwise. */
  initialize(params: unknown): Record<string, unknown> {
    const { protocolVersion } = parseParams(InitializeParamsSchema, params, "initialize");
    const negotiated = SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion) ? protocolVersion : LATEST_PROTOCOL_VERSION;
    return {
      protocolVersion: negotiated,
      capabilities: { tools: { listChanged: false } },
      serverInfo: { ...this.context.serverInfo },
    };
  }

  /** Discoverable worker tools followed by the built-in hub tools. */
  listTools(): Tool[] {
    const workerTools: Tool[] = this.context.catalog.listTools().map((tool) => ({
      name: tool.id,
      description: tool.description,
      inputSchema: toToolInputSchema(tool.inputSchema),
    }));
    const hubTools: Tool[] = HUB_TOOLS.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toToolInputSchema(tool.inputSchema),
    }));
    return [...workerTools, ...hubTools];
  }

  /** Serves hub tools locally and routes every other tool to a worker. */
  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<CallToolResult> {
    const hubTool = findHubTool(name);
    if (hubTool) {
      return toCallToolResult(await hubTool.invoke(args, this.context));
    }
    const execution = await this.context.router.execute(name, args, { signal });
    return toCallToolResult(execution.output, {
      worker_id: execution.workerId,
      execution_id: execution.executionId,
      correlation_id: execution.correlationId,
      attempts: execution.attempts,
    });
  }

  registerWorker(params: unknown): { ok: true; instance_id: string; tools: string[] } {
    const instance = this.context.catalog.register(params);
    return { ok: true, instance_id: instance.id, tools: instance.tools.map((tool) => tool.id) };
  }

  heartbeat(instanceId: string): void {
    if (!this.context.catalog.heartbeat(instanceId)) {
      throw new ValidationError("unknown or inactive worker", {
        hint: `instance_id: '${instanceId}' must register again`,
      });
    }
  }

  private validateEnvelope(payload: unknown): {
    id: JsonRpcId;
    method: string;
    params: unknown;
    notification: boolean;
  } {
    if (Array.isArray(payload)) {
      throw new ProtocolError("Invalid Request", {
        code: JSON_RPC_INVALID_REQUEST,
        hint: "batch requests are not supported",
      });
    }
    if (!isPlainObject(payload)) {
      throw new ProtocolError("Invalid Request", { code: JSON_RPC_INVALID_REQUEST, hint: "body must be an object" });
    }
    if (payload.jsonrpc !== "2.0") {
      throw new ProtocolError("Invalid Request", {
        code: JSON_RPC_INVALID_REQUEST,
        hint: "jsonrpc must equal '2.0'",
      });
    }
    const method = typeof payload.method === "string" ? payload.method.trim() : "";
    if (!method) {
      throw new ProtocolError("Invalid Request", {
        code: JSON_RPC_INVALID_REQUEST,
        hint: "method must be a non-empty string",
      });
    }
    const notification = !("id" in payload);
    const rawId = payload.id;
    if (!notification && rawId !== null && typeof rawId !== "string" && typeof rawId !== "number") {
      throw new ProtocolError("Invalid Request", {
        code: JSON_RPC_INVALID_REQUEST,
        hint: "id must be a string, a number or null",
      });
    }
    const id: JsonRpcId = typeof rawId === "string" || typeof rawId === "number" ? rawId : null;
    return { id, method, params: payload.params, notification };
  }

  private extractId(payload: unknown): JsonRpcId {
    if (!isPlainObject(payload)) {
      return null;
    }
    const id = payload.id;
    return typeof id === "string" || typeof id === "number" ? id : null;
  }
}
