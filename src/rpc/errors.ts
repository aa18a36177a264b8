/**
 * Canonical taxonomy of the errors the gateway surfaces to its clients. Each
 * category maps to the JSON-RPC error code and the default message returned
 * when the throw site does not provide a more specific one.
 */
export const GATEWAY_ERROR_TAXONOMY = {
  VALIDATION_ERROR: { code: -32602, message: "Invalid params" },
  PROTOCOL_ERROR: { code: -32600, message: "Invalid Request" },
  TOOL_UNAVAILABLE: { code: -32010, message: "Tool unavailable" },
  CIRCUIT_OPEN: { code: -32011, message: "Circuit open" },
  INVOCATION_TIMEOUT: { code: -32012, message: "Invocation timed out" },
  INVOCATION_FAILED: { code: -32013, message: "Invocation failed" },
  BACKPRESSURE: { code: -32014, message: "Too many concurrent executions" },
  CANCELLED: { code: -32015, message: "Invocation cancelled" },
  INTERNAL: { code: -32000, message: "Internal error" },
} as const;

export type GatewayErrorCategory = keyof typeof GATEWAY_ERROR_TAXONOMY;

/** Codes JSON-RPC 2.0 reserves for envelope level failures. */
export const JSON_RPC_PARSE_ERROR = -32700;
export const JSON_RPC_INVALID_REQUEST = -32600;
export const JSON_RPC_METHOD_NOT_FOUND = -32601;

/** Structured payload attached to the `data` member of JSON-RPC errors. */
export interface GatewayErrorData {
  category: GatewayErrorCategory;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
}

export interface GatewayErrorOptions {
  /** Overrides the taxonomy code (parse error vs invalid request, ...). */
  code?: number;
  hint?: string;
  issues?: unknown;
  meta?: Record<string, unknown>;
  cause?: unknown;
}

/** Base class of every typed error thrown by the gateway. */
export class GatewayError extends Error {
  readonly category: GatewayErrorCategory;
  readonly code: number;
  readonly data: GatewayErrorData;

  constructor(category: GatewayErrorCategory, message?: string, options: GatewayErrorOptions = {}) {
    const taxonomy = GATEWAY_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.category = category;
    this.code = options.code ?? taxonomy.code;
    this.data = {
      category,
      ...(options.hint !== undefined ? { hint: options.hint } : {}),
      ...(options.issues !== undefined ? { issues: options.issues } : {}),
      ...(options.meta !== undefined ? { meta: options.meta } : {}),
    };
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Whether the router may retry the invocation against another instance. */
  get retryable(): boolean {
    return this.category === "INVOCATION_FAILED" || this.category === "INVOCATION_TIMEOUT";
  }
}

/** Malformed registration or request parameters; never retried. */
export class ValidationError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** Malformed JSON-RPC envelope, unknown method or unparsable body. */
export class ProtocolError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("PROTOCOL_ERROR", message, options);
  }
}

/** No active and healthy instance offers the requested tool. */
export class ToolUnavailableError extends GatewayError {
  constructor(readonly tool: string, options: GatewayErrorOptions = {}) {
    super("TOOL_UNAVAILABLE", `no healthy worker offers tool '${tool}'`, {
      ...options,
      meta: { tool, ...options.meta },
    });
  }
}

/** The selected instance's breaker refused the attempt. */
export class CircuitOpenError extends GatewayError {
  constructor(
    readonly workerId: string,
    readonly retryAt: number | null,
    options: GatewayErrorOptions = {},
  ) {
    super("CIRCUIT_OPEN", `circuit breaker open for worker '${workerId}'`, {
      ...options,
      meta: { worker_id: workerId, retry_at: retryAt, ...options.meta },
    });
  }
}

export class InvocationTimeoutError extends GatewayError {
  constructor(
    readonly workerId: string,
    readonly timeoutMs: number,
    options: GatewayErrorOptions = {},
  ) {
    super("INVOCATION_TIMEOUT", `worker '${workerId}' did not answer within ${timeoutMs}ms`, {
      ...options,
      meta: { worker_id: workerId, timeout_ms: timeoutMs, ...options.meta },
    });
  }
}

/** The worker answered with an error or could not be reached. */
export class InvocationFailedError extends GatewayError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super("INVOCATION_FAILED", message, options);
  }
}

/** The running-execution bound is reached; the gateway fails fast. */
export class BackpressureError extends GatewayError {
  constructor(readonly limit: number, options: GatewayErrorOptions = {}) {
    super("BACKPRESSURE", `concurrency limit of ${limit} running executions reached`, {
      ...options,
      meta: { limit, ...options.meta },
    });
  }
}

export class InvocationCancelledError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("CANCELLED", message, options);
  }
}

export class InternalError extends GatewayError {
  constructor(message?: string, options: GatewayErrorOptions = {}) {
    super("INTERNAL", message, options);
  }
}

/** Wraps unknown throwables so callers always deal with a {@link GatewayError}. */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
}

/** Shape of the `error` member of a JSON-RPC response. */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** Formats a {@link GatewayError} into a JSON-RPC error response. */
export function toJsonRpc(id: string | number | null, error: GatewayError): JsonRpcErrorResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: { code: error.code, message: error.message, data: error.data },
  };
}
