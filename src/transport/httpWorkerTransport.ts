import { z } from "zod";

import { InvocationFailedError } from "../rpc/errors.js";
import type { WorkerInvocation, WorkerProbe, WorkerTransport } from "./workerTransport.js";

const JsonRpcReplySchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const ErrorFlaggedResultSchema = z.object({ isError: z.literal(true) }).passthrough();

export interface HttpWorkerTransportOptions {
  /** Fetch implementation, injectable for tests. */
  fetchImpl?: typeof fetch;
}

/**
 * Default worker adapter: invocations are JSON-RPC `tools/call` POSTs to the
 * worker address, probes are plain GETs on the health URL.
 */
export class HttpWorkerTransport implements WorkerTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpWorkerTransportOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async invoke(request: WorkerInvocation): Promise<unknown> {
    const workerId = request.worker.id;
    let response: Response;
    try {
      response = await this.fetchImpl(request.worker.address, {
        method: "POST",
        headers: { "content-type": "application/json", accept: "application/json" },
        body: JSON.stringify({
          jsonrpc: "2.0",
          id: request.correlationId,
          method: "tools/call",
          params: { name: request.tool, arguments: request.arguments ?? {} },
        }),
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal.aborted) {
        throw error;
      }
      throw new InvocationFailedError(`worker '${workerId}' is unreachable`, {
        cause: error,
        meta: { worker_id: workerId },
      });
    }

    if (!response.ok) {
      throw new InvocationFailedError(`worker '${workerId}' answered with HTTP ${response.status}`, {
        meta: { worker_id: workerId, status: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (request.signal.aborted) {
        throw error;
      }
      throw new InvocationFailedError(`worker '${workerId}' returned a body that is not JSON`, {
        cause: error,
        meta: { worker_id: workerId },
      });
    }

    const reply = JsonRpcReplySchema.safeParse(body);
    if (!reply.success) {
      throw new InvocationFailedError(`worker '${workerId}' returned a malformed JSON-RPC reply`, {
        meta: { worker_id: workerId },
      });
    }
    if (reply.data.error) {
      throw new InvocationFailedError(reply.data.error.message, {
        meta: { worker_id: workerId, remote_code: reply.data.error.code },
      });
    }
    if (ErrorFlaggedResultSchema.safeParse(reply.data.result).success) {
      throw new InvocationFailedError(`tool '${request.tool}' reported an error on worker '${workerId}'`, {
        meta: { worker_id: workerId, result: reply.data.result },
      });
    }
    return reply.data.result ?? null;
  }

  async probe(request: WorkerProbe): Promise<boolean> {
    const response = await this.fetchImpl(request.worker.healthCheckUrl, {
      method: "GET",
      signal: request.signal,
    });
    await response.body?.cancel();
    return response.ok;
  }
}
