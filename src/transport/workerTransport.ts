import type { WorkerInstance } from "../catalog/types.js";

/** Request dispatched to a worker instance for one attempt. */
export interface WorkerInvocation {
  worker: Pick<WorkerInstance, "id" | "address">;
  tool: string;
  arguments: unknown;
  /** Aborted by the router on timeout or caller cancellation. */
  signal: AbortSignal;
  correlationId: string;
}

export interface WorkerProbe {
  worker: Pick<WorkerInstance, "id" | "address" | "healthCheckUrl">;
  signal: AbortSignal;
}

/**
 * Wire adapter between the gateway and its workers. Implementations reject
 * with an `InvocationFailedError` when the worker answers with an error, and
 * must honour the abort signal.
 */
export interface WorkerTransport {
  invoke(request: WorkerInvocation): Promise<unknown>;
  /** Resolves `true` when the instance reports itself healthy. */
  probe(request: WorkerProbe): Promise<boolean>;
}
