import { randomUUID } from "node:crypto";

import type { CatalogStore } from "../catalog/store.js";
import type { ToolDescriptor, WorkerInstance } from "../catalog/types.js";
import { CircuitBreakerRegistry, type CircuitBreakerAttempt } from "../infra/circuitBreaker.js";
import type { ExecutionLedger, ExecutionRecord } from "../ledger/executionLedger.js";
import { StructuredLogger } from "../logger.js";
import {
  BackpressureError,
  CircuitOpenError,
  GatewayError,
  InvocationCancelledError,
  InvocationFailedError,
  InvocationTimeoutError,
  ToolUnavailableError,
  ValidationError,
} from "../rpc/errors.js";
import { runtimeTimers } from "../runtime/timers.js";
import type { WorkerTransport } from "../transport/workerTransport.js";
import { resolveLoadPolicy, type LoadPolicy, type LoadPolicyName } from "./loadPolicy.js";

export const DEFAULT_MAX_CONCURRENT_EXECUTIONS = 10;

export interface ExecutionRouterOptions {
  catalog: CatalogStore;
  ledger: ExecutionLedger;
  transport: WorkerTransport;
  breakers: CircuitBreakerRegistry;
  /** Policy name or custom policy choosing one instance among the candidates. */
  policy?: LoadPolicyName | LoadPolicy;
  /** Upper bound on executions running at the same time (fail fast beyond). */
  maxConcurrent?: number;
  logger?: StructuredLogger;
  correlationIdFactory?: () => string;
}

export interface ExecuteOptions {
  /** Caller cancellation; aborts the in-flight attempt. */
  signal?: AbortSignal;
  correlationId?: string;
}

export interface ExecutionResult {
  output: unknown;
  workerId: string;
  executionId: string;
  correlationId: string;
  /** Number of attempts dispatched, the successful one included. */
  attempts: number;
}

interface AttemptContext {
  instance: WorkerInstance;
  descriptor: ToolDescriptor;
  args: unknown;
  correlationId: string;
  signal?: AbortSignal;
}

/**
 * Routes tool invocations to healthy worker instances. Each attempt goes
 * through the load policy and the instance breaker, runs under the tool
 * timeout and is journaled in the ledger. Failed attempts are retried on the
 * remaining candidates, excluding the instances that already failed.
 */
export class ExecutionRouter {
  private readonly catalog: CatalogStore;
  private readonly ledger: ExecutionLedger;
  private readonly transport: WorkerTransport;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly policy: LoadPolicy;
  private readonly logger?: StructuredLogger;
  private readonly correlationIdFactory: () => string;
  readonly maxConcurrent: number;
  private running = 0;

  constructor(options: ExecutionRouterOptions) {
    this.catalog = options.catalog;
    this.ledger = options.ledger;
    this.transport = options.transport;
    this.breakers = options.breakers;
    this.policy =
      typeof options.policy === "function" ? options.policy : resolveLoadPolicy(options.policy ?? "weighted-priority");
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT_EXECUTIONS);
    this.logger = options.logger;
    this.correlationIdFactory = options.correlationIdFactory ?? (() => randomUUID());
  }

  /** Executions currently holding a concurrency slot. */
  get runningExecutions(): number {
    return this.running;
  }

  async execute(tool: string, args: unknown, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (this.running >= this.maxConcurrent) {
      this.logger?.warn("execution_rejected_backpressure", { tool, running: this.running, limit: this.maxConcurrent });
      throw new BackpressureError(this.maxConcurrent);
    }
    this.running += 1;
    try {
      return await this.executeWithRetries(tool, args, options);
    } finally {
      this.running -= 1;
    }
  }

  private async executeWithRetries(tool: string, args: unknown, options: ExecuteOptions): Promise<ExecutionResult> {
    const correlationId = options.correlationId ?? this.correlationIdFactory();
    const exclude = new Set<string>();
    let maxAttempts = 1;
    let attempt = 0;
    let lastError: GatewayError | null = null;

    for (;;) {
      if (options.signal?.aborted) {
        throw new InvocationCancelledError("invocation cancelled by the caller", { meta: { tool } });
      }

      const candidates = this.catalog.discover(tool, { exclude });
      const instance = this.policy(candidates);
      const descriptor = instance?.tools.find((candidate) => candidate.id === tool);
      if (!instance || !descriptor) {
        if (lastError) {
          throw lastError;
        }
        throw new ToolUnavailableError(tool);
      }
      if (attempt === 0) {
        maxAttempts = 1 + descriptor.retryAttempts;
      }

      const ticket = this.breakers.tryAcquire(instance.id);
      if (!ticket.allowed) {
        this.logger?.warn("circuit_open_rejected", { tool, worker_id: instance.id, retry_at: ticket.retryAt });
        throw new CircuitOpenError(instance.id, ticket.retryAt, { meta: { tool } });
      }

      attempt += 1;
      try {
        const result = await this.runAttempt(
          { instance, descriptor, args, correlationId, signal: options.signal },
          attempt,
          ticket,
        );
        return { ...result, correlationId, attempts: attempt };
      } catch (error) {
        if (!(error instanceof GatewayError) || !error.retryable) {
          throw error;
        }
        lastError = error;
        if (attempt >= maxAttempts) {
          throw error;
        }
        exclude.add(instance.id);
        this.logger?.info("execution_retry_scheduled", {
          tool,
          correlation_id: correlationId,
          failed_worker_id: instance.id,
          attempt,
          max_attempts: maxAttempts,
        });
      }
    }
  }

  private async runAttempt(
    context: AttemptContext,
    attempt: number,
    ticket: CircuitBreakerAttempt,
  ): Promise<{ output: unknown; workerId: string; executionId: string }> {
    const { instance, descriptor } = context;
    let record: ExecutionRecord;
    try {
      record = this.ledger.record({
        correlationId: context.correlationId,
        attempt,
        tool: descriptor.id,
        workerId: instance.id,
        input: context.args,
      });
    } catch (error) {
      ticket.release();
      throw new ValidationError("tool arguments cannot be journaled", {
        cause: error,
        hint: error instanceof Error ? error.message : String(error),
        meta: { tool: descriptor.id },
      });
    }
    this.catalog.adjustLoad(instance.id, 1);

    try {
      const output = await this.dispatch(context);
      this.catalog.adjustLoad(instance.id, -1);
      this.ledger.finalize(record.id, { status: "succeeded", output });
      ticket.succeed();
      return { output, workerId: instance.id, executionId: record.id };
    } catch (error) {
      this.catalog.adjustLoad(instance.id, -1);
      if (error instanceof InvocationCancelledError) {
        this.ledger.finalize(record.id, {
          status: "cancelled",
          error: { code: error.code, message: error.message },
        });
        ticket.release();
        this.logger?.info("execution_cancelled", { tool: descriptor.id, worker_id: instance.id, attempt });
        throw error;
      }

      const failure =
        error instanceof GatewayError
          ? error
          : new InvocationFailedError(error instanceof Error ? error.message : String(error), {
              cause: error,
              meta: { worker_id: instance.id },
            });
      this.ledger.finalize(record.id, {
        status: failure instanceof InvocationTimeoutError ? "timed_out" : "failed",
        error: { code: failure.code, message: failure.message },
      });
      ticket.fail();
      this.logger?.warn("execution_attempt_failed", {
        tool: descriptor.id,
        worker_id: instance.id,
        execution_id: record.id,
        attempt,
        category: failure.category,
        message: failure.message,
      });
      throw failure;
    }
  }

  /**
   * Sends one attempt to the worker. The first of response, timeout and
   * cancellation wins; anything arriving afterwards is discarded.
   */
  private dispatch(context: AttemptContext): Promise<unknown> {
    const { instance, descriptor, signal } = context;
    const abort = new AbortController();

    return new Promise<unknown>((resolve, reject) => {
      let settled = false;
      const onCancel = (): void => {
        const error = new InvocationCancelledError("invocation cancelled by the caller", {
          meta: { tool: descriptor.id, worker_id: instance.id },
        });
        settle(() => reject(error));
      };
      const timer = runtimeTimers.setTimeout(() => {
        const error = new InvocationTimeoutError(instance.id, descriptor.timeoutMs, { meta: { tool: descriptor.id } });
        settle(() => reject(error));
      }, descriptor.timeoutMs);
      const settle = (complete: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        runtimeTimers.clearTimeout(timer);
        signal?.removeEventListener("abort", onCancel);
        complete();
        abort.abort();
      };

      if (signal?.aborted) {
        onCancel();
        return;
      }
      signal?.addEventListener("abort", onCancel, { once: true });

      this.transport
        .invoke({
          worker: instance,
          tool: descriptor.id,
          arguments: context.args,
          signal: abort.signal,
          correlationId: context.correlationId,
        })
        .then(
          (output) => {
            if (settled) {
              this.logger?.debug("late_response_discarded", { tool: descriptor.id, worker_id: instance.id });
              return;
            }
            settle(() => resolve(output));
          },
          (error: unknown) => {
            if (settled) {
              return;
            }
            settle(() => reject(error));
          },
        );
    });
  }
}
