import type { CatalogStore } from "../catalog/store.js";
import type { WorkerInstance } from "../catalog/types.js";
import { StructuredLogger } from "../logger.js";
import { runtimeTimers, type IntervalHandle } from "../runtime/timers.js";
import type { WorkerTransport } from "../transport/workerTransport.js";

export interface HealthMonitorOptions {
  catalog: CatalogStore;
  transport: WorkerTransport;
  logger?: StructuredLogger;
  /** Interval between two probe cycles. */
  probeIntervalMs?: number;
  /** Deadline applied to every individual probe. */
  probeTimeoutMs?: number;
  /** Consecutive probe failures after which an instance becomes unhealthy. */
  failureThreshold?: number;
  /** Interval between two TTL cleanup cycles. */
  cleanupIntervalMs?: number;
  /** How long inactive instances stay in the catalog before being purged. */
  retentionMs?: number;
  now?: () => number;
}

export const DEFAULT_PROBE_INTERVAL_MS = 30_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;
export const DEFAULT_RETENTION_MS = 300_000;

export interface ProbeOutcome {
  workerId: string;
  healthy: boolean;
  consecutiveFailures: number;
  deactivated: boolean;
  error?: string;
}

export interface ProbeCycleReport {
  startedAt: number;
  probed: ProbeOutcome[];
  /** Instances skipped because their own probe interval has not elapsed. */
  skipped: string[];
}

export interface CleanupCycleReport {
  expired: string[];
  purged: string[];
}

class ProbeTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`probe timed out after ${timeoutMs}ms`);
    this.name = "ProbeTimeoutError";
  }
}

/**
 * Background liveness checker. Two independent cycles run on runtime-aware
 * timers: the probe cycle checks every active instance through the worker
 * transport, the cleanup cycle expires instances whose TTL elapsed and purges
 * the ones that stayed inactive past the retention window.
 *
 * A cycle never overlaps with itself: a tick that fires while the previous run
 * is still pending is skipped.
 */
export class HealthMonitor {
  private readonly catalog: CatalogStore;
  private readonly transport: WorkerTransport;
  private readonly logger?: StructuredLogger;
  private readonly now: () => number;
  readonly probeIntervalMs: number;
  readonly probeTimeoutMs: number;
  readonly failureThreshold: number;
  readonly cleanupIntervalMs: number;
  readonly retentionMs: number;

  private probeTimer: IntervalHandle | null = null;
  private cleanupTimer: IntervalHandle | null = null;
  private probeInFlight: Promise<ProbeCycleReport> | null = null;
  private cleanupInFlight: Promise<CleanupCycleReport> | null = null;
  private cancellation = new AbortController();

  constructor(options: HealthMonitorOptions) {
    this.catalog = options.catalog;
    this.transport = options.transport;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
    this.probeIntervalMs = options.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD);
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
  }

  get running(): boolean {
    return this.probeTimer !== null;
  }

  /** Schedules both cycles. Calling `start()` twice is a no-op. */
  start(): void {
    if (this.probeTimer) {
      return;
    }
    if (this.cancellation.signal.aborted) {
      this.cancellation = new AbortController();
    }
    this.probeTimer = runtimeTimers.setInterval(() => {
      if (this.probeInFlight) {
        this.logger?.debug("health_probe_cycle_skipped", { reason: "previous_cycle_pending" });
        return;
      }
      this.runProbeCycle().catch((error: unknown) => {
        this.logger?.error("health_probe_cycle_failed", { error });
      });
    }, this.probeIntervalMs);
    this.probeTimer.unref?.();

    this.cleanupTimer = runtimeTimers.setInterval(() => {
      if (this.cleanupInFlight) {
        return;
      }
      this.runCleanupCycle().catch((error: unknown) => {
        this.logger?.error("health_cleanup_cycle_failed", { error });
      });
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref?.();

    this.logger?.info("health_monitor_started", {
      probe_interval_ms: this.probeIntervalMs,
      probe_timeout_ms: this.probeTimeoutMs,
      failure_threshold: this.failureThreshold,
      cleanup_interval_ms: this.cleanupIntervalMs,
      retention_ms: this.retentionMs,
    });
  }

  /** Cancels both timers and aborts the probes still in flight. */
  stop(): void {
    if (this.probeTimer) {
      runtimeTimers.clearInterval(this.probeTimer);
      this.probeTimer = null;
    }
    if (this.cleanupTimer) {
      runtimeTimers.clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.cancellation.abort();
    this.logger?.info("health_monitor_stopped");
  }

  /**
   * Probes every active instance concurrently. When a cycle is already
   * running the pending run is returned instead of starting a second one.
   */
  runProbeCycle(): Promise<ProbeCycleReport> {
    if (this.probeInFlight) {
      return this.probeInFlight;
    }
    const cycle = this.executeProbeCycle().finally(() => {
      this.probeInFlight = null;
    });
    this.probeInFlight = cycle;
    return cycle;
  }

  runCleanupCycle(): Promise<CleanupCycleReport> {
    if (this.cleanupInFlight) {
      return this.cleanupInFlight;
    }
    // The cleanup itself is synchronous; the promise keeps the same contract as the probe cycle.
    const cycle = Promise.resolve()
      .then(() => this.executeCleanupCycle())
      .finally(() => {
        this.cleanupInFlight = null;
      });
    this.cleanupInFlight = cycle;
    return cycle;
  }

  private async executeProbeCycle(): Promise<ProbeCycleReport> {
    const startedAt = this.now();
    const due: WorkerInstance[] = [];
    const skipped: string[] = [];
    for (const instance of this.catalog.listAll()) {
      if (!instance.active) {
        continue;
      }
      if (
        instance.healthCheckIntervalMs !== null &&
        instance.lastProbeAt !== null &&
        startedAt - instance.lastProbeAt < instance.healthCheckIntervalMs
      ) {
        skipped.push(instance.id);
        continue;
      }
      due.push(instance);
    }

    const probed = await Promise.all(due.map((instance) => this.probeInstance(instance)));
    return { startedAt, probed, skipped };
  }

  private async probeInstance(instance: WorkerInstance): Promise<ProbeOutcome> {
    let healthy = false;
    let failure: string | undefined;
    try {
      healthy = await this.probeWithTimeout(instance);
      if (!healthy) {
        failure = "unhealthy_response";
      }
    } catch (error) {
      failure = error instanceof Error ? error.message : String(error);
    }

    if (this.cancellation.signal.aborted) {
      return { workerId: instance.id, healthy, consecutiveFailures: instance.consecutiveFailures, deactivated: false };
    }

    if (healthy) {
      this.catalog.recordProbeSuccess(instance.id);
      return { workerId: instance.id, healthy: true, consecutiveFailures: 0, deactivated: false };
    }

    const result = this.catalog.recordProbeFailure(instance.id, this.failureThreshold);
    this.logger?.warn("health_probe_failed", {
      worker_id: instance.id,
      url: instance.healthCheckUrl,
      consecutive_failures: result.consecutiveFailures,
      threshold: this.failureThreshold,
      reason: failure,
    });
    if (result.deactivated) {
      this.logger?.warn("worker_unhealthy", {
        worker_id: instance.id,
        consecutive_failures: result.consecutiveFailures,
      });
    }
    return {
      workerId: instance.id,
      healthy: false,
      consecutiveFailures: result.consecutiveFailures,
      deactivated: result.deactivated,
      ...(failure !== undefined ? { error: failure } : {}),
    };
  }

  private async probeWithTimeout(instance: WorkerInstance): Promise<boolean> {
    const abort = new AbortController();
    const onCancel = (): void => abort.abort();
    this.cancellation.signal.addEventListener("abort", onCancel, { once: true });

    let expire: () => void = () => {};
    const timeoutPromise = new Promise<never>((_, reject) => {
      expire = () => reject(new ProbeTimeoutError(this.probeTimeoutMs));
    });
    const timeoutHandle = runtimeTimers.setTimeout(() => {
      expire();
      abort.abort();
    }, this.probeTimeoutMs);

    try {
      const probePromise = this.transport.probe({ worker: instance, signal: abort.signal });
      void probePromise.catch(() => undefined);
      return await Promise.race([probePromise, timeoutPromise]);
    } finally {
      runtimeTimers.clearTimeout(timeoutHandle);
      this.cancellation.signal.removeEventListener("abort", onCancel);
      abort.abort();
    }
  }

  private executeCleanupCycle(): CleanupCycleReport {
    const expired = this.catalog.markExpired();
    for (const workerId of expired) {
      this.logger?.info("worker_ttl_expired", { worker_id: workerId });
    }
    const purged = this.catalog.purgeInactive(this.retentionMs);
    for (const workerId of purged) {
      this.logger?.info("worker_purged", { worker_id: workerId });
    }
    return { expired, purged };
  }
}
