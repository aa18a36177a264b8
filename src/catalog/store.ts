import { StructuredLogger } from "../logger.js";
import { parseRegistration } from "./schemas.js";
import {
  compareIds,
  createEmptyStats,
  type CatalogChange,
  type CatalogChangeListener,
  type CatalogToolEntry,
  type DeactivationReason,
  type ToolDescriptor,
  type ToolStats,
  type WorkerInstance,
} from "./types.js";

export interface CatalogStoreOptions {
  /** Clock override used by tests. */
  now?: () => number;
  logger?: StructuredLogger;
}

export interface DiscoverOptions {
  /** Instance identifiers to skip (retry exclusion set). */
  exclude?: ReadonlySet<string>;
}

/** Outcome of a probe failure as applied to the catalog. */
export interface ProbeFailureResult {
  consecutiveFailures: number;
  /** `true` when this failure crossed the threshold and deactivated the instance. */
  deactivated: boolean;
}

export interface InvocationOutcome {
  success: boolean;
  durationMs: number;
  at?: number;
}

function snapshotInstance(instance: WorkerInstance): WorkerInstance {
  return structuredClone(instance);
}

/**
 * In-memory catalog of worker instances and the tools they declare. Every
 * mutator is synchronous so that it runs atomically on the event loop; readers
 * only ever receive deep copies.
 */
export class CatalogStore {
  private readonly instances = new Map<string, WorkerInstance>();
  private readonly listeners = new Set<CatalogChangeListener>();
  private readonly now: () => number;
  private readonly logger?: StructuredLogger;

  constructor(options: CatalogStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  /**
   * Validates and upserts a registration. Re-registering an existing id
   * reactivates it, replaces its address, weight and tool set, and keeps the
   * statistics of the tool ids that are declared again.
   *
   * @throws ValidationError when the payload is malformed.
   */
  register(payload: unknown): WorkerInstance {
    const registration = parseRegistration(payload);
    const now = this.now();
    const previous = this.instances.get(registration.id);
    const previousStats = new Map<string, ToolStats>();
    for (const tool of previous?.tools ?? []) {
      previousStats.set(tool.id, tool.stats);
    }

    const instance: WorkerInstance = {
      id: registration.id,
      name: registration.name,
      address: registration.address,
      weight: registration.weight,
      currentLoad: previous?.currentLoad ?? 0,
      health: "healthy",
      consecutiveFailures: 0,
      lastSeenAt: now,
      ttlMs: registration.ttlMs,
      active: true,
      healthCheckUrl: registration.healthCheckUrl,
      healthCheckIntervalMs: registration.healthCheckIntervalMs,
      registeredAt: previous?.registeredAt ?? now,
      deactivatedAt: null,
      deactivationReason: null,
      lastProbeAt: previous?.lastProbeAt ?? null,
      tools: registration.tools.map((tool) => ({
        ...tool,
        stats: previousStats.get(tool.id) ?? createEmptyStats(),
      })),
    };
    this.instances.set(instance.id, instance);
    this.logger?.info("worker_registered", {
      worker_id: instance.id,
      address: instance.address,
      tools: instance.tools.map((tool) => tool.id),
      reregistered: previous !== undefined,
    });
    this.emit({ kind: "registered", workerId: instance.id });
    return snapshotInstance(instance);
  }

  /** Soft-removes an instance. Returns `false` when nothing changed. */
  deregister(instanceId: string): boolean {
    const changed = this.deactivate(instanceId, "deregistered");
    if (changed) {
      this.logger?.info("worker_deregistered", { worker_id: instanceId });
    }
    return changed;
  }

  /** Active, healthy instances offering `toolId`, ordered by instance id. */
  discover(toolId: string, options: DiscoverOptions = {}): WorkerInstance[] {
    const matches: WorkerInstance[] = [];
    for (const instance of this.instances.values()) {
      if (!instance.active || instance.health !== "healthy") {
        continue;
      }
      if (options.exclude?.has(instance.id)) {
        continue;
      }
      if (instance.tools.some((tool) => tool.id === toolId)) {
        matches.push(snapshotInstance(instance));
      }
    }
    return matches.sort((left, right) => compareIds(left.id, right.id));
  }

  listAll(): WorkerInstance[] {
    return [...this.instances.values()]
      .map((instance) => snapshotInstance(instance))
      .sort((left, right) => compareIds(left.id, right.id));
  }

  get(instanceId: string): WorkerInstance | undefined {
    const instance = this.instances.get(instanceId);
    return instance ? snapshotInstance(instance) : undefined;
  }

  /** Refreshes the TTL of an active instance. */
  heartbeat(instanceId: string): boolean {
    const instance = this.instances.get(instanceId);
    if (!instance || !instance.active) {
      return false;
    }
    instance.lastSeenAt = this.now();
    return true;
  }

  /**
   * Discoverable tools aggregated by id. The first declaring instance (by id)
   * supplies the description and schemas; statistics are summed.
   */
  listTools(): CatalogToolEntry[] {
    const entries = new Map<string, CatalogToolEntry>();
    const ordered = [...this.instances.values()].sort((left, right) => compareIds(left.id, right.id));
    for (const instance of ordered) {
      if (!instance.active || instance.health !== "healthy") {
        continue;
      }
      for (const tool of instance.tools) {
        const existing = entries.get(tool.id);
        if (!existing) {
          entries.set(tool.id, {
            id: tool.id,
            name: tool.name,
            description: tool.description,
            inputSchema: structuredClone(tool.inputSchema),
            outputSchema: tool.outputSchema ? structuredClone(tool.outputSchema) : null,
            workerIds: [instance.id],
            stats: { ...tool.stats },
          });
          continue;
        }
        existing.workerIds.push(instance.id);
        existing.stats = mergeStats(existing.stats, tool.stats);
      }
    }
    return [...entries.values()].sort((left, right) => compareIds(left.id, right.id));
  }

  getTool(workerId: string, toolId: string): ToolDescriptor | undefined {
    const tool = this.instances.get(workerId)?.tools.find((candidate) => candidate.id === toolId);
    return tool ? structuredClone(tool) : undefined;
  }

  /** Clears statistics of every tool, or only of the tool with the given id. */
  resetStats(toolId?: string): number {
    let reset = 0;
    for (const instance of this.instances.values()) {
      for (const tool of instance.tools) {
        if (toolId === undefined || tool.id === toolId) {
          tool.stats = createEmptyStats();
          reset += 1;
        }
      }
    }
    return reset;
  }

  recordProbeSuccess(instanceId: string): boolean {
    const instance = this.instances.get(instanceId);
    if (!instance || !instance.active) {
      return false;
    }
    const now = this.now();
    const recovered = instance.health !== "healthy";
    instance.health = "healthy";
    instance.consecutiveFailures = 0;
    instance.lastSeenAt = now;
    instance.lastProbeAt = now;
    if (recovered) {
      this.emit({ kind: "health", workerId: instanceId, health: "healthy" });
    }
    return true;
  }

  /**
   * Counts a failed probe. Reaching `threshold` consecutive failures marks the
   * instance unhealthy and removes it from discovery.
   */
  recordProbeFailure(instanceId: string, threshold: number): ProbeFailureResult {
    const instance = this.instances.get(instanceId);
    if (!instance || !instance.active) {
      return { consecutiveFailures: instance?.consecutiveFailures ?? 0, deactivated: false };
    }
    instance.consecutiveFailures += 1;
    instance.lastProbeAt = this.now();
    if (instance.consecutiveFailures < threshold) {
      return { consecutiveFailures: instance.consecutiveFailures, deactivated: false };
    }
    instance.health = "unhealthy";
    this.emit({ kind: "health", workerId: instanceId, health: "unhealthy" });
    this.deactivate(instanceId, "unhealthy");
    return { consecutiveFailures: instance.consecutiveFailures, deactivated: true };
  }

  /** Deactivates every active instance whose TTL elapsed. Returns their ids. */
  markExpired(): string[] {
    const now = this.now();
    const expired: string[] = [];
    for (const instance of this.instances.values()) {
      if (instance.active && instance.lastSeenAt + instance.ttlMs <= now) {
        expired.push(instance.id);
      }
    }
    for (const id of expired) {
      this.deactivate(id, "ttl_expired");
    }
    return expired;
  }

  /** Removes instances that have been inactive for at least `retentionMs`. */
  purgeInactive(retentionMs: number): string[] {
    const now = this.now();
    const purged: string[] = [];
    for (const instance of this.instances.values()) {
      if (!instance.active && instance.deactivatedAt !== null && now - instance.deactivatedAt >= retentionMs) {
        purged.push(instance.id);
      }
    }
    for (const id of purged) {
      this.instances.delete(id);
      this.emit({ kind: "purged", workerId: id });
    }
    return purged;
  }

  /** Applies a load delta, clamping at zero. Returns the new load. */
  adjustLoad(instanceId: string, delta: number): number {
    const instance = this.instances.get(instanceId);
    if (!instance) {
      return 0;
    }
    instance.currentLoad = Math.max(0, instance.currentLoad + delta);
    return instance.currentLoad;
  }

  /**
   * Folds a finalized invocation into the tool statistics. A success also
   * resets the instance failure counter.
   */
  recordInvocationOutcome(workerId: string, toolId: string, outcome: InvocationOutcome): void {
    const instance = this.instances.get(workerId);
    if (!instance) {
      return;
    }
    if (outcome.success) {
      instance.consecutiveFailures = 0;
    }
    const tool = instance.tools.find((candidate) => candidate.id === toolId);
    if (!tool) {
      return;
    }
    const stats = tool.stats;
    const total = stats.totalInvocations + 1;
    tool.stats = {
      totalInvocations: total,
      successfulInvocations: stats.successfulInvocations + (outcome.success ? 1 : 0),
      failedInvocations: stats.failedInvocations + (outcome.success ? 0 : 1),
      averageLatencyMs: stats.averageLatencyMs + (outcome.durationMs - stats.averageLatencyMs) / total,
      lastInvokedAt: outcome.at ?? this.now(),
    };
  }

  /** Subscribes to catalog mutations. Returns the unsubscribe function. */
  onChange(listener: CatalogChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private deactivate(instanceId: string, reason: DeactivationReason): boolean {
    const instance = this.instances.get(instanceId);
    if (!instance || !instance.active) {
      return false;
    }
    instance.active = false;
    instance.deactivatedAt = this.now();
    instance.deactivationReason = reason;
    this.emit({ kind: "deactivated", workerId: instanceId, reason });
    return true;
  }

  private emit(change: CatalogChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger?.warn("catalog_listener_failed", { kind: change.kind, worker_id: change.workerId, error });
      }
    }
  }
}

function mergeStats(left: ToolStats, right: ToolStats): ToolStats {
  const total = left.totalInvocations + right.totalInvocations;
  const weightedLatency = left.averageLatencyMs * left.totalInvocations + right.averageLatencyMs * right.totalInvocations;
  const lastInvokedAt =
    left.lastInvokedAt === null
      ? right.lastInvokedAt
      : right.lastInvokedAt === null
        ? left.lastInvokedAt
        : Math.max(left.lastInvokedAt, right.lastInvokedAt);
  return {
    totalInvocations: total,
    successfulInvocations: left.successfulInvocations + right.successfulInvocations,
    failedInvocations: left.failedInvocations + right.failedInvocations,
    averageLatencyMs: total === 0 ? 0 : weightedLatency / total,
    lastInvokedAt,
  };
}
