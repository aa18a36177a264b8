/** Health verdict maintained by the monitor. */
export type WorkerHealth = "healthy" | "unhealthy";

/** Why an instance left the discoverable pool. */
export type DeactivationReason = "deregistered" | "unhealthy" | "ttl_expired";

/** Structural JSON-schema-like object declared by workers for their tools. */
export type ToolSchema = Record<string, unknown>;

/** Invocation counters fed back by the execution ledger. */
export interface ToolStats {
  totalInvocations: number;
  successfulInvocations: number;
  failedInvocations: number;
  averageLatencyMs: number;
  lastInvokedAt: number | null;
}

export interface ToolDescriptor {
  /** Unique within the owning worker; the catalog key is `(workerId, id)`. */
  id: string;
  name: string;
  description: string;
  inputSchema: ToolSchema;
  outputSchema: ToolSchema | null;
  timeoutMs: number;
  retryAttempts: number;
  stats: ToolStats;
}

export interface WorkerInstance {
  id: string;
  name: string;
  address: string;
  weight: number;
  currentLoad: number;
  health: WorkerHealth;
  consecutiveFailures: number;
  lastSeenAt: number;
  ttlMs: number;
  active: boolean;
  healthCheckUrl: string;
  /** Minimum spacing between two probes of this instance, when declared. */
  healthCheckIntervalMs: number | null;
  registeredAt: number;
  deactivatedAt: number | null;
  deactivationReason: DeactivationReason | null;
  lastProbeAt: number | null;
  tools: ToolDescriptor[];
}

/** Normalised registration, produced by the schema parser in milliseconds. */
export interface WorkerRegistration {
  id: string;
  name: string;
  address: string;
  weight: number;
  healthCheckUrl: string;
  healthCheckIntervalMs: number | null;
  ttlMs: number;
  tools: Array<Omit<ToolDescriptor, "stats">>;
}

/** Tool aggregated across every instance currently offering it. */
export interface CatalogToolEntry {
  id: string;
  name: string;
  description: string;
  inputSchema: ToolSchema;
  outputSchema: ToolSchema | null;
  workerIds: string[];
  stats: ToolStats;
}

export type CatalogChange =
  | { kind: "registered"; workerId: string }
  | { kind: "deactivated"; workerId: string; reason: DeactivationReason }
  | { kind: "health"; workerId: string; health: WorkerHealth }
  | { kind: "purged"; workerId: string };

export type CatalogChangeListener = (change: CatalogChange) => void;

export function createEmptyStats(): ToolStats {
  return {
    totalInvocations: 0,
    successfulInvocations: 0,
    failedInvocations: 0,
    averageLatencyMs: 0,
    lastInvokedAt: null,
  };
}

/** Code-unit ordering of identifiers, independent of the host locale. */
export function compareIds(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
