import { randomUUID } from "node:crypto";

import { StructuredLogger } from "../logger.js";

export const EXECUTION_STATUSES = ["running", "succeeded", "failed", "timed_out", "cancelled"] as const;
export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];
export type TerminalStatus = Exclude<ExecutionStatus, "running">;

/** Error summary attached to failed, timed out and cancelled records. */
export interface ExecutionErrorSummary {
  code: number;
  message: string;
}

export interface ExecutionRecord {
  id: string;
  /** Shared by every attempt of a single `tools/call`. */
  correlationId: string;
  /** 1-based attempt number within the correlation. */
  attempt: number;
  tool: string;
  workerId: string;
  input: unknown;
  output: unknown;
  error: ExecutionErrorSummary | null;
  status: ExecutionStatus;
  startedAt: number;
  endedAt: number | null;
  durationMs: number | null;
}

export interface ExecutionRecordInput {
  correlationId: string;
  attempt: number;
  tool: string;
  workerId: string;
  input: unknown;
}

export type ExecutionOutcome =
  | { status: "succeeded"; output: unknown }
  | { status: Exclude<TerminalStatus, "succeeded">; error: ExecutionErrorSummary };

export interface LedgerQuery {
  tool?: string;
  workerId?: string;
  status?: ExecutionStatus;
  /** Inclusive lower bound on `startedAt`. */
  from?: number;
  /** Inclusive upper bound on `startedAt`. */
  to?: number;
  limit?: number;
}

export type LedgerSummary = Record<ExecutionStatus, number> & { total: number };

/** Write-behind persistence target receiving every record transition. */
export interface LedgerSink {
  append(record: ExecutionRecord): Promise<void>;
}

export type LedgerFinalizeListener = (record: ExecutionRecord) => void;

export interface ExecutionLedgerOptions {
  now?: () => number;
  idFactory?: () => string;
  /** Maximum number of records retained in memory. */
  maxRecords?: number;
  sink?: LedgerSink | null;
  logger?: StructuredLogger;
}

export const DEFAULT_LEDGER_CAPACITY = 10_000;

function freezeRecord(record: ExecutionRecord): ExecutionRecord {
  return Object.freeze(structuredClone(record));
}

/**
 * Append-only journal of execution attempts. Records move from `running` to
 * exactly one terminal status; terminal records are frozen. The in-memory
 * history is bounded and evicts the oldest terminal records first.
 */
export class ExecutionLedger {
  private readonly records = new Map<string, ExecutionRecord>();
  private readonly listeners = new Set<LedgerFinalizeListener>();
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private readonly maxRecords: number;
  private readonly sink: LedgerSink | null;
  private readonly logger?: StructuredLogger;
  private sinkQueue: Promise<void> = Promise.resolve();

  constructor(options: ExecutionLedgerOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.maxRecords = Math.max(1, options.maxRecords ?? DEFAULT_LEDGER_CAPACITY);
    this.sink = options.sink ?? null;
    this.logger = options.logger;
  }

  /** Appends a `running` record and returns its snapshot. */
  record(input: ExecutionRecordInput): ExecutionRecord {
    const record: ExecutionRecord = {
      id: this.idFactory(),
      correlationId: input.correlationId,
      attempt: input.attempt,
      tool: input.tool,
      workerId: input.workerId,
      input: structuredClone(input.input),
      output: null,
      error: null,
      status: "running",
      startedAt: this.now(),
      endedAt: null,
      durationMs: null,
    };
    this.records.set(record.id, record);
    this.evictOverflow();
    this.persist(record);
    return structuredClone(record);
  }

  /**
   * Moves a running record to its terminal status. Finalizing an unknown or
   * already terminal record is ignored with a warning.
   */
  finalize(id: string, outcome: ExecutionOutcome): ExecutionRecord | undefined {
    const current = this.records.get(id);
    if (!current || current.status !== "running") {
      this.logger?.warn("ledger_finalize_ignored", {
        execution_id: id,
        reason: current ? "already_terminal" : "unknown_record",
        status: outcome.status,
      });
      return undefined;
    }
    const endedAt = this.now();
    const finalized = freezeRecord({
      ...current,
      status: outcome.status,
      output: outcome.status === "succeeded" ? outcome.output : null,
      error: outcome.status === "succeeded" ? null : { ...outcome.error },
      endedAt,
      durationMs: Math.max(0, endedAt - current.startedAt),
    });
    this.records.set(id, finalized);
    this.persist(finalized);
    for (const listener of this.listeners) {
      try {
        listener(finalized);
      } catch (error) {
        this.logger?.warn("ledger_listener_failed", { execution_id: id, error });
      }
    }
    return finalized;
  }

  get(id: string): ExecutionRecord | undefined {
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  /** Records matching every provided filter, most recent first. */
  query(filters: LedgerQuery = {}): ExecutionRecord[] {
    const matches: ExecutionRecord[] = [];
    for (const record of this.records.values()) {
      if (filters.tool !== undefined && record.tool !== filters.tool) continue;
      if (filters.workerId !== undefined && record.workerId !== filters.workerId) continue;
      if (filters.status !== undefined && record.status !== filters.status) continue;
      if (filters.from !== undefined && record.startedAt < filters.from) continue;
      if (filters.to !== undefined && record.startedAt > filters.to) continue;
      matches.push(record);
    }
    matches.reverse();
    const limited = filters.limit !== undefined ? matches.slice(0, Math.max(0, filters.limit)) : matches;
    return limited.map((record) => structuredClone(record));
  }

  /** Every attempt of one call, in attempt order. */
  listByCorrelation(correlationId: string): ExecutionRecord[] {
    return [...this.records.values()]
      .filter((record) => record.correlationId === correlationId)
      .sort((left, right) => left.attempt - right.attempt)
      .map((record) => structuredClone(record));
  }

  summary(): LedgerSummary {
    const summary: LedgerSummary = {
      total: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      timed_out: 0,
      cancelled: 0,
    };
    for (const record of this.records.values()) {
      summary[record.status] += 1;
      summary.total += 1;
    }
    return summary;
  }

  /** Number of records currently in `running`. */
  runningCount(): number {
    let running = 0;
    for (const record of this.records.values()) {
      if (record.status === "running") {
        running += 1;
      }
    }
    return running;
  }

  /** Subscribes to terminal transitions. Returns the unsubscribe function. */
  onFinalized(listener: LedgerFinalizeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every pending sink write has settled. */
  async flush(): Promise<void> {
    await this.sinkQueue;
  }

  private evictOverflow(): void {
    if (this.records.size <= this.maxRecords) {
      return;
    }
    for (const [id, record] of this.records) {
      if (this.records.size <= this.maxRecords) {
        return;
      }
      if (record.status !== "running") {
        this.records.delete(id);
      }
    }
  }

  private persist(record: ExecutionRecord): void {
    const sink = this.sink;
    if (!sink) {
      return;
    }
    const snapshot = structuredClone(record);
    this.sinkQueue = this.sinkQueue
      .then(() => sink.append(snapshot))
      .catch((error: unknown) => {
        this.logger?.error("ledger_sink_failed", { execution_id: snapshot.id, status: snapshot.status, error });
      });
  }
}
