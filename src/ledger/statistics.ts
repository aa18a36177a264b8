import type { CatalogStore } from "../catalog/store.js";
import type { ExecutionLedger } from "./executionLedger.js";

/**
 * Feeds every finalized attempt back into the catalog tool statistics.
 * Cancelled attempts say nothing about the worker and are left out.
 */
export function feedCatalogStatistics(ledger: ExecutionLedger, catalog: CatalogStore): () => void {
  return ledger.onFinalized((record) => {
    if (record.status === "cancelled" || record.status === "running") {
      return;
    }
    catalog.recordInvocationOutcome(record.workerId, record.tool, {
      success: record.status === "succeeded",
      durationMs: record.durationMs ?? 0,
      at: record.endedAt ?? record.startedAt,
    });
  });
}
