import { describe, it } from "mocha";
import { expect } from "chai";

import { CatalogStore } from "../../src/catalog/store.js";
import { ExecutionLedger } from "../../src/ledger/executionLedger.js";
import { feedCatalogStatistics } from "../../src/ledger/statistics.js";

describe("ledger/statistics", () => {
  it("folds finalized attempts into the catalog and skips cancellations", () => {
    let now = 0;
    let nextId = 0;
    const catalog = new CatalogStore({ now: () => now });
    const ledger = new ExecutionLedger({
      now: () => now,
      idFactory: () => {
        nextId += 1;
        return `exec-${nextId}`;
      },
    });
    feedCatalogStatistics(ledger, catalog);
    catalog.register({ instance_id: "w1", address: "http://127.0.0.1:9001", tools: [{ tool_id: "echo" }] });

    ledger.record({ correlationId: "c1", attempt: 1, tool: "echo", workerId: "w1", input: null });
    now = 20;
    ledger.finalize("exec-1", { status: "succeeded", output: null });

    ledger.record({ correlationId: "c2", attempt: 1, tool: "echo", workerId: "w1", input: null });
    now = 80;
    ledger.finalize("exec-2", { status: "timed_out", error: { code: -32012, message: "timeout" } });

    ledger.record({ correlationId: "c3", attempt: 1, tool: "echo", workerId: "w1", input: null });
    now = 500;
    ledger.finalize("exec-3", { status: "cancelled", error: { code: -32015, message: "cancelled" } });

    expect(catalog.getTool("w1", "echo")?.stats).to.deep.equal({
      totalInvocations: 2,
      successfulInvocations: 1,
      failedInvocations: 1,
      averageLatencyMs: 40,
      lastInvokedAt: 80,
    });
  });
});
