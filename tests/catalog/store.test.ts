/**
 * Catalog store behaviour: registration upserts, soft deregistration,
 * discovery filtering, probe bookkeeping and the TTL/purge lifecycle.
 */
import { describe, it, beforeEach } from "mocha";
import { expect } from "chai";

import { CatalogStore } from "../../src/catalog/store.js";
import type { CatalogChange } from "../../src/catalog/types.js";
import { ValidationError } from "../../src/rpc/errors.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

function registration(id: string, tools: string[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    instance_id: id,
    address: `http://127.0.0.1/${id}`,
    tools: tools.map((toolId) => ({ tool_id: toolId })),
    ...extra,
  };
}

describe("catalog/store", () => {
  let now: number;
  let store: CatalogStore;

  beforeEach(() => {
    now = 1_000;
    store = new CatalogStore({ now: () => now });
  });

  it("registers an instance with defaults applied", () => {
    const instance = store.register(registration("w1", ["echo"]));

    expect(instance).to.deep.include({
      id: "w1",
      name: "w1",
      address: "http://127.0.0.1/w1",
      weight: 100,
      currentLoad: 0,
      health: "healthy",
      consecutiveFailures: 0,
      lastSeenAt: 1_000,
      ttlMs: 300_000,
      active: true,
      healthCheckUrl: "http://127.0.0.1/w1/health",
      healthCheckIntervalMs: null,
      registeredAt: 1_000,
      deactivatedAt: null,
      deactivationReason: null,
      lastProbeAt: null,
    });
    expect(instance.tools).to.have.length(1);
    expect(instance.tools[0]).to.deep.include({ id: "echo", name: "echo", timeoutMs: 300_000, retryAttempts: 3 });
    expect(instance.tools[0]?.stats.totalInvocations).to.equal(0);
  });

  it("rejects a registration declaring the same tool twice", () => {
    let caught: unknown;
    try {
      store.register(registration("w1", ["echo", "echo"]));
    } catch (error) {
      caught = error;
    }
    if (!(caught instanceof ValidationError)) {
      expect.fail("expected a ValidationError");
    }
    expect(caught.data.hint).to.equal("tools.1.tool_id: duplicate tool id 'echo'");
    expect(store.listAll()).to.deep.equal([]);
  });

  it("rejects an empty instance id", () => {
    expect(() => store.register(registration("", ["echo"]))).to.throw(ValidationError);
  });

  it("re-registration replaces tools, reactivates and keeps surviving statistics", () => {
    store.register(registration("w1", ["echo", "sum"]));
    store.recordInvocationOutcome("w1", "echo", { success: true, durationMs: 40 });
    store.deregister("w1");

    now = 5_000;
    const refreshed = store.register(registration("w1", ["echo", "upper"], { weight: 7 }));

    expect(refreshed.active).to.equal(true);
    expect(refreshed.deactivationReason).to.equal(null);
    expect(refreshed.weight).to.equal(7);
    expect(refreshed.lastSeenAt).to.equal(5_000);
    expect(refreshed.registeredAt).to.equal(1_000);
    expect(refreshed.tools.map((tool) => tool.id)).to.deep.equal(["echo", "upper"]);
    expect(refreshed.tools[0]?.stats.totalInvocations).to.equal(1);
    expect(refreshed.tools[1]?.stats.totalInvocations).to.equal(0);
  });

  it("deregistration is soft and idempotent", () => {
    store.register(registration("w1", ["echo"]));

    expect(store.deregister("w1")).to.equal(true);
    expect(store.deregister("w1")).to.equal(false);
    expect(store.deregister("missing")).to.equal(false);

    const entry = store.get("w1");
    expect(entry?.active).to.equal(false);
    expect(entry?.deactivationReason).to.equal("deregistered");
    expect(entry?.deactivatedAt).to.equal(1_000);
    expect(store.discover("echo")).to.deep.equal([]);
  });

  it("discovers healthy active instances ordered by id and honours the exclusion set", () => {
    store.register(registration("w3", ["echo"]));
    store.register(registration("w1", ["echo"]));
    store.register(registration("w2", ["echo", "sum"]));
    store.register(registration("w4", ["sum"]));

    expect(store.discover("echo").map((instance) => instance.id)).to.deep.equal(["w1", "w2", "w3"]);
    expect(store.discover("echo", { exclude: new Set(["w1", "w3"]) }).map((instance) => instance.id)).to.deep.equal([
      "w2",
    ]);
    expect(store.discover("unknown")).to.deep.equal([]);
  });

  it("hands out copies that do not alias the stored state", () => {
    store.register(registration("w1", ["echo"]));
    const copy = store.get("w1");
    if (!copy) {
      expect.fail("instance should exist");
    }
    copy.weight = 1;
    copy.tools[0].name = "mutated";

    expect(store.get("w1")?.weight).to.equal(100);
    expect(store.get("w1")?.tools[0]?.name).to.equal("echo");
  });

  it("deactivates an instance once probe failures reach the threshold", () => {
    const changes: CatalogChange[] = [];
    store.onChange((change) => changes.push(change));
    store.register(registration("w1", ["echo"]));

    expect(store.recordProbeFailure("w1", 3)).to.deep.equal({ consecutiveFailures: 1, deactivated: false });
    expect(store.recordProbeFailure("w1", 3)).to.deep.equal({ consecutiveFailures: 2, deactivated: false });
    expect(store.recordProbeFailure("w1", 3)).to.deep.equal({ consecutiveFailures: 3, deactivated: true });

    const entry = store.get("w1");
    expect(entry?.health).to.equal("unhealthy");
    expect(entry?.active).to.equal(false);
    expect(entry?.deactivationReason).to.equal("unhealthy");
    expect(changes).to.deep.equal([
      { kind: "registered", workerId: "w1" },
      { kind: "health", workerId: "w1", health: "unhealthy" },
      { kind: "deactivated", workerId: "w1", reason: "unhealthy" },
    ]);
  });

  it("resets the failure streak on a successful probe", () => {
    store.register(registration("w1", ["echo"]));
    store.recordProbeFailure("w1", 3);
    store.recordProbeFailure("w1", 3);

    now = 2_500;
    expect(store.recordProbeSuccess("w1")).to.equal(true);
    const entry = store.get("w1");
    expect(entry?.consecutiveFailures).to.equal(0);
    expect(entry?.lastSeenAt).to.equal(2_500);
    expect(entry?.lastProbeAt).to.equal(2_500);
  });

  it("expires instances whose TTL elapsed then purges them after the retention window", () => {
    store.register(registration("w1", ["echo"], { ttl_seconds: 10 }));
    store.register(registration("w2", ["echo"], { ttl_seconds: 60 }));

    now = 10_999;
    expect(store.markExpired()).to.deep.equal([]);
    now = 11_000;
    expect(store.markExpired()).to.deep.equal(["w1"]);
    expect(store.get("w1")?.deactivationReason).to.equal("ttl_expired");

    now = 15_000;
    expect(store.purgeInactive(5_000)).to.deep.equal([]);
    now = 16_000;
    expect(store.purgeInactive(5_000)).to.deep.equal(["w1"]);
    expect(store.get("w1")).to.equal(undefined);
    expect(store.get("w2")?.active).to.equal(true);
  });

  it("heartbeat refreshes active instances only", () => {
    store.register(registration("w1", ["echo"]));
    now = 3_000;
    expect(store.heartbeat("w1")).to.equal(true);
    expect(store.get("w1")?.lastSeenAt).to.equal(3_000);

    store.deregister("w1");
    expect(store.heartbeat("w1")).to.equal(false);
    expect(store.heartbeat("missing")).to.equal(false);
  });

  it("clamps the load at zero", () => {
    store.register(registration("w1", ["echo"]));
    expect(store.adjustLoad("w1", 2)).to.equal(2);
    expect(store.adjustLoad("w1", -5)).to.equal(0);
    expect(store.adjustLoad("missing", 1)).to.equal(0);
  });

  it("aggregates tool statistics across instances and resets them on demand", () => {
    store.register(registration("w1", ["echo"]));
    store.register(registration("w2", ["echo", "sum"]));
    store.recordInvocationOutcome("w1", "echo", { success: true, durationMs: 10, at: 1_100 });
    store.recordInvocationOutcome("w2", "echo", { success: false, durationMs: 30, at: 1_200 });
    store.recordInvocationOutcome("w2", "echo", { success: true, durationMs: 50, at: 1_300 });

    const [echo, sum] = store.listTools();
    expect(echo?.id).to.equal("echo");
    expect(echo?.workerIds).to.deep.equal(["w1", "w2"]);
    expect(echo?.stats).to.deep.equal({
      totalInvocations: 3,
      successfulInvocations: 2,
      failedInvocations: 1,
      averageLatencyMs: 30,
      lastInvokedAt: 1_300,
    });
    expect(sum?.workerIds).to.deep.equal(["w2"]);

    expect(store.resetStats("echo")).to.equal(2);
    expect(store.getTool("w2", "echo")?.stats.totalInvocations).to.equal(0);
    expect(store.resetStats()).to.equal(3);
  });

  it("keeps notifying listeners when one of them throws", () => {
    const logger = new RecordingLogger();
    const guarded = new CatalogStore({ now: () => now, logger });
    const seen: string[] = [];
    guarded.onChange(() => {
      throw new Error("listener boom");
    });
    const unsubscribe = guarded.onChange((change) => seen.push(change.kind));

    guarded.register(registration("w1", ["echo"]));
    unsubscribe();
    guarded.deregister("w1");

    expect(seen).to.deep.equal(["registered"]);
    expect(logger.find("catalog_listener_failed")).to.have.length(2);
  });
});
