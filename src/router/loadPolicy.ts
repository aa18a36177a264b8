import { compareIds, type WorkerInstance } from "../catalog/types.js";

/** Identifiers of the load-distribution policies understood by the router. */
export const LOAD_POLICIES = ["weighted-priority", "least-load"] as const;
export type LoadPolicyName = (typeof LOAD_POLICIES)[number];

/** Fields of a candidate the policies look at. */
export type LoadCandidate = Pick<WorkerInstance, "id" | "weight" | "currentLoad">;

export type LoadPolicy = <T extends LoadCandidate>(candidates: readonly T[]) => T | undefined;

/**
 * Highest weight first, then the lowest current load, then the smallest id.
 * Deterministic: the same candidate set always yields the same choice.
 */
export const weightedPriority: LoadPolicy = (candidates) => {
  const [best] = [...candidates].sort(
    (left, right) =>
      right.weight - left.weight || left.currentLoad - right.currentLoad || compareIds(left.id, right.id),
  );
  return best;
};

/** Lowest current load, ties broken by the smallest id. */
export const leastLoad: LoadPolicy = (candidates) => {
  let best: (typeof candidates)[number] | undefined;
  for (const candidate of candidates) {
    if (
      best === undefined ||
      candidate.currentLoad < best.currentLoad ||
      (candidate.currentLoad === best.currentLoad && compareIds(candidate.id, best.id) < 0)
    ) {
      best = candidate;
    }
  }
  return best;
};

export function resolveLoadPolicy(name: LoadPolicyName): LoadPolicy {
  return name === "least-load" ? leastLoad : weightedPriority;
}
