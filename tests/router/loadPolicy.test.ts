import { describe, it } from "mocha";
import { expect } from "chai";

import { leastLoad, resolveLoadPolicy, weightedPriority } from "../../src/router/loadPolicy.js";

describe("router/loadPolicy", () => {
  it("weighted priority prefers the heaviest instance", () => {
    const choice = weightedPriority([
      { id: "a", weight: 100, currentLoad: 0 },
      { id: "b", weight: 300, currentLoad: 5 },
      { id: "c", weight: 100, currentLoad: 0 },
    ]);
    expect(choice?.id).to.equal("b");
  });

  it("weighted priority breaks weight ties on load then id", () => {
    const candidates = [
      { id: "c", weight: 100, currentLoad: 1 },
      { id: "b", weight: 100, currentLoad: 0 },
      { id: "a", weight: 100, currentLoad: 1 },
    ];
    expect(weightedPriority(candidates)?.id).to.equal("b");
    expect(weightedPriority(candidates.filter((candidate) => candidate.id !== "b"))?.id).to.equal("a");
  });

  it("least load picks the idlest instance and ties on id", () => {
    expect(
      leastLoad([
        { id: "b", weight: 1, currentLoad: 2 },
        { id: "c", weight: 900, currentLoad: 1 },
        { id: "a", weight: 1, currentLoad: 1 },
      ])?.id,
    ).to.equal("a");
  });

  it("returns undefined when there is no candidate", () => {
    expect(weightedPriority([])).to.equal(undefined);
    expect(leastLoad([])).to.equal(undefined);
  });

  it("resolves policies by name", () => {
    expect(resolveLoadPolicy("least-load")).to.equal(leastLoad);
    expect(resolveLoadPolicy("weighted-priority")).to.equal(weightedPriority);
  });
});
