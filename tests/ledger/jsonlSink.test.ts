import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ExecutionLedger } from "../../src/ledger/executionLedger.js";
import { JsonlLedgerSink } from "../../src/ledger/jsonlSink.js";

describe("ledger/jsonlSink", () => {
  const directories: string[] = [];

  afterEach(async () => {
    for (const directory of directories.splice(0)) {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("appends one JSON line per transition and creates the parent directory", async () => {
    const root = await mkdtemp(path.join(tmpdir(), "ledger-sink-"));
    directories.push(root);
    const file = path.join(root, "nested", "ledger.jsonl");
    let now = 10;
    const ledger = new ExecutionLedger({ now: () => now, idFactory: () => "exec-1", sink: new JsonlLedgerSink(file) });

    ledger.record({ correlationId: "c1", attempt: 1, tool: "echo", workerId: "w1", input: { text: "hi" } });
    now = 25;
    ledger.finalize("exec-1", { status: "succeeded", output: { text: "HI" } });
    await ledger.flush();

    const lines = (await readFile(file, "utf8")).trim().split("\n");
    expect(lines).to.have.length(2);
    const [first, second] = lines.map((line) => JSON.parse(line));
    expect(first).to.deep.include({ id: "exec-1", status: "running", startedAt: 10, endedAt: null });
    expect(second).to.deep.include({ id: "exec-1", status: "succeeded", endedAt: 25, durationMs: 15 });
    expect(second.output).to.deep.equal({ text: "HI" });
  });
});
