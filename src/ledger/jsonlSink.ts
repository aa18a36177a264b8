import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

import type { ExecutionRecord, LedgerSink } from "./executionLedger.js";

/**
 * Ledger sink appending one JSON line per record transition. A record
 * therefore appears twice in the file: once `running`, once terminal.
 */
export class JsonlLedgerSink implements LedgerSink {
  private directoryReady = false;

  constructor(private readonly filePath: string) {}

  async append(record: ExecutionRecord): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, { encoding: "utf8" });
  }
}
