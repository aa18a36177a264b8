import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

/** Maximum payload size accepted by the HTTP surface (1 MiB). */
export const MAX_BODY_BYTES = 1 << 20;

/** Raw request payload returned by {@link readRequestBody}. */
export interface RequestBody {
  /** Raw UTF-8 string received over the wire. */
  readonly raw: string;
  /** Number of bytes read from the underlying socket. */
  readonly bytes: number;
}

/** Thrown when a request body exceeds the accepted size. */
export class PayloadTooLargeError extends Error {
  readonly status = 413;

  constructor(readonly limit: number) {
    super("Payload Too Large");
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Reads a request payload while enforcing an upper bound on the number of
 * bytes accepted. Parsing is left to the caller so unparsable JSON can be
 * reported with the JSON-RPC parse error code.
 */
export async function readRequestBody(req: IncomingMessage, maxBytes = MAX_BODY_BYTES): Promise<RequestBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    totalBytes += buffer.length;

    if (totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }

    buffers.push(buffer);
  }

  return { raw: Buffer.concat(buffers).toString("utf8"), bytes: totalBytes };
}
