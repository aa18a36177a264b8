import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Transport tag stamped on log entries. */
export type RequestTransport = "http" | "stdio" | "internal";

/**
 * Correlation metadata attached to the asynchronous execution of one inbound
 * JSON-RPC request. The logger reads it to stamp every entry emitted while the
 * request is being served, including entries produced deep inside the router.
 */
export interface RequestContext {
  /** Identifier echoed from the JSON-RPC envelope. */
  requestId?: string | number | null;
  /** Method name after envelope validation. */
  method?: string;
  transport?: RequestTransport;
}

const storage = new AsyncLocalStorage<RequestContext>();

/** Runs the callback with the supplied context exposed to nested async work. */
export function runWithRequestContext<T>(context: RequestContext | undefined, callback: () => T): T {
  if (!context) {
    return callback();
  }
  return storage.run(context, callback);
}

/** Retrieves the context associated with the current async execution. */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
