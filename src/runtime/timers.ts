import {
  clearInterval as nodeClearInterval,
  clearTimeout as nodeClearTimeout,
  setInterval as nodeSetInterval,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/** Handle returned by {@link runtimeTimers.setTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/** Handle returned by {@link runtimeTimers.setInterval}. */
export type IntervalHandle = ReturnType<typeof nodeSetInterval>;

const nativeTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
  setInterval: nodeSetInterval,
  clearInterval: nodeClearInterval,
} as const;

/**
 * Looks the timer function up on `globalThis` at call time. Sinon fake timers
 * install their overrides there after this module was loaded, and the health
 * monitor cycles as well as invocation timeouts must follow them in tests.
 */
function currentTimer<K extends keyof typeof nativeTimers>(key: K): (typeof nativeTimers)[K] {
  const candidate: unknown = Reflect.get(globalThis, key);
  if (typeof candidate === "function" && candidate !== nativeTimers[key]) {
    return candidate as (typeof nativeTimers)[K];
  }
  return nativeTimers[key];
}

/**
 * Timer helpers used by every background loop and deadline in the gateway.
 * Handles are unref'd by callers that must not keep the process alive.
 */
export const runtimeTimers = {
  setTimeout(callback: () => void, ms: number): TimeoutHandle {
    return currentTimer("setTimeout").call(globalThis, callback, ms);
  },
  clearTimeout(handle: TimeoutHandle | undefined): void {
    currentTimer("clearTimeout").call(globalThis, handle);
  },
  setInterval(callback: () => void, ms: number): IntervalHandle {
    return currentTimer("setInterval").call(globalThis, callback, ms);
  },
  clearInterval(handle: IntervalHandle | undefined): void {
    currentTimer("clearInterval").call(globalThis, handle);
  },
} as const;
