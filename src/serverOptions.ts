import { readEnum, readInt, readOptionalInt, readOptionalString, type EnvSource } from "./config/env.js";
import {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_PROBE_INTERVAL_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RETENTION_MS,
} from "./monitor/healthMonitor.js";
import { DEFAULT_MAX_CONCURRENT_EXECUTIONS } from "./router/executionRouter.js";
import { LOAD_POLICIES, type LoadPolicyName } from "./router/loadPolicy.js";

/**
 * Options describing the HTTP exposure of the gateway. When `enabled` is
 * false the remaining attributes are ignored.
 */
export interface HttpRuntimeOptions {
  enabled: boolean;
  port: number;
  host: string;
}

/** Cadence and thresholds of the health monitor cycles. */
export interface MonitorTimingOptions {
  probeIntervalMs: number;
  probeTimeoutMs: number;
  failureThreshold: number;
  cleanupIntervalMs: number;
  retentionMs: number;
}

export interface RouterRuntimeOptions {
  /** Consecutive failures opening an instance breaker. */
  breakerThreshold: number;
  /** Time an open breaker waits before admitting a trial call. */
  breakerRecoveryMs: number;
  maxConcurrent: number;
  loadPolicy: LoadPolicyName;
}

export interface GatewayRuntimeCliOptions {
  enableStdio: boolean;
  http: HttpRuntimeOptions;
  monitor: MonitorTimingOptions;
  router: RouterRuntimeOptions;
  /** JSONL file mirroring the execution ledger, `null` keeps it in memory only. */
  ledgerFile: string | null;
  logFile: string | null;
}

export const DEFAULT_HTTP_PORT = 8000;
export const DEFAULT_HTTP_HOST = "127.0.0.1";
export const DEFAULT_BREAKER_THRESHOLD = 5;
export const DEFAULT_BREAKER_RECOVERY_MS = 60_000;

const FLAG_WITH_VALUE = new Set([
  "--http-port",
  "--http-host",
  "--probe-interval-ms",
  "--probe-timeout-ms",
  "--failure-threshold",
  "--cleanup-interval-ms",
  "--retention-ms",
  "--breaker-threshold",
  "--breaker-recovery-ms",
  "--max-concurrent",
  "--load-policy",
  "--ledger-file",
  "--log-file",
]);

/**
 * Ensures a provided numeric string can be converted to a positive integer.
 */
function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`The value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

/** Same as {@link parsePositiveInteger} but accepts zero. */
function parseNonNegativeInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num < 0) {
    throw new Error(`The value ${value} for ${flag} must be a non-negative integer.`);
  }
  return num;
}

function parseLoadPolicy(value: string, flag: string): LoadPolicyName {
  const normalised = value.trim().toLowerCase();
  const match = LOAD_POLICIES.find((policy) => policy === normalised);
  if (!match) {
    throw new Error(`The value ${value} for ${flag} must be one of ${LOAD_POLICIES.join(", ")}.`);
  }
  return match;
}

function parseNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`The flag ${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Default configuration used before CLI flags are processed. Every default
 * can be overridden through a `HUB_*` environment variable.
 */
export function resolveDefaultOptions(env: EnvSource = process.env): GatewayRuntimeCliOptions {
  const envPort = readOptionalInt("HUB_HTTP_PORT", { min: 1, max: 65_535 }, env);
  return {
    enableStdio: true,
    http: {
      enabled: envPort !== undefined,
      port: envPort ?? DEFAULT_HTTP_PORT,
      host: readOptionalString("HUB_HTTP_HOST", env) ?? DEFAULT_HTTP_HOST,
    },
    monitor: {
      probeIntervalMs: readInt("HUB_PROBE_INTERVAL_MS", DEFAULT_PROBE_INTERVAL_MS, { min: 1 }, env),
      probeTimeoutMs: readInt("HUB_PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS, { min: 1 }, env),
      failureThreshold: readInt("HUB_FAILURE_THRESHOLD", DEFAULT_FAILURE_THRESHOLD, { min: 1 }, env),
      cleanupIntervalMs: readInt("HUB_CLEANUP_INTERVAL_MS", DEFAULT_CLEANUP_INTERVAL_MS, { min: 1 }, env),
      retentionMs: readInt("HUB_RETENTION_MS", DEFAULT_RETENTION_MS, { min: 0 }, env),
    },
    router: {
      breakerThreshold: readInt("HUB_BREAKER_THRESHOLD", DEFAULT_BREAKER_THRESHOLD, { min: 1 }, env),
      breakerRecoveryMs: readInt("HUB_BREAKER_RECOVERY_MS", DEFAULT_BREAKER_RECOVERY_MS, { min: 0 }, env),
      maxConcurrent: readInt("HUB_MAX_CONCURRENT", DEFAULT_MAX_CONCURRENT_EXECUTIONS, { min: 1 }, env),
      loadPolicy: readEnum("HUB_LOAD_POLICY", LOAD_POLICIES, "weighted-priority", env),
    },
    ledgerFile: readOptionalString("HUB_LEDGER_FILE", env) ?? null,
    logFile: readOptionalString("HUB_LOG_FILE", env) ?? null,
  };
}

/**
 * Parses CLI arguments on top of the environment defaults. The function
 * accepts raw `process.argv.slice(2)` content and returns a structured object
 * that can directly be consumed by the runtime.
 */
export function parseGatewayRuntimeOptions(
  argv: string[],
  env: EnvSource = process.env,
): GatewayRuntimeCliOptions {
  const state = resolveDefaultOptions(env);

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag, inlineValue] = arg.split("=", 2);
    const expectsValue = FLAG_WITH_VALUE.has(flag);
    let value = inlineValue ?? "";

    if (expectsValue && value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--no-stdio":
        state.enableStdio = false;
        break;
      case "--http":
        state.http.enabled = true;
        break;
      case "--http-port":
        state.http.port = parsePositiveInteger(value, flag);
        state.http.enabled = true;
        break;
      case "--http-host":
        state.http.host = parseNonEmpty(value, flag);
        state.http.enabled = true;
        break;
      case "--probe-interval-ms":
        state.monitor.probeIntervalMs = parsePositiveInteger(value, flag);
        break;
      case "--probe-timeout-ms":
        state.monitor.probeTimeoutMs = parsePositiveInteger(value, flag);
        break;
      case "--failure-threshold":
        state.monitor.failureThreshold = parsePositiveInteger(value, flag);
        break;
      case "--cleanup-interval-ms":
        state.monitor.cleanupIntervalMs = parsePositiveInteger(value, flag);
        break;
      case "--retention-ms":
        state.monitor.retentionMs = parseNonNegativeInteger(value, flag);
        break;
      case "--breaker-threshold":
        state.router.breakerThreshold = parsePositiveInteger(value, flag);
        break;
      case "--breaker-recovery-ms":
        state.router.breakerRecoveryMs = parseNonNegativeInteger(value, flag);
        break;
      case "--max-concurrent":
        state.router.maxConcurrent = parsePositiveInteger(value, flag);
        break;
      case "--load-policy":
        state.router.loadPolicy = parseLoadPolicy(value, flag);
        break;
      case "--ledger-file":
        state.ledgerFile = parseNonEmpty(value, flag);
        break;
      case "--log-file":
        state.logFile = parseNonEmpty(value, flag);
        break;
      default:
        throw new Error(`Unknown flag ${flag}.`);
    }
  }

  return state;
}
