import { CatalogStore } from "../catalog/store.js";
import { CircuitBreakerRegistry } from "../infra/circuitBreaker.js";
import { ExecutionLedger, type LedgerSink } from "../ledger/executionLedger.js";
import { JsonlLedgerSink } from "../ledger/jsonlSink.js";
import { feedCatalogStatistics } from "../ledger/statistics.js";
import { StructuredLogger } from "../logger.js";
import { HealthMonitor } from "../monitor/healthMonitor.js";
import { ExecutionRouter } from "../router/executionRouter.js";
import type { LoadPolicy, LoadPolicyName } from "../router/loadPolicy.js";
import {
  DEFAULT_BREAKER_RECOVERY_MS,
  DEFAULT_BREAKER_THRESHOLD,
  type MonitorTimingOptions,
  type RouterRuntimeOptions,
} from "../serverOptions.js";
import { HttpWorkerTransport } from "../transport/httpWorkerTransport.js";
import type { WorkerTransport } from "../transport/workerTransport.js";
import { GatewayDispatcher } from "./dispatcher.js";
import type { HubToolContext } from "./hubTools.js";

export const GATEWAY_SERVER_INFO = { name: "spoke-gateway", version: "0.1.0" } as const;

export interface GatewayRuntimeOptions {
  monitor?: Partial<MonitorTimingOptions>;
  router?: Partial<Omit<RouterRuntimeOptions, "loadPolicy">> & { loadPolicy?: LoadPolicyName | LoadPolicy };
  /** JSONL file mirroring the ledger; ignored when `ledgerSink` is given. */
  ledgerFile?: string | null;
  ledgerSink?: LedgerSink | null;
  ledgerCapacity?: number;
  /** Worker wire adapter, HTTP by default. */
  transport?: WorkerTransport;
  logger?: StructuredLogger;
  now?: () => number;
}

export interface GatewayRuntime {
  readonly catalog: CatalogStore;
  readonly ledger: ExecutionLedger;
  readonly breakers: CircuitBreakerRegistry;
  readonly router: ExecutionRouter;
  readonly monitor: HealthMonitor;
  readonly dispatcher: GatewayDispatcher;
  /** Collaborators handed to the built-in hub tools. */
  readonly context: HubToolContext;
  readonly logger: StructuredLogger;
  readonly serverInfo: { name: string; version: string };
  /** Starts the background health cycles. */
  start(): void;
  /** Stops the background cycles and drains pending ledger writes. */
  stop(): Promise<void>;
}

/**
 * Wires the catalog, monitor, router, ledger and dispatcher together. The
 * returned handle is shared by the stdio and HTTP surfaces.
 */
export function createGatewayRuntime(options: GatewayRuntimeOptions = {}): GatewayRuntime {
  const logger = options.logger ?? new StructuredLogger();
  const now = options.now ?? (() => Date.now());
  const transport = options.transport ?? new HttpWorkerTransport();

  const catalog = new CatalogStore({ now, logger });
  const sink = options.ledgerSink ?? (options.ledgerFile ? new JsonlLedgerSink(options.ledgerFile) : null);
  const ledger = new ExecutionLedger({ now, logger, sink, maxRecords: options.ledgerCapacity });
  const breakers = new CircuitBreakerRegistry({
    failureThreshold: options.router?.breakerThreshold ?? DEFAULT_BREAKER_THRESHOLD,
    recoveryMs: options.router?.breakerRecoveryMs ?? DEFAULT_BREAKER_RECOVERY_MS,
    now,
  });
  const router = new ExecutionRouter({
    catalog,
    ledger,
    transport,
    breakers,
    logger,
    policy: options.router?.loadPolicy,
    maxConcurrent: options.router?.maxConcurrent,
  });
  const monitor = new HealthMonitor({ catalog, transport, logger, now, ...options.monitor });

  feedCatalogStatistics(ledger, catalog);
  catalog.onChange((change) => {
    if (change.kind === "purged") {
      breakers.forget(change.workerId);
    }
  });

  const serverInfo = { ...GATEWAY_SERVER_INFO };
  const context: HubToolContext = { catalog, monitor, router, ledger, breakers, serverInfo, now };
  const dispatcher = new GatewayDispatcher(context, logger);

  return {
    catalog,
    ledger,
    breakers,
    router,
    monitor,
    dispatcher,
    context,
    logger,
    serverInfo,
    start: () => monitor.start(),
    stop: async () => {
      monitor.stop();
      await ledger.flush();
      await logger.flush();
    },
  };
}
