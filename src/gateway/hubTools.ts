import { z, type ZodTypeAny } from "zod";

import type { CatalogStore } from "../catalog/store.js";
import { toValidationError } from "../catalog/schemas.js";
import { compareIds, type CatalogToolEntry, type ToolSchema, type WorkerInstance } from "../catalog/types.js";
import type { CircuitBreakerRegistry, CircuitBreakerState } from "../infra/circuitBreaker.js";
import type { ExecutionLedger } from "../ledger/executionLedger.js";
import type { HealthMonitor } from "../monitor/healthMonitor.js";
import type { ExecutionRouter } from "../router/executionRouter.js";

/** Collaborators the built-in tools read from. */
export interface HubToolContext {
  catalog: CatalogStore;
  monitor: HealthMonitor;
  router: ExecutionRouter;
  ledger: ExecutionLedger;
  breakers: CircuitBreakerRegistry;
  serverInfo: { name: string; version: string };
  now?: () => number;
}

/** Built-in tool served by the gateway itself rather than by a worker. */
export interface HubTool {
  name: string;
  description: string;
  inputSchema: ToolSchema;
  invoke(args: unknown, context: HubToolContext): Promise<unknown>;
}

interface HubToolDefinition<S extends ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolSchema;
  args: S;
  run(args: z.infer<S>, context: HubToolContext): Promise<unknown> | unknown;
}

function defineHubTool<S extends ZodTypeAny>(definition: HubToolDefinition<S>): HubTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async invoke(args, context) {
      const parsed = definition.args.safeParse(args ?? {});
      if (!parsed.success) {
        throw toValidationError(parsed.error, `invalid arguments for '${definition.name}'`);
      }
      return definition.run(parsed.data, context);
    },
  };
}

const EMPTY_OBJECT_SCHEMA: ToolSchema = { type: "object", properties: {}, additionalProperties: false };

export const DEFAULT_SEARCH_LIMIT = 10;

const SearchToolsArgsSchema = z
  .object({
    query: z.string().trim().min(1, "query must not be empty").max(200),
    limit: z.number().int().min(1).max(100).default(DEFAULT_SEARCH_LIMIT),
  })
  .strict();

const ListWorkersArgsSchema = z.object({ include_inactive: z.boolean().default(true) }).strict();

export interface ToolSearchMatch {
  name: string;
  description: string;
  workers: string[];
  relevance: number;
}

function schemaPropertyNames(schema: ToolSchema): string[] {
  const properties = schema.properties;
  if (!properties || typeof properties !== "object" || Array.isArray(properties)) {
    return [];
  }
  return Object.keys(properties);
}

/** Relevance of one tool for the lower-cased query words. */
export function scoreTool(words: readonly string[], tool: CatalogToolEntry): number {
  const id = tool.id.toLowerCase();
  const name = tool.name.toLowerCase();
  const description = tool.description.toLowerCase();
  const keywords = schemaPropertyNames(tool.inputSchema).map((key) => key.toLowerCase());
  let score = 0;
  for (const word of words) {
    if (id.includes(word) || name.includes(word)) {
      score += 10;
    }
    if (keywords.some((keyword) => keyword.includes(word))) {
      score += 5;
    }
    if (description.includes(word)) {
      score += 2;
    }
  }
  return score;
}

export function searchTools(tools: readonly CatalogToolEntry[], query: string, limit: number): ToolSearchMatch[] {
  const words = query.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
  const matches: ToolSearchMatch[] = [];
  for (const tool of tools) {
    const relevance = scoreTool(words, tool);
    if (relevance > 0) {
      matches.push({ name: tool.id, description: tool.description, workers: [...tool.workerIds], relevance });
    }
  }
  matches.sort((left, right) => right.relevance - left.relevance || compareIds(left.name, right.name));
  return matches.slice(0, limit);
}

/** Percentage of healthy active instances among the ones not deregistered. */
export function computeHealthScore(healthy: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((healthy / total) * 1_000) / 10;
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

const GetWorkerToolsArgsSchema = z
  .object({ instance_id: z.string().trim().min(1).max(200).default("all") })
  .strict();

/** Label used in health reports: failing probes first, then deactivation. */
function workerStatus(worker: WorkerInstance): string {
  if (worker.health === "unhealthy") {
    return "unhealthy";
  }
  return worker.active ? "healthy" : "inactive";
}

export interface HealthReport {
  hub_healthy: true;
  all_workers_healthy: boolean;
  health_score: number;
  healthy_workers: number;
  total_workers: number;
  probed: number;
  skipped: number;
  workers: Array<{
    instance_id: string;
    health: WorkerInstance["health"];
    active: boolean;
    consecutive_failures: number;
    breaker: CircuitBreakerState;
  }>;
  issues: string[];
  checked_at: string;
}

async function collectHealth(context: HubToolContext): Promise<HealthReport> {
  const report = await context.monitor.runProbeCycle();
  const workers = context.catalog.listAll().filter((worker) => worker.deactivationReason !== "deregistered");
  const healthy = workers.filter((worker) => workerStatus(worker) === "healthy");
  const now = context.now ?? (() => Date.now());
  return {
    hub_healthy: true,
    all_workers_healthy: healthy.length === workers.length,
    health_score: computeHealthScore(healthy.length, workers.length),
    healthy_workers: healthy.length,
    total_workers: workers.length,
    probed: report.probed.length,
    skipped: report.skipped.length,
    workers: workers.map((worker) => ({
      instance_id: worker.id,
      health: worker.health,
      active: worker.active,
      consecutive_failures: worker.consecutiveFailures,
      breaker: context.breakers.stateOf(worker.id),
    })),
    issues: workers
      .filter((worker) => workerStatus(worker) !== "healthy")
      .map((worker) => `${worker.id} is ${workerStatus(worker)}`),
    checked_at: new Date(now()).toISOString(),
  };
}

/** Operator hints derived from a health report. */
export function buildRecommendations(health: HealthReport): string[] {
  const recommendations = health.issues.map((issue) => `Check ${issue}`);
  for (const worker of health.workers) {
    if (worker.breaker !== "closed") {
      recommendations.push(`Circuit ${worker.breaker} for ${worker.instance_id}`);
    }
  }
  if (health.total_workers === 0) {
    recommendations.push("No workers registered");
  } else if (health.health_score < 100) {
    recommendations.push("Some workers are offline; check their endpoints");
  }
  if (recommendations.length === 0) {
    recommendations.push("All workers operational");
  }
  return recommendations;
}

export const HUB_TOOLS: readonly HubTool[] = [
  defineHubTool({
    name: "hub_status",
    description: "Reports gateway identity, worker counts, discoverable tools and execution statistics.",
    inputSchema: EMPTY_OBJECT_SCHEMA,
    args: z.object({}).strict(),
    run: (_args, context) => {
      const workers = context.catalog.listAll();
      return {
        gateway: context.serverInfo,
        workers: {
          total: workers.length,
          active: workers.filter((worker) => worker.active).length,
          healthy: workers.filter((worker) => worker.active && worker.health === "healthy").length,
        },
        tools: context.catalog.listTools().length,
        running_executions: context.router.runningExecutions,
        max_concurrent_executions: context.router.maxConcurrent,
        monitor_running: context.monitor.running,
        ledger: context.ledger.summary(),
      };
    },
  }),
  defineHubTool({
    name: "hub_list_workers",
    description: "Lists registered worker instances with their health, load and circuit breaker state.",
    inputSchema: {
      type: "object",
      properties: { include_inactive: { type: "boolean", default: true } },
      additionalProperties: false,
    },
    args: ListWorkersArgsSchema,
    run: (args, context) => {
      const workers = context.catalog
        .listAll()
        .filter((worker) => args.include_inactive || worker.active)
        .map((worker) => ({
          instance_id: worker.id,
          name: worker.name,
          address: worker.address,
          weight: worker.weight,
          current_load: worker.currentLoad,
          health: worker.health,
          active: worker.active,
          consecutive_failures: worker.consecutiveFailures,
          last_seen_at: toIso(worker.lastSeenAt),
          deactivation_reason: worker.deactivationReason,
          breaker: context.breakers.stateOf(worker.id),
          tools: worker.tools.map((tool) => tool.id),
        }));
      return { total: workers.length, workers };
    },
  }),
  defineHubTool({
    name: "hub_search_tools",
    description: "Searches the tools offered by the registered workers by keyword.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", minLength: 1 },
        limit: { type: "integer", minimum: 1, maximum: 100, default: DEFAULT_SEARCH_LIMIT },
      },
      required: ["query"],
      additionalProperties: false,
    },
    args: SearchToolsArgsSchema,
    run: (args, context) => {
      const tools = context.catalog.listTools();
      const matches = searchTools(tools, args.query, Number.MAX_SAFE_INTEGER);
      const workersSearched = new Set<string>();
      for (const tool of tools) {
        for (const workerId of tool.workerIds) {
          workersSearched.add(workerId);
        }
      }
      return {
        query: args.query.toLowerCase(),
        total_matches: matches.length,
        matching_tools: matches.slice(0, args.limit),
        workers_searched: [...workersSearched].sort(compareIds),
      };
    },
  }),
  defineHubTool({
    name: "hub_health_check",
    description: "Probes every active worker now and returns the resulting health score and issues.",
    inputSchema: EMPTY_OBJECT_SCHEMA,
    args: z.object({}).strict(),
    run: (_args, context) => collectHealth(context),
  }),
  defineHubTool({
    name: "hub_get_worker_tools",
    description: "Lists the tools of one worker instance, or of every instance when none is named.",
    inputSchema: {
      type: "object",
      properties: { instance_id: { type: "string", default: "all" } },
      additionalProperties: false,
    },
    args: GetWorkerToolsArgsSchema,
    run: (args, context) => {
      const known = context.catalog.listAll().filter((worker) => worker.deactivationReason !== "deregistered");
      const selected = args.instance_id === "all" ? known : known.filter((worker) => worker.id === args.instance_id);
      const toolsByWorker: Record<string, unknown> = {};
      let totalTools = 0;
      for (const worker of selected) {
        totalTools += worker.tools.length;
        toolsByWorker[worker.id] = {
          instance_id: worker.id,
          address: worker.address,
          status: worker.active && worker.health === "healthy" ? "available" : "unavailable",
          tool_count: worker.tools.length,
          tools: worker.tools.map((tool) => ({ name: tool.id, description: tool.description })),
        };
      }
      const now = context.now ?? (() => Date.now());
      return {
        workers_queried: selected.length,
        total_tools: totalTools,
        tools_by_worker: toolsByWorker,
        timestamp: new Date(now()).toISOString(),
      };
    },
  }),
  defineHubTool({
    name: "hub_unified_dashboard",
    description: "Combines gateway status, a fresh health check and operator recommendations.",
    inputSchema: EMPTY_OBJECT_SCHEMA,
    args: z.object({}).strict(),
    run: async (_args, context) => {
      const health = await collectHealth(context);
      const byId = new Map<string, HealthReport["workers"][number]>(
        health.workers.map((worker) => [worker.instance_id, worker]),
      );
      const workers = context.catalog
        .listAll()
        .filter((worker) => byId.has(worker.id))
        .map((worker) => ({
          instance_id: worker.id,
          name: worker.name,
          status: workerStatus(worker),
          breaker: byId.get(worker.id)?.breaker ?? "closed",
          tool_count: worker.tools.length,
          current_load: worker.currentLoad,
        }));
      return {
        generated_at: health.checked_at,
        system_health: {
          hub_status: "operational",
          overall_health_score: health.health_score,
          all_workers_healthy: health.all_workers_healthy,
        },
        workers,
        quick_stats: {
          worker_tools: context.catalog.listTools().length,
          total_workers: health.total_workers,
          healthy_workers: health.healthy_workers,
          hub_tools: HUB_TOOLS.length,
          running_executions: context.router.runningExecutions,
        },
        executions: context.ledger.summary(),
        recommendations: buildRecommendations(health),
        gateway: context.serverInfo,
      };
    },
  }),
];

export function findHubTool(name: string): HubTool | undefined {
  return HUB_TOOLS.find((tool) => tool.name === name);
}
