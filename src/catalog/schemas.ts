import { z, type ZodError } from "zod";

import { ValidationError } from "../rpc/errors.js";
import type { ToolDescriptor, WorkerInstance, WorkerRegistration } from "./types.js";

/** Defaults applied when a registration omits the optional knobs. */
export const DEFAULT_WEIGHT = 100;
export const DEFAULT_TTL_SECONDS = 300;
export const DEFAULT_TOOL_TIMEOUT_SECONDS = 300;
export const DEFAULT_RETRY_ATTEMPTS = 3;

/** Prefix of the gateway's built-in tools; workers may not register under it. */
export const RESERVED_TOOL_PREFIX = "hub_";

const IdentifierSchema = z.string().trim().min(1, "must not be empty").max(200);

const HttpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must use the http or https scheme" });

const JsonSchemaObject = z.record(z.unknown());

export const ToolRegistrationSchema = z
  .object({
    tool_id: IdentifierSchema,
    name: z.string().trim().min(1).max(200).optional(),
    description: z.string().max(4_000).default(""),
    input_schema: JsonSchemaObject.default({ type: "object", properties: {} }),
    output_schema: JsonSchemaObject.nullable().optional(),
    timeout_seconds: z.number().positive().max(86_400).default(DEFAULT_TOOL_TIMEOUT_SECONDS),
    retry_attempts: z.number().int().min(0).max(10).default(DEFAULT_RETRY_ATTEMPTS),
  })
  .strict();

export const RegistrationSchema = z
  .object({
    instance_id: IdentifierSchema,
    name: z.string().trim().min(1).max(200).optional(),
    address: HttpUrlSchema,
    weight: z.number().int().min(1).max(1_000_000).default(DEFAULT_WEIGHT),
    health_check_url: HttpUrlSchema.optional(),
    health_check_interval_seconds: z.number().positive().max(86_400).optional(),
    ttl_seconds: z.number().positive().max(31_536_000).default(DEFAULT_TTL_SECONDS),
    tools: z.array(ToolRegistrationSchema).max(500).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.tools.forEach((tool, index) => {
      if (tool.tool_id.toLowerCase().startsWith(RESERVED_TOOL_PREFIX)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tools", index, "tool_id"],
          message: `tool ids starting with '${RESERVED_TOOL_PREFIX}' are reserved for the gateway`,
        });
      }
      if (seen.has(tool.tool_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tools", index, "tool_id"],
          message: `duplicate tool id '${tool.tool_id}'`,
        });
      }
      seen.add(tool.tool_id);
    });
  });

/** Registration payload as it travels on the wire (snake_case, seconds). */
export type RegistrationPayload = z.input<typeof RegistrationSchema>;

/** Builds the hint naming the first offending field of a zod failure. */
export function describeZodIssues(error: ZodError): string {
  const [first] = error.issues;
  if (!first) {
    return "invalid payload";
  }
  const path = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${path}: ${first.message}`;
}

/** Converts a zod failure into the gateway {@link ValidationError}. */
export function toValidationError(error: ZodError, message = "invalid registration"): ValidationError {
  return new ValidationError(message, { hint: describeZodIssues(error), issues: error.flatten() });
}

function defaultHealthCheckUrl(address: string): string {
  return `${address.replace(/\/+$/, "")}/health`;
}

/**
 * Parses a wire registration into the catalog's normalised form. Durations are
 * converted from seconds to milliseconds.
 */
export function parseRegistration(payload: unknown): WorkerRegistration {
  const parsed = RegistrationSchema.safeParse(payload);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  const data = parsed.data;
  return {
    id: data.instance_id,
    name: data.name ?? data.instance_id,
    address: data.address,
    weight: data.weight,
    healthCheckUrl: data.health_check_url ?? defaultHealthCheckUrl(data.address),
    healthCheckIntervalMs:
      data.health_check_interval_seconds !== undefined ? Math.round(data.health_check_interval_seconds * 1_000) : null,
    ttlMs: Math.round(data.ttl_seconds * 1_000),
    tools: data.tools.map((tool) => ({
      id: tool.tool_id,
      name: tool.name ?? tool.tool_id,
      description: tool.description,
      inputSchema: tool.input_schema,
      outputSchema: tool.output_schema ?? null,
      timeoutMs: Math.round(tool.timeout_seconds * 1_000),
      retryAttempts: tool.retry_attempts,
    })),
  };
}

function serializeTool(tool: Omit<ToolDescriptor, "stats">): z.input<typeof ToolRegistrationSchema> {
  return {
    tool_id: tool.id,
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputSchema,
    ...(tool.outputSchema !== null ? { output_schema: tool.outputSchema } : {}),
    timeout_seconds: tool.timeoutMs / 1_000,
    retry_attempts: tool.retryAttempts,
  };
}

/**
 * Produces the wire shape of a catalog entry so that a worker (or a mirror)
 * can re-register it verbatim.
 */
export function serializeRegistration(entry: WorkerRegistration | WorkerInstance): RegistrationPayload {
  return {
    instance_id: entry.id,
    name: entry.name,
    address: entry.address,
    weight: entry.weight,
    health_check_url: entry.healthCheckUrl,
    ...(entry.healthCheckIntervalMs !== null
      ? { health_check_interval_seconds: entry.healthCheckIntervalMs / 1_000 }
      : {}),
    ttl_seconds: entry.ttlMs / 1_000,
    tools: entry.tools.map((tool) => serializeTool(tool)),
  };
}
