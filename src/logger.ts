import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { hasErrnoCode } from "./nodePrimitives.js";
import { getRequestContext } from "./infra/requestContext.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced wholesale when key redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
  "cookie",
  "set-cookie",
]);

/**
 * Reads `HUB_LOG_REDACT`: a comma separated mix of toggles (`on`, `off`, ...)
 * and literal substrings to scrub from string values. Substrings without a
 * toggle turn redaction on.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  let enabled: boolean | undefined;
  const tokens = new Set<string>();

  for (const directive of (raw ?? "").split(",")) {
    const trimmed = directive.trim();
    if (!trimmed) {
      continue;
    }
    const lowered = trimmed.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lowered)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(lowered)) {
      enabled = true;
    } else {
      tokens.add(trimmed);
    }
  }

  return { enabled: enabled ?? tokens.size > 0, tokens: [...tokens] };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string | number | null;
  method?: string;
  transport?: string;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Size in bytes past which the mirrored file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Files kept on disk, the active one included. */
  readonly maxFileCount?: number;
  /** Literal substrings or patterns scrubbed from every string in the payload. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Key based redaction toggle; `HUB_LOG_REDACT` decides when omitted. */
  readonly redactionEnabled?: boolean;
  /**
   * Stream receiving the JSON lines. The stdio MCP transport owns stdout, so
   * the composition root switches the logger to stderr in that mode.
   */
  readonly stream?: "stdout" | "stderr" | "none";
  readonly onEntry?: (entry: LogEntry) => void;
}

function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/**
 * Appends lines to a file through a sequential queue and rotates it into
 * `<file>.1`, `<file>.2`, ... once the size limit would be crossed.
 */
class RotatingLogFile {
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly path: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {}

  append(line: string): void {
    this.queue = this.queue.then(async () => {
      try {
        if (!this.directoryReady) {
          await mkdir(dirname(this.path), { recursive: true });
          this.directoryReady = true;
        }
        await this.rotateBefore(Buffer.byteLength(line, "utf8"));
        await appendFile(this.path, line, "utf8");
      } catch (error) {
        reportInternalFailure("log_file_write_failed", error);
        this.directoryReady = false;
      }
    });
  }

  drain(): Promise<void> {
    return this.queue;
  }

  private async rotateBefore(pendingBytes: number): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.path)).size;
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }
    if (size + pendingBytes <= this.maxBytes) {
      return;
    }
    try {
      await this.shiftArchives();
    } catch (error) {
      reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  private async shiftArchives(): Promise<void> {
    if (this.maxFiles === 1) {
      await rm(this.path, { force: true });
      return;
    }
    await rm(`${this.path}.${this.maxFiles - 1}`, { force: true });
    for (let generation = this.maxFiles - 1; generation >= 1; generation -= 1) {
      const source = generation === 1 ? this.path : `${this.path}.${generation - 1}`;
      try {
        await rename(source, `${this.path}.${generation}`);
      } catch (error) {
        if (!hasErrnoCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }
}

/**
 * Structured logger emitting one JSON object per line. Entries written while
 * a request is served carry its id, method and transport.
 */
export class StructuredLogger {
  private readonly file?: RotatingLogFile;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly stream: "stdout" | "stderr" | "none";
  private readonly entryListener?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    if (options.logFile) {
      this.file = new RotatingLogFile(
        options.logFile,
        options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE,
        Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT),
      );
    }
    const directives = parseRedactionDirectives(process.env.HUB_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.stream = options.stream ?? "stdout";
    this.entryListener = options.onEntry;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Resolves once every queued file write has landed. */
  async flush(): Promise<void> {
    await this.file?.drain();
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const context = getRequestContext();
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (context?.requestId !== undefined) {
      entry.request_id = context.requestId;
    }
    if (context?.method !== undefined) {
      entry.method = context.method;
    }
    if (context?.transport !== undefined) {
      entry.transport = context.transport;
    }
    if (payload !== undefined) {
      entry.payload = this.sanitise(payload);
    }

    const line = `${JSON.stringify(entry)}\n`;
    if (this.stream !== "none") {
      process[this.stream].write(line);
    }
    this.entryListener?.(structuredClone(entry));
    this.file?.append(line);
  }

  private sanitise(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitise(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] =
          this.redactionEnabled && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.sanitise(entry);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let scrubbed = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        if (pattern.length > 0) {
          scrubbed = scrubbed.split(pattern).join(REDACTION_TOKEN);
        }
      } else {
        scrubbed = scrubbed.replace(pattern, REDACTION_TOKEN);
      }
    }
    return scrubbed;
  }
}
