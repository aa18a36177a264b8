import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";

import type { HttpResponseLike } from "../httpServer.js";

/**
 * Security headers applied to every HTTP response served by the gateway.
 */
export function applySecurityHeaders(res: HttpResponseLike): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Cache-Control", "no-store");
}

/**
 * Guarantees that the request/response pair carries a stable correlation id.
 * Identifiers provided by reverse proxies are preserved, otherwise a fresh
 * UUID is minted.
 */
export function ensureRequestId(req: IncomingMessage, res: HttpResponseLike): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}
