import type { Request } from "express";

/**
 * One bucket per API key when the client sends one, otherwise one per client
 * address. With `trust proxy` set the address comes from `X-Forwarded-For`,
 * which the client controls, so stale keys must be pruned.
 */
export function getRateLimitKey(req: Request): string {
  const apiKey = req.header("x-api-key");
  return apiKey ? `key:${apiKey}` : `ip:${req.ip ?? "unknown"}`;
}
