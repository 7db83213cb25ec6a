import type { Response } from "express";
import { isRulesError } from "@shared/rules/errors";

/**
 * Shared catch-block for the rules routes. Rule violations are the caller's
 * fault and come back as 400/404; anything else is logged and reported as 500.
 */
export function sendRouteError(res: Response, err: unknown, fallback: string) {
  if (isRulesError(err)) {
    const status = err.code === "NotFound" ? 404 : 400;
    return res.status(status).json({ error: err.message, code: err.code, details: err.details });
  }
  console.error(fallback, err);
  const message = err instanceof Error ? err.message : fallback;
  return res.status(500).json({ error: message });
}
