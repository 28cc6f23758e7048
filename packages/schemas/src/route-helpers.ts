import { WardlineError } from "./errors.js";
import type { Logger, RouteResponse } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function statusForError(err: unknown): number {
  if (!(err instanceof WardlineError)) return 500;
  switch (err.code) {
    case "VALIDATION_FAILED":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "CONFLICT":
    case "DUPLICATE_ACTIVE_ENTRY":
    case "RATE_LIMITED":
    case "NOT_APPEALABLE":
    case "REMOVAL_NOT_PERMITTED":
    case "INVALID_TRANSITION":
    case "TERMINAL_STATE":
      return 409;
    default:
      return 500;
  }
}

/**
 * Maps a thrown error onto a response. Only known user-facing errors
 * expose their message; everything else is masked.
 */
export function sendError(res: RouteResponse, err: unknown, logger?: Logger): void {
  const status = statusForError(err);
  if (status === 500 || !(err instanceof WardlineError)) {
    logger?.error("route failed", { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: "Internal server error" });
    return;
  }
  res.status(status).json({ error: err.message, code: err.code, ...(err.details ? { details: err.details } : {}) });
}

export function badRequest(res: RouteResponse, error: string): void {
  res.status(400).json({ error });
}

export function parseLimit(raw: string | undefined, fallback: number, max = 1000): number {
  if (raw === undefined) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(n, max);
}
