import type {
  AppealStatus,
  BlacklistStatus,
  BlacklistTier,
  BlacklistType,
  Logger,
  Route,
  RouteHandler,
  RouteRequest,
  RouteResponse,
} from "@wardline/schemas";
import { BLACKLIST_TIERS, BLACKLIST_TYPES, badRequest, isRecord, parseLimit, sendError } from "@wardline/schemas";
import type { AppealDesk } from "./appeal-desk.js";
import type { BlacklistStore } from "./blacklist-store.js";

const ENTRY_STATUSES: readonly BlacklistStatus[] = ["active", "expired", "removed"];
const APPEAL_STATUSES: readonly AppealStatus[] = ["pending", "approved", "denied"];

function isType(value: unknown): value is BlacklistType {
  return typeof value === "string" && (BLACKLIST_TYPES as readonly string[]).includes(value);
}

function isTier(value: unknown): value is BlacklistTier {
  return typeof value === "string" && (BLACKLIST_TIERS as readonly string[]).includes(value);
}

function isEntryStatus(value: unknown): value is BlacklistStatus {
  return typeof value === "string" && (ENTRY_STATUSES as readonly string[]).includes(value);
}

function isAppealStatus(value: unknown): value is AppealStatus {
  return typeof value === "string" && (APPEAL_STATUSES as readonly string[]).includes(value);
}

export function createBlacklistRoutes(blacklist: BlacklistStore, appeals: AppealDesk, logger?: Logger): Route[] {
  /** Resolves :type/:value or answers 400. */
  const keyParams = (req: RouteRequest, res: RouteResponse): { type: BlacklistType; value: string } | null => {
    const { type, value } = req.params;
    if (!isType(type)) { badRequest(res, `type must be one of: ${BLACKLIST_TYPES.join(", ")}`); return null; }
    if (!value) { badRequest(res, "value is required"); return null; }
    return { type, value };
  };

  const list: RouteHandler = async (req, res) => {
    const { status, type, tier, limit } = req.query;
    if (status !== undefined && !isEntryStatus(status)) { badRequest(res, `status must be one of: ${ENTRY_STATUSES.join(", ")}`); return; }
    if (type !== undefined && !isType(type)) { badRequest(res, `type must be one of: ${BLACKLIST_TYPES.join(", ")}`); return; }
    if (tier !== undefined && !isTier(tier)) { badRequest(res, `tier must be one of: ${BLACKLIST_TIERS.join(", ")}`); return; }
    const entries = blacklist.list({ status, type, tier, limit: parseLimit(limit, 100) });
    res.json({ entries, total: entries.length });
  };

  const stats: RouteHandler = async (_req, res) => {
    res.json(blacklist.stats());
  };

  const search: RouteHandler = async (req, res) => {
    const q = req.query.q;
    if (!q) { badRequest(res, "q is required"); return; }
    const entries = blacklist.search(q, parseLimit(req.query.limit, 50));
    res.json({ entries, total: entries.length });
  };

  const lookup: RouteHandler = async (req, res) => {
    const key = keyParams(req, res);
    if (!key) return;
    const entry = blacklist.lookup(key.type, key.value);
    res.json({ blacklisted: entry !== null, allowlisted: blacklist.isAllowlisted(key.type, key.value), entry });
  };

  const history: RouteHandler = async (req, res) => {
    const key = keyParams(req, res);
    if (!key) return;
    const entries = blacklist.history(key.type, key.value);
    res.json({ entries, total: entries.length });
  };

  const getEntry: RouteHandler = async (req, res) => {
    const entry = blacklist.get(req.params.id ?? "");
    if (!entry) { res.status(404).json({ error: `Blacklist entry not found: ${req.params.id ?? ""}` }); return; }
    res.json(entry);
  };

  const add: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    if (!isType(b.type)) { badRequest(res, `type must be one of: ${BLACKLIST_TYPES.join(", ")}`); return; }
    if (typeof b.value !== "string") { badRequest(res, "value is required and must be a string"); return; }
    if (!isTier(b.tier)) { badRequest(res, `tier must be one of: ${BLACKLIST_TIERS.join(", ")}`); return; }
    if (typeof b.reason !== "string") { badRequest(res, "reason is required and must be a string"); return; }
    if (typeof b.actor !== "string") { badRequest(res, "actor is required and must be a string"); return; }
    const duration = b.duration_ms ?? 0;
    if (typeof duration !== "number") { badRequest(res, "duration_ms must be a number"); return; }
    try {
      const entry = await blacklist.add({ type: b.type, value: b.value, tier: b.tier, durationMs: duration, reason: b.reason, actor: b.actor });
      res.status(201).json(entry);
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const remove: RouteHandler = async (req, res) => {
    const key = keyParams(req, res);
    if (!key) return;
    const b = req.body;
    if (!isRecord(b) || typeof b.actor !== "string") { badRequest(res, "actor is required and must be a string"); return; }
    if (b.override !== undefined && typeof b.override !== "boolean") { badRequest(res, "override must be a boolean"); return; }
    try {
      const entry = await blacklist.remove(key.type, key.value, b.actor, {
        ...(b.override !== undefined ? { override: b.override } : {}),
        ...(typeof b.reason === "string" ? { reason: b.reason } : {}),
      });
      res.json(entry);
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const listExceptions: RouteHandler = async (_req, res) => {
    const exceptions = blacklist.exceptions();
    res.json({ exceptions, total: exceptions.length });
  };

  const addException: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    if (!isType(b.type)) { badRequest(res, `type must be one of: ${BLACKLIST_TYPES.join(", ")}`); return; }
    if (typeof b.value !== "string") { badRequest(res, "value is required and must be a string"); return; }
    if (typeof b.reason !== "string") { badRequest(res, "reason is required and must be a string"); return; }
    if (typeof b.actor !== "string") { badRequest(res, "actor is required and must be a string"); return; }
    try {
      res.status(201).json(await blacklist.addException(b.type, b.value, b.reason, b.actor));
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const removeException: RouteHandler = async (req, res) => {
    const key = keyParams(req, res);
    if (!key) return;
    const actor = isRecord(req.body) && typeof req.body.actor === "string" ? req.body.actor : undefined;
    if (actor === undefined) { badRequest(res, "actor is required and must be a string"); return; }
    try {
      await blacklist.removeException(key.type, key.value, actor);
      res.json({ removed: true, type: key.type, value: key.value });
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const listAppeals: RouteHandler = async (req, res) => {
    const { status, submitter, entry_id } = req.query;
    if (status !== undefined && !isAppealStatus(status)) { badRequest(res, `status must be one of: ${APPEAL_STATUSES.join(", ")}`); return; }
    const found = appeals.list({ status, submitter, entryId: entry_id });
    res.json({ appeals: found, total: found.length });
  };

  const getAppeal: RouteHandler = async (req, res) => {
    const appeal = appeals.get(req.params.id ?? "");
    if (!appeal) { res.status(404).json({ error: `Appeal not found: ${req.params.id ?? ""}` }); return; }
    res.json(appeal);
  };

  const submitAppeal: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    if (typeof b.entry_id !== "string") { badRequest(res, "entry_id is required and must be a string"); return; }
    if (typeof b.submitter !== "string") { badRequest(res, "submitter is required and must be a string"); return; }
    if (typeof b.reason !== "string") { badRequest(res, "reason is required and must be a string"); return; }
    try {
      res.status(201).json(await appeals.submitAppeal(b.entry_id, b.submitter, b.reason));
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const decideAppeal: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    if (typeof b.reviewer !== "string") { badRequest(res, "reviewer is required and must be a string"); return; }
    if (b.decision !== "approve" && b.decision !== "deny") { badRequest(res, 'decision must be "approve" or "deny"'); return; }
    try {
      const appeal = await appeals.decideAppeal(req.params.id ?? "", b.reviewer, b.decision, typeof b.note === "string" ? b.note : undefined);
      res.json(appeal);
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  return [
    { method: "GET", path: "/blacklist", handler: list },
    { method: "GET", path: "/blacklist/stats", handler: stats },
    { method: "GET", path: "/blacklist/search", handler: search },
    { method: "GET", path: "/blacklist/exceptions", handler: listExceptions },
    { method: "POST", path: "/blacklist/exceptions", handler: addException },
    { method: "DELETE", path: "/blacklist/exceptions/:type/:value", handler: removeException },
    { method: "GET", path: "/blacklist/entries/:id", handler: getEntry },
    { method: "GET", path: "/blacklist/lookup/:type/:value", handler: lookup },
    { method: "GET", path: "/blacklist/history/:type/:value", handler: history },
    { method: "POST", path: "/blacklist", handler: add },
    { method: "DELETE", path: "/blacklist/:type/:value", handler: remove },
    { method: "GET", path: "/appeals", handler: listAppeals },
    { method: "POST", path: "/appeals", handler: submitAppeal },
    { method: "GET", path: "/appeals/:id", handler: getAppeal },
    { method: "POST", path: "/appeals/:id/decision", handler: decideAppeal },
  ];
}
