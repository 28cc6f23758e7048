import type { Logger, Route, RouteHandler, RouteRequest, RouteResponse, Subject } from "@wardline/schemas";
import { QUARANTINE_REASONS, badRequest, isRecord, parseSubject, parseSubjectKey, sendError } from "@wardline/schemas";
import type { QuarantineReason } from "@wardline/schemas";
import type { QuarantineMachine, QuarantineOutcome } from "./quarantine-machine.js";

function isReason(value: unknown): value is QuarantineReason {
  return typeof value === "string" && (QUARANTINE_REASONS as readonly string[]).includes(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function outcomeBody(outcome: QuarantineOutcome): Record<string, unknown> {
  return {
    entry: outcome.entry,
    created: outcome.created,
    snapshot_id: outcome.snapshot?.id ?? null,
    failures: outcome.failures.map((f) => ({ step: f.step, message: f.message })),
  };
}

export function createQuarantineRoutes(machine: QuarantineMachine, logger?: Logger): Route[] {
  /** Resolves :subject ("user:42") or answers 400. */
  const subjectParam = (req: RouteRequest, res: RouteResponse): Subject | null => {
    try {
      return parseSubjectKey(req.params.subject ?? "");
    } catch (err) {
      sendError(res, err, logger);
      return null;
    }
  };

  const active: RouteHandler = async (_req, res) => {
    const entries = machine.active();
    res.json({ entries, total: entries.length });
  };

  const stats: RouteHandler = async (_req, res) => {
    res.json(machine.stats());
  };

  const status: RouteHandler = async (req, res) => {
    const subject = subjectParam(req, res);
    if (!subject) return;
    res.json({ state: machine.status(subject), entry: machine.current(subject) ?? null, history: machine.history(subject) });
  };

  const listEvidence: RouteHandler = async (req, res) => {
    const subject = subjectParam(req, res);
    if (!subject) return;
    const snapshots = machine.evidence(subject);
    res.json({ snapshots, total: snapshots.length });
  };

  const quarantine: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    if (!isReason(b.reason)) { badRequest(res, `reason must be one of: ${QUARANTINE_REASONS.join(", ")}`); return; }
    if (typeof b.confidence !== "number") { badRequest(res, "confidence is required and must be a number"); return; }
    if (typeof b.actor !== "string") { badRequest(res, "actor is required and must be a string"); return; }
    const evidence = b.evidence ?? {};
    if (!isRecord(evidence)) { badRequest(res, "evidence must be an object"); return; }
    try {
      const subject = typeof b.subject === "string" ? parseSubjectKey(b.subject) : parseSubject(b.subject);
      const outcome = await machine.quarantine({
        subject,
        reason: b.reason,
        confidence: b.confidence,
        evidence,
        actor: b.actor,
        signalId: null,
      });
      res.status(outcome.created ? 201 : 200).json(outcomeBody(outcome));
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const review: RouteHandler = async (req, res) => {
    const subject = subjectParam(req, res);
    if (!subject) return;
    const b = req.body;
    if (!isRecord(b) || typeof b.requested_by !== "string") { badRequest(res, "requested_by is required and must be a string"); return; }
    try {
      res.json({ entry: await machine.requestReview(subject, b.requested_by, optionalString(b.reason)) });
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const release: RouteHandler = async (req, res) => {
    const subject = subjectParam(req, res);
    if (!subject) return;
    const b = req.body;
    if (!isRecord(b) || typeof b.reviewer !== "string") { badRequest(res, "reviewer is required and must be a string"); return; }
    try {
      res.json(outcomeBody(await machine.release(subject, b.reviewer, optionalString(b.note))));
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const maintain: RouteHandler = async (req, res) => {
    const subject = subjectParam(req, res);
    if (!subject) return;
    const b = req.body;
    if (!isRecord(b) || typeof b.reviewer !== "string") { badRequest(res, "reviewer is required and must be a string"); return; }
    try {
      res.json({ entry: await machine.maintain(subject, b.reviewer, optionalString(b.note)) });
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  // Literal paths first so ":subject" does not swallow them
  return [
    { method: "GET", path: "/quarantine/active", handler: active },
    { method: "GET", path: "/quarantine/stats", handler: stats },
    { method: "POST", path: "/quarantine", handler: quarantine },
    { method: "GET", path: "/quarantine/:subject", handler: status },
    { method: "GET", path: "/quarantine/:subject/evidence", handler: listEvidence },
    { method: "POST", path: "/quarantine/:subject/review", handler: review },
    { method: "POST", path: "/quarantine/:subject/release", handler: release },
    { method: "POST", path: "/quarantine/:subject/maintain", handler: maintain },
  ];
}
