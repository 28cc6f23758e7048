import type { Logger, Route, RouteHandler } from "@wardline/schemas";
import { badRequest, isEscalationLevel, isRecord, parseLimit, sendError } from "@wardline/schemas";
import type { EscalationEngine } from "./escalation-engine.js";

export function createEscalationRoutes(engine: EscalationEngine, logger?: Logger): Route[] {
  const listRules: RouteHandler = async (req, res) => {
    const rules = engine.rules(req.query.threat_type);
    res.json({ rules, total: rules.length });
  };

  const setRule: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b)) { badRequest(res, "Request body must be a JSON object"); return; }
    const { threat_type, confidence_threshold, level, action } = b;
    if (typeof threat_type !== "string") { badRequest(res, "threat_type is required and must be a string"); return; }
    if (typeof confidence_threshold !== "number") { badRequest(res, "confidence_threshold is required and must be a number"); return; }
    if (typeof level !== "number") { badRequest(res, "level is required and must be a number"); return; }
    if (typeof action !== "string") { badRequest(res, "action is required and must be a string"); return; }
    try {
      const rule = await engine.setRule(threat_type, confidence_threshold, level, action);
      res.json(rule);
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const removeRule: RouteHandler = async (req, res) => {
    const threatType = req.params.threat_type;
    const threshold = Number(req.params.threshold);
    if (!threatType || !Number.isFinite(threshold)) { badRequest(res, "threat_type and numeric threshold are required"); return; }
    if (!(await engine.removeRule(threatType, threshold))) {
      res.status(404).json({ error: `No rule for ${threatType} at ${threshold}` });
      return;
    }
    res.json({ removed: true, threat_type: threatType, confidence_threshold: threshold });
  };

  const history: RouteHandler = async (req, res) => {
    const records = engine.history(parseLimit(req.query.limit, 50));
    res.json({ records, total: records.length });
  };

  const getOnCall: RouteHandler = async (_req, res) => {
    res.json(engine.onCallRoster());
  };

  const setOnCall: RouteHandler = async (req, res) => {
    const b = req.body;
    if (!isRecord(b) || !("responder" in b)) { badRequest(res, "responder is required (string or null)"); return; }
    const responder = b.responder;
    if (responder !== null && typeof responder !== "string") { badRequest(res, "responder must be a string or null"); return; }
    const level = b.level;
    if (level !== undefined && !isEscalationLevel(level)) { badRequest(res, "level must be an integer from 1 to 5"); return; }
    engine.setOnCall(responder, level);
    res.json(engine.onCallRoster());
  };

  const stats: RouteHandler = async (_req, res) => {
    res.json(engine.stats());
  };

  return [
    { method: "GET", path: "/escalation/rules", handler: listRules },
    { method: "PUT", path: "/escalation/rules", handler: setRule },
    { method: "DELETE", path: "/escalation/rules/:threat_type/:threshold", handler: removeRule },
    { method: "GET", path: "/escalation/history", handler: history },
    { method: "GET", path: "/escalation/on-call", handler: getOnCall },
    { method: "PUT", path: "/escalation/on-call", handler: setOnCall },
    { method: "GET", path: "/escalation/stats", handler: stats },
  ];
}
