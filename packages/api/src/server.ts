import express from "express";
import type { Server, IncomingMessage } from "node:http";
import { timingSafeEqual } from "node:crypto";
import type { AuditStore } from "@wardline/journal";
import type { DetectorRegistry, Observation, SignalBus } from "@wardline/signal-bus";
import type { MetricsCollector } from "@wardline/metrics";
import { createMetricsRouter } from "@wardline/metrics";
import type { JournalStream, Logger, Route, RouteRequest, RouteResponse, SignalDraft } from "@wardline/schemas";
import {
  JOURNAL_STREAMS,
  SEVERITIES,
  SIGNAL_TYPES,
  ValidationError,
  errorMessage,
  isRecord,
  parseLimit,
  parseSubject,
  parseSubjectKey,
  sendError,
  silentLogger,
} from "@wardline/schemas";
import type { Severity, SignalType, Subject } from "@wardline/schemas";

const RATE_LIMITER_PRUNE_INTERVAL_MS = 60_000;
const MAX_JOURNAL_PAGE = 500;

// ─── Rate Limiter ──────────────────────────────────────────────────

export class RateLimiter {
  private windows = new Map<string, { count: number; resetAt: number }>();
  private maxRequests: number;
  private windowMs: number;

  constructor(maxRequests = 100, windowMs = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
  }

  check(key: string): { allowed: boolean; remaining: number; resetAt: number } {
    const now = Date.now();
    const entry = this.windows.get(key);
    if (!entry || now >= entry.resetAt) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return { allowed: true, remaining: this.maxRequests - 1, resetAt: now + this.windowMs };
    }
    entry.count++;
    const remaining = Math.max(0, this.maxRequests - entry.count);
    return { allowed: entry.count <= this.maxRequests, remaining, resetAt: entry.resetAt };
  }

  private static readonly MAX_WINDOWS = 100_000;

  /** Drops expired windows; evicts the oldest beyond the hard cap. */
  prune(): void {
    const now = Date.now();
    for (const [key, entry] of this.windows) {
      if (now >= entry.resetAt) this.windows.delete(key);
    }
    if (this.windows.size > RateLimiter.MAX_WINDOWS) {
      let toEvict = this.windows.size - RateLimiter.MAX_WINDOWS;
      for (const key of this.windows.keys()) {
        if (toEvict-- <= 0) break;
        this.windows.delete(key);
      }
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

function getClientIP(req: IncomingMessage, trustedProxies?: string[]): string {
  const directIp = req.socket.remoteAddress ?? "unknown";
  // X-Forwarded-For only counts when the direct peer is a known reverse proxy
  if (trustedProxies && trustedProxies.length > 0 && trustedProxies.includes(directIp)) {
    const forwarded = req.headers["x-forwarded-for"];
    if (typeof forwarded === "string") {
      // Rightmost untrusted hop is the real client
      const ips = forwarded.split(",").map((ip) => ip.trim());
      for (let i = ips.length - 1; i >= 0; i--) {
        const ip = ips[i];
        if (ip !== undefined && !trustedProxies.includes(ip)) return ip;
      }
      return ips[0] ?? directIp;
    }
  }
  return directIp;
}

function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === "string") out[key] = v;
  }
  return out;
}

function isSignalType(value: unknown): value is SignalType {
  return typeof value === "string" && (SIGNAL_TYPES as readonly string[]).includes(value);
}

function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && (SEVERITIES as readonly string[]).includes(value);
}

function isJournalStream(value: unknown): value is JournalStream {
  return typeof value === "string" && (JOURNAL_STREAMS as readonly string[]).includes(value);
}

/** A subject given as "kind:value" or as an object. */
function subjectFrom(value: unknown): Subject {
  return typeof value === "string" ? parseSubjectKey(value) : parseSubject(value);
}

/** Shape check for an ingested signal; the bus validates the rest on publish. */
export function parseSignalDraft(body: unknown): SignalDraft {
  if (!isRecord(body)) throw new ValidationError("Request body must be a JSON object");
  if (!isSignalType(body.type)) throw new ValidationError(`type must be one of: ${SIGNAL_TYPES.join(", ")}`);
  if (!isSeverity(body.severity)) throw new ValidationError(`severity must be one of: ${SEVERITIES.join(", ")}`);
  if (typeof body.confidence !== "number") throw new ValidationError("confidence is required and must be a number");
  const payload = body.payload ?? {};
  if (!isRecord(payload)) throw new ValidationError("payload must be an object");
  if (body.source !== undefined && typeof body.source !== "string") throw new ValidationError("source must be a string");
  if (body.correlation_id !== undefined && typeof body.correlation_id !== "string") {
    throw new ValidationError("correlation_id must be a string");
  }
  return {
    type: body.type,
    subject: subjectFrom(body.subject),
    severity: body.severity,
    confidence: body.confidence,
    payload,
    ...(body.source !== undefined ? { source: body.source } : {}),
    ...(body.correlation_id !== undefined ? { correlation_id: body.correlation_id } : {}),
  };
}

export function parseObservation(body: unknown): Observation {
  if (!isRecord(body)) throw new ValidationError("Request body must be a JSON object");
  if (typeof body.kind !== "string" || body.kind.length === 0) throw new ValidationError("kind is required and must be a string");
  const data = body.data ?? {};
  if (!isRecord(data)) throw new ValidationError("data must be an object");
  return { kind: body.kind, subject: subjectFrom(body.subject), data };
}

export interface ApiServerConfig {
  audit: AuditStore;
  bus: SignalBus;
  /** Enables POST /api/observations. */
  detectors?: DetectorRegistry;
  /** Domain route sets (escalation, quarantine, blacklist) mounted under /api. */
  routes?: Route[];
  metricsCollector?: MetricsCollector;
  apiToken?: string;
  /** Set to true to explicitly allow running without an API token. */
  insecure?: boolean;
  /** IP addresses of trusted reverse proxies; enables X-Forwarded-For parsing. */
  trustedProxies?: string[];
  /** Requests per client per window. Default: 100 */
  rateLimitMax?: number;
  /** Default: 60000 */
  rateLimitWindowMs?: number;
  logger?: Logger;
  version?: string;
}

/** Validate numeric config values at startup to fail fast on misconfigurations. */
function validateApiConfig(config: ApiServerConfig): void {
  const errors: string[] = [];
  if (config.rateLimitMax !== undefined && (!Number.isInteger(config.rateLimitMax) || config.rateLimitMax < 1)) {
    errors.push("rateLimitMax must be a positive integer");
  }
  if (config.rateLimitWindowMs !== undefined && (!Number.isFinite(config.rateLimitWindowMs) || config.rateLimitWindowMs < 1000)) {
    errors.push("rateLimitWindowMs must be >= 1000");
  }
  if (config.trustedProxies) {
    for (const p of config.trustedProxies) {
      if (p.trim().length === 0) {
        errors.push("trustedProxies entries must be non-empty strings");
        break;
      }
    }
  }
  if (errors.length > 0) {
    throw new Error(`Invalid API server configuration:\n  - ${errors.join("\n  - ")}`);
  }
}

export class ApiServer {
  private app: express.Application;
  private audit: AuditStore;
  private bus: SignalBus;
  private detectors?: DetectorRegistry;
  private routes: Route[];
  private metricsCollector?: MetricsCollector;
  private apiToken?: string;
  private trustedProxies?: string[];
  private logger: Logger;
  private version: string;
  private httpServer?: Server;
  private rateLimiter: RateLimiter;
  private rateLimiterPruneInterval?: ReturnType<typeof setInterval>;

  constructor(config: ApiServerConfig) {
    validateApiConfig(config);
    this.audit = config.audit;
    this.bus = config.bus;
    this.detectors = config.detectors;
    this.routes = config.routes ?? [];
    this.metricsCollector = config.metricsCollector;
    this.apiToken = config.apiToken;
    this.trustedProxies = config.trustedProxies;
    this.logger = config.logger ?? silentLogger;
    this.version = config.version ?? "0.1.0";

    if (!this.apiToken) {
      if (config.insecure !== true) {
        throw new Error(
          "API token is required. Set apiToken in config, WARDLINE_API_TOKEN env var, or pass insecure: true (--insecure) to allow unauthenticated access.",
        );
      }
      this.logger.warn("WARNING: Running in insecure mode; all endpoints are unauthenticated.");
    }

    this.app = express();
    this.app.use(express.json({ limit: "1mb" }));
    // Security headers
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("X-Frame-Options", "DENY");
      res.setHeader("X-XSS-Protection", "0");
      res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'; base-uri 'none'; form-action 'none'");
      res.setHeader("Cache-Control", "no-store");
      next();
    });

    this.rateLimiter = new RateLimiter(config.rateLimitMax, config.rateLimitWindowMs);
    this.rateLimiterPruneInterval = setInterval(() => this.rateLimiter.prune(), RATE_LIMITER_PRUNE_INTERVAL_MS);
    this.rateLimiterPruneInterval.unref();

    this.setupRoutes();

    // Malformed JSON and oversized bodies surface here from express.json()
    this.app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) { next(err); return; }
      const status = isRecord(err) && typeof err.status === "number" ? err.status : 500;
      if (status === 413) { res.status(413).json({ error: "Request body too large" }); return; }
      if (status === 400) { res.status(400).json({ error: "Malformed JSON body" }); return; }
      this.logger.error("unhandled request error", { error: errorMessage(err) });
      res.status(500).json({ error: "Internal server error" });
    });
  }

  listen(port: number, host = "127.0.0.1"): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        const addr = server.address();
        const actualPort = typeof addr === "object" && addr ? addr.port : port;
        this.logger.info(`Wardline API listening on http://${host}:${actualPort}`);
        resolve(server);
      });
      server.once("error", reject);
      this.httpServer = server;
    });
  }

  async shutdown(): Promise<void> {
    if (this.rateLimiterPruneInterval) clearInterval(this.rateLimiterPruneInterval);
    if (this.metricsCollector) this.metricsCollector.detach();
    const server = this.httpServer;
    this.httpServer = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  getExpressApp(): express.Application { return this.app; }

  private setupRoutes(): void {
    const router = express.Router();

    // Health check is always unauthenticated
    router.get("/health", async (_req, res) => {
      const journalHealth = await this.audit.checkHealth();
      const bus = this.bus.stats();
      const journalStatus = journalHealth.writable ? "ok" as const : "error" as const;
      const busStatus = bus.closed ? "error" as const : "ok" as const;
      const overallStatus = journalStatus === "error" || busStatus === "error" ? "degraded" : bus.overflow > 0 ? "warning" : "healthy";

      res.json({
        status: overallStatus,
        version: this.version,
        timestamp: new Date().toISOString(),
        checks: {
          journal: { status: journalStatus, detail: journalHealth.writable ? "writable" : "not writable" },
          bus: { status: busStatus, subscribers: bus.subscribers.length, published: bus.published, overflow: bus.overflow },
          detectors: {
            status: this.detectors ? "ok" : "unavailable",
            loaded: this.detectors?.list().length ?? 0,
          },
          metrics: { status: this.metricsCollector ? "ok" : "unavailable" },
        },
      });
    });

    // Bearer token auth middleware, applied to all routes after /health
    if (this.apiToken) {
      const token = this.apiToken;
      router.use((req, res, next) => {
        const auth = req.headers.authorization;
        if (!auth || !auth.startsWith("Bearer ")) {
          this.logger.warn(`AUTH_FAIL: missing/malformed Authorization header from ${getClientIP(req, this.trustedProxies)} ${req.method} ${req.path.replace(/[\r\n]/g, "")}`);
          res.status(401).json({ error: "Unauthorized" });
          return;
        }
        const provided = Buffer.from(auth.slice(7));
        const expected = Buffer.from(token);
        if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
          this.logger.warn(`AUTH_FAIL: invalid token from ${getClientIP(req, this.trustedProxies)} ${req.method} ${req.path.replace(/[\r\n]/g, "")}`);
          res.status(401).json({ error: "Unauthorized" });
          return;
        }
        // Strip the raw token so it cannot leak in error handler logs
        delete req.headers.authorization;
        next();
      });
    }

    // Rate limiting, applied after auth, before business routes
    router.use((req, res, next) => {
      const ip = getClientIP(req, this.trustedProxies);
      const result = this.rateLimiter.check(ip);
      res.setHeader("X-RateLimit-Remaining", String(result.remaining));
      res.setHeader("X-RateLimit-Reset", String(Math.ceil(result.resetAt / 1000)));
      if (!result.allowed) {
        res.status(429).json({ error: "Rate limit exceeded. Try again later." });
        return;
      }
      next();
    });

    const registerRoute = (route: Route, label: string) => {
      const handler = async (req: express.Request, res: express.Response) => {
        try {
          await route.handler(toRouteRequest(req), toRouteResponse(res));
        } catch (err) {
          this.logger.error(`${label} route error`, { path: route.path, error: errorMessage(err) });
          if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
        }
      };
      switch (route.method) {
        case "GET": router.get(route.path, handler); break;
        case "POST": router.post(route.path, handler); break;
        case "PUT": router.put(route.path, handler); break;
        case "DELETE": router.delete(route.path, handler); break;
      }
    };

    // Metrics endpoint (behind auth)
    if (this.metricsCollector) {
      this.metricsCollector.attach(this.audit);
      registerRoute(createMetricsRouter(this.metricsCollector, this.logger), "metrics");
    }

    // ─── Signal Ingestion ─────────────────────────────────────────────

    router.post("/signals", async (req, res) => {
      try {
        const draft = parseSignalDraft(req.body);
        const receipt = await this.bus.publishDraft(draft, draft.source ?? "api");
        res.status(202).json(receipt);
      } catch (err) {
        sendError(toRouteResponse(res), err, this.logger);
      }
    });

    router.get("/signals", async (req, res) => {
      const type = typeof req.query.type === "string" ? req.query.type : undefined;
      if (type !== undefined && !isSignalType(type)) { res.status(400).json({ error: `type must be one of: ${SIGNAL_TYPES.join(", ")}` }); return; }
      const limit = parseLimit(typeof req.query.limit === "string" ? req.query.limit : undefined, 50, MAX_JOURNAL_PAGE);
      const signals = this.bus.recent(type, limit);
      res.json({ signals, total: signals.length });
    });

    router.get("/bus/stats", async (_req, res) => {
      res.json(this.bus.stats());
    });

    router.post("/observations", async (req, res) => {
      if (!this.detectors) { res.status(404).json({ error: "Detectors not configured" }); return; }
      try {
        const result = await this.detectors.observe(parseObservation(req.body));
        res.status(202).json(result);
      } catch (err) {
        sendError(toRouteResponse(res), err, this.logger);
      }
    });

    // ─── Journal ──────────────────────────────────────────────────────

    router.get("/journal/verify", async (_req, res) => {
      try {
        const streams = await this.audit.verify();
        res.json({ valid: streams.every((s) => s.valid), streams });
      } catch (err) {
        sendError(toRouteResponse(res), err, this.logger);
      }
    });

    router.get("/journal/subjects/:subject", async (req, res) => {
      const events = this.audit.readSubject(req.params.subject ?? "");
      res.json({ events, total: events.length });
    });

    router.get("/journal/:stream", async (req, res) => {
      const stream = req.params.stream;
      if (!isJournalStream(stream)) { res.status(400).json({ error: `stream must be one of: ${JOURNAL_STREAMS.join(", ")}` }); return; }
      try {
        const limit = parseLimit(typeof req.query.limit === "string" ? req.query.limit : undefined, 100, MAX_JOURNAL_PAGE);
        const events = await this.audit.readStream(stream, { limit });
        res.json({ events, total: events.length });
      } catch (err) {
        sendError(toRouteResponse(res), err, this.logger);
      }
    });

    // ─── Domain Routes ────────────────────────────────────────────────

    for (const route of this.routes) {
      registerRoute(route, "domain");
    }

    this.app.use("/api", router);
  }
}

function toRouteRequest(req: express.Request): RouteRequest {
  return {
    method: req.method,
    path: req.path,
    params: stringRecord(req.params),
    query: stringRecord(req.query),
    body: req.body,
  };
}

function toRouteResponse(res: express.Response): RouteResponse {
  return {
    json: (data: unknown) => { res.json(data); },
    text: (data: string, contentType?: string) => {
      res.set("Content-Type", contentType ?? "text/plain; charset=utf-8");
      res.end(data);
    },
    status: (code: number) => ({
      json: (data: unknown) => { res.status(code).json(data); },
      text: (data: string, contentType?: string) => {
        res.status(code).set("Content-Type", contentType ?? "text/plain; charset=utf-8").end(data);
      },
    }),
  };
}
