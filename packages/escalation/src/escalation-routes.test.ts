import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { SignalBus } from "@wardline/signal-bus";
import { ManualClock } from "@wardline/schemas";
import type { PlatformClient, Route, RouteRequest } from "@wardline/schemas";
import { EscalationEngine } from "./escalation-engine.js";
import { createEscalationRoutes } from "./escalation-routes.js";
import { createEscalationStores } from "./stores.js";

function makeRes() {
  const sent: { status?: number; data?: unknown } = {};
  return {
    capture: sent,
    json(data: unknown) { sent.data = data; sent.status = sent.status ?? 200; },
    text(data: string) { sent.data = data; sent.status = sent.status ?? 200; },
    status(code: number) {
      sent.status = code;
      return {
        json(data: unknown) { sent.data = data; },
        text(data: string) { sent.data = data; },
      };
    },
  };
}

function makeReq(overrides: Partial<RouteRequest> = {}): RouteRequest {
  return { method: "GET", path: "/", params: {}, query: {}, body: undefined, ...overrides };
}

const noop = async (): Promise<void> => undefined;
const platform: PlatformClient = {
  stripRoles: async () => [],
  assignRole: noop,
  removeRole: noop,
  restoreRoles: noop,
  restrictToChannel: noop,
  lockChannel: noop,
  unlockChannel: noop,
  timeoutMember: noop,
  banMember: noop,
  sendDirectMessage: noop,
  postAlert: noop,
};

describe("escalation routes", () => {
  let dir: string;
  let bus: SignalBus;
  let engine: EscalationEngine;
  let routes: Route[];

  function route(method: Route["method"], path: string): Route {
    const found = routes.find((r) => r.method === method && r.path === path);
    if (!found) throw new Error(`no route ${method} ${path}`);
    return found;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wardline-escalation-routes-"));
    const clock = new ManualClock("2026-03-01T12:00:00.000Z");
    bus = new SignalBus({ clock });
    engine = new EscalationEngine({ bus, platform, clock, ...createEscalationStores(dir) });
    await engine.start();
    routes = createEscalationRoutes(engine);
  });

  afterEach(async () => {
    engine.stop();
    await bus.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("registers every escalation route", () => {
    expect(routes.map((r) => `${r.method} ${r.path}`)).toEqual([
      "GET /escalation/rules",
      "PUT /escalation/rules",
      "DELETE /escalation/rules/:threat_type/:threshold",
      "GET /escalation/history",
      "GET /escalation/on-call",
      "PUT /escalation/on-call",
      "GET /escalation/stats",
    ]);
  });

  it("upserts a rule", async () => {
    const res = makeRes();
    await route("PUT", "/escalation/rules").handler(
      makeReq({ method: "PUT", body: { threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" } }),
      res,
    );
    expect(res.capture).toEqual({
      status: 200,
      data: { threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" },
    });

    const list = makeRes();
    await route("GET", "/escalation/rules").handler(makeReq({ query: { threat_type: "phishing" } }), list);
    expect(list.capture.data).toEqual({
      rules: [{ threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" }],
      total: 1,
    });
  });

  it("rejects a body with missing fields", async () => {
    const res = makeRes();
    await route("PUT", "/escalation/rules").handler(makeReq({ method: "PUT", body: { threat_type: "phishing" } }), res);
    expect(res.capture).toEqual({ status: 400, data: { error: "confidence_threshold is required and must be a number" } });
  });

  it("maps an invalid rule onto 400 with its code", async () => {
    const res = makeRes();
    await route("PUT", "/escalation/rules").handler(
      makeReq({ method: "PUT", body: { threat_type: "phishing", confidence_threshold: 2, level: 4, action: "timeout" } }),
      res,
    );
    expect(res.capture.status).toBe(400);
    expect(res.capture.data).toMatchObject({ code: "VALIDATION_FAILED" });
  });

  it("removes a rule and 404s on a missing one", async () => {
    await engine.setRule("spam", 0.5, 2, "watch");
    const res = makeRes();
    await route("DELETE", "/escalation/rules/:threat_type/:threshold").handler(
      makeReq({ method: "DELETE", params: { threat_type: "spam", threshold: "0.5" } }),
      res,
    );
    expect(res.capture).toEqual({ status: 200, data: { removed: true, threat_type: "spam", confidence_threshold: 0.5 } });

    const again = makeRes();
    await route("DELETE", "/escalation/rules/:threat_type/:threshold").handler(
      makeReq({ method: "DELETE", params: { threat_type: "spam", threshold: "0.5" } }),
      again,
    );
    expect(again.capture).toEqual({ status: 404, data: { error: "No rule for spam at 0.5" } });
  });

  it("sets and clears the on-call responder", async () => {
    const set = makeRes();
    await route("PUT", "/escalation/on-call").handler(makeReq({ method: "PUT", body: { responder: "mod-2" } }), set);
    expect(set.capture.data).toEqual({ on_call: "mod-2", by_level: {} });

    const cleared = makeRes();
    await route("PUT", "/escalation/on-call").handler(makeReq({ method: "PUT", body: { responder: null } }), cleared);
    expect(cleared.capture.data).toEqual({ on_call: null, by_level: {} });

    const bad = makeRes();
    await route("PUT", "/escalation/on-call").handler(makeReq({ method: "PUT", body: { responder: 7 } }), bad);
    expect(bad.capture).toEqual({ status: 400, data: { error: "responder must be a string or null" } });
  });

  it("assigns a responder to one level", async () => {
    const set = makeRes();
    await route("PUT", "/escalation/on-call").handler(makeReq({ method: "PUT", body: { responder: "lead-1", level: 5 } }), set);
    expect(set.capture.data).toEqual({ on_call: null, by_level: { 5: "lead-1" } });

    const roster = makeRes();
    await route("GET", "/escalation/on-call").handler(makeReq(), roster);
    expect(roster.capture.data).toEqual({ on_call: null, by_level: { 5: "lead-1" } });

    const bad = makeRes();
    await route("PUT", "/escalation/on-call").handler(makeReq({ method: "PUT", body: { responder: "lead-1", level: 9 } }), bad);
    expect(bad.capture).toEqual({ status: 400, data: { error: "level must be an integer from 1 to 5" } });
  });

  it("returns history and stats", async () => {
    const spy = vi.spyOn(engine, "history");
    const res = makeRes();
    await route("GET", "/escalation/history").handler(makeReq({ query: { limit: "5" } }), res);
    expect(spy).toHaveBeenCalledWith(5);
    expect(res.capture.data).toEqual({ records: [], total: 0 });

    const stats = makeRes();
    await route("GET", "/escalation/stats").handler(makeReq(), stats);
    expect(stats.capture.data).toMatchObject({ evaluations: 0, rules: 5, on_call: null });
  });
});
