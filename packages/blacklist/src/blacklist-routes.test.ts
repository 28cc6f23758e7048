import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { DAY_MS, ManualClock } from "@wardline/schemas";
import type { BlacklistEntry, PlatformClient, Route, RouteRequest } from "@wardline/schemas";
import { AppealDesk } from "./appeal-desk.js";
import { BlacklistStore } from "./blacklist-store.js";
import { createBlacklistRoutes } from "./blacklist-routes.js";
import { createBlacklistStores } from "./stores.js";

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

describe("blacklist routes", () => {
  let dir: string;
  let blacklist: BlacklistStore;
  let routes: Route[];

  function route(method: Route["method"], path: string): Route {
    const found = routes.find((r) => r.method === method && r.path === path);
    if (!found) throw new Error(`no route ${method} ${path}`);
    return found;
  }

  async function addEntry(body: Record<string, unknown>) {
    const res = makeRes();
    await route("POST", "/blacklist").handler(makeReq({ method: "POST", body: { reason: "raid", actor: "mod-1", ...body } }), res);
    return res;
  }

  async function addUser(value: string, tier: string): Promise<BlacklistEntry> {
    const res = await addEntry({ type: "user", value, tier });
    const entry = blacklist.lookup("user", value);
    if (res.capture.status !== 201 || !entry) throw new Error(`could not blacklist ${value}`);
    return entry;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wardline-blacklist-routes-"));
    const clock = new ManualClock("2026-03-01T12:00:00.000Z");
    const tables = createBlacklistStores(dir);
    blacklist = new BlacklistStore({ entries: tables.entries, exceptions: tables.exceptions, clock, sweepIntervalMs: 0 });
    await blacklist.start();
    const desk = new AppealDesk({ blacklist, appeals: tables.appeals, platform, clock });
    await desk.start();
    routes = createBlacklistRoutes(blacklist, desk);
  });

  afterEach(async () => {
    await blacklist.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it("adds an entry and answers 201", async () => {
    const res = await addEntry({ type: "domain", value: "Phish.Example", tier: "TEMPORARY", duration_ms: DAY_MS });

    expect(res.capture.status).toBe(201);
    expect(res.capture.data).toMatchObject({
      type: "domain",
      value: "phish.example",
      tier: "TEMPORARY",
      expires_at: "2026-03-02T12:00:00.000Z",
    });
  });

  it("answers 409 for a duplicate active entry", async () => {
    const entry = await addUser("42", "PERMANENT");

    const res = await addEntry({ type: "user", value: "42", tier: "TEMPORARY", duration_ms: DAY_MS });

    expect(res.capture).toEqual({
      status: 409,
      data: {
        error: "user:42 is already blacklisted",
        code: "DUPLICATE_ACTIVE_ENTRY",
        details: { entry_id: entry.id, tier: "PERMANENT" },
      },
    });
  });

  it("validates the add body", async () => {
    const badTier = await addEntry({ type: "user", value: "42", tier: "FOREVER" });
    expect(badTier.capture).toEqual({ status: 400, data: { error: "tier must be one of: TEMPORARY, APPEAL_ELIGIBLE, PERMANENT" } });

    const badType = await addEntry({ type: "planet", value: "mars", tier: "PERMANENT" });
    expect(badType.capture).toEqual({ status: 400, data: { error: "type must be one of: user, guild, ip, domain, email" } });

    const negative = await addEntry({ type: "user", value: "42", tier: "TEMPORARY", duration_ms: -5 });
    expect(negative.capture.status).toBe(400);
    expect(negative.capture.data).toMatchObject({ code: "VALIDATION_FAILED" });
  });

  it("looks up a key", async () => {
    const entry = await addUser("42", "PERMANENT");

    const hit = makeRes();
    await route("GET", "/blacklist/lookup/:type/:value").handler(makeReq({ params: { type: "user", value: "42" } }), hit);
    expect(hit.capture.data).toMatchObject({ blacklisted: true, allowlisted: false, entry: { id: entry.id } });

    const miss = makeRes();
    await route("GET", "/blacklist/lookup/:type/:value").handler(makeReq({ params: { type: "user", value: "7" } }), miss);
    expect(miss.capture.data).toEqual({ blacklisted: false, allowlisted: false, entry: null });
  });

  it("refuses to remove a PERMANENT entry without an override", async () => {
    await addUser("42", "PERMANENT");

    const refused = makeRes();
    await route("DELETE", "/blacklist/:type/:value").handler(
      makeReq({ method: "DELETE", params: { type: "user", value: "42" }, body: { actor: "mod-2" } }),
      refused,
    );
    expect(refused.capture).toMatchObject({ status: 409, data: { code: "REMOVAL_NOT_PERMITTED" } });

    const removed = makeRes();
    await route("DELETE", "/blacklist/:type/:value").handler(
      makeReq({ method: "DELETE", params: { type: "user", value: "42" }, body: { actor: "owner", override: true } }),
      removed,
    );
    expect(removed.capture.data).toMatchObject({ status: "removed", removed_by: "owner" });
  });

  it("lists, filters and searches entries", async () => {
    await addUser("42", "PERMANENT");
    await addEntry({ type: "domain", value: "phish.example", tier: "APPEAL_ELIGIBLE", reason: "phishing kit" });

    const filtered = makeRes();
    await route("GET", "/blacklist").handler(makeReq({ query: { type: "domain" } }), filtered);
    expect(filtered.capture.data).toMatchObject({ total: 1, entries: [{ value: "phish.example" }] });

    const badStatus = makeRes();
    await route("GET", "/blacklist").handler(makeReq({ query: { status: "gone" } }), badStatus);
    expect(badStatus.capture.status).toBe(400);

    const found = makeRes();
    await route("GET", "/blacklist/search").handler(makeReq({ query: { q: "kit" } }), found);
    expect(found.capture.data).toMatchObject({ total: 1 });

    const stats = makeRes();
    await route("GET", "/blacklist/stats").handler(makeReq(), stats);
    expect(stats.capture.data).toMatchObject({ total: 2, active: 2, by_tier: { PERMANENT: 1, APPEAL_ELIGIBLE: 1 } });
  });

  it("manages allowlist exceptions", async () => {
    const added = makeRes();
    await route("POST", "/blacklist/exceptions").handler(
      makeReq({ method: "POST", body: { type: "user", value: "7", reason: "staff", actor: "owner" } }),
      added,
    );
    expect(added.capture.status).toBe(201);

    const listed = makeRes();
    await route("GET", "/blacklist/exceptions").handler(makeReq(), listed);
    expect(listed.capture.data).toMatchObject({ total: 1, exceptions: [{ type: "user", value: "7" }] });

    const removed = makeRes();
    await route("DELETE", "/blacklist/exceptions/:type/:value").handler(
      makeReq({ method: "DELETE", params: { type: "user", value: "7" }, body: { actor: "owner" } }),
      removed,
    );
    expect(removed.capture.data).toEqual({ removed: true, type: "user", value: "7" });
  });

  it("runs an appeal from submission to decision", async () => {
    const entry = await addUser("42", "APPEAL_ELIGIBLE");

    const submitted = makeRes();
    await route("POST", "/appeals").handler(
      makeReq({ method: "POST", body: { entry_id: entry.id, submitter: "42", reason: "wrong account" } }),
      submitted,
    );
    expect(submitted.capture.status).toBe(201);
    expect(submitted.capture.data).toMatchObject({ status: "pending", blacklist_entry_id: entry.id });
    const appealId = blacklistAppealId(submitted.capture.data);

    const decided = makeRes();
    await route("POST", "/appeals/:id/decision").handler(
      makeReq({ method: "POST", params: { id: appealId }, body: { reviewer: "mod-2", decision: "approve" } }),
      decided,
    );
    expect(decided.capture.data).toMatchObject({ status: "approved", decided_by: "mod-2" });

    const again = makeRes();
    await route("POST", "/appeals/:id/decision").handler(
      makeReq({ method: "POST", params: { id: appealId }, body: { reviewer: "mod-3", decision: "deny" } }),
      again,
    );
    expect(again.capture).toMatchObject({ status: 409, data: { code: "TERMINAL_STATE" } });

    const listed = makeRes();
    await route("GET", "/appeals").handler(makeReq({ query: { status: "approved" } }), listed);
    expect(listed.capture.data).toMatchObject({ total: 1 });
  });

  it("rejects an appeal against a PERMANENT entry with 409", async () => {
    const entry = await addUser("42", "PERMANENT");

    const res = makeRes();
    await route("POST", "/appeals").handler(
      makeReq({ method: "POST", body: { entry_id: entry.id, submitter: "42", reason: "please" } }),
      res,
    );

    expect(res.capture).toEqual({
      status: 409,
      data: { error: "PERMANENT entries are not appealable", code: "NOT_APPEALABLE", details: { tier: "PERMANENT" } },
    });
  });

  it("answers 404 for unknown appeals and entries", async () => {
    const appeal = makeRes();
    await route("GET", "/appeals/:id").handler(makeReq({ params: { id: "nope" } }), appeal);
    expect(appeal.capture).toEqual({ status: 404, data: { error: "Appeal not found: nope" } });

    const entry = makeRes();
    await route("GET", "/blacklist/entries/:id").handler(makeReq({ params: { id: "nope" } }), entry);
    expect(entry.capture).toEqual({ status: 404, data: { error: "Blacklist entry not found: nope" } });
  });
});

function blacklistAppealId(data: unknown): string {
  if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "string") return data.id;
  throw new Error("response carries no appeal id");
}
