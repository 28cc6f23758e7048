import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { AuditStore } from "@wardline/journal";
import { SignalBus } from "@wardline/signal-bus";
import { DAY_MS, ManualClock, createSignal } from "@wardline/schemas";
import type { BlacklistTier, PlatformClient } from "@wardline/schemas";
import { BlacklistStore } from "./blacklist-store.js";
import { BlacklistEnforcer } from "./enforcement.js";
import type { BlacklistEnforcerConfig } from "./enforcement.js";
import { createBlacklistStores } from "./stores.js";

function fakePlatform() {
  const noop = async (): Promise<void> => undefined;
  return {
    stripRoles: async (): Promise<string[]> => [],
    assignRole: noop,
    removeRole: noop,
    restoreRoles: noop,
    restrictToChannel: noop,
    lockChannel: noop,
    unlockChannel: noop,
    timeoutMember: vi.fn(async (_userId: string, _until: string, _reason: string): Promise<void> => undefined),
    banMember: vi.fn(async (_userId: string, _reason: string): Promise<void> => undefined),
    sendDirectMessage: noop,
    postAlert: noop,
  } satisfies PlatformClient;
}

describe("BlacklistEnforcer", () => {
  let dir: string;
  let clock: ManualClock;
  let audit: AuditStore;
  let bus: SignalBus;
  let blacklist: BlacklistStore;
  let platform: ReturnType<typeof fakePlatform>;
  let enforcer: BlacklistEnforcer;

  function startEnforcer(overrides: Partial<BlacklistEnforcerConfig> = {}): BlacklistEnforcer {
    const e = new BlacklistEnforcer({ blacklist, bus, platform, audit, clock, ...overrides });
    e.start();
    return e;
  }

  function blacklistUser(value: string, tier: BlacklistTier) {
    return blacklist.add({ type: "user", value, tier, durationMs: 7 * DAY_MS, reason: "raid participation", actor: "mod-1" });
  }

  function joinSignal(value: string) {
    return createSignal(
      { type: "MEMBER_JOINED", subject: { kind: "user", value }, severity: "low", confidence: 1, payload: { guild_id: "g-1" } },
      { clock, source: "member-join" },
    );
  }

  async function publishBan(value: string, action = "ban_lockdown"): Promise<void> {
    await bus.publishDraft(
      {
        type: "ESCALATION_REQUIRED",
        subject: { kind: "user", value },
        severity: "critical",
        confidence: 0.97,
        payload: { level: 5, action, origin_signal_id: "sig-origin", threat_type: "raid" },
      },
      "escalation",
    );
    await bus.drain();
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wardline-enforcement-"));
    clock = new ManualClock("2026-03-01T12:00:00.000Z");
    audit = new AuditStore(join(dir, "audit"), { clock });
    await audit.init();
    bus = new SignalBus({ clock });
    const tables = createBlacklistStores(dir);
    blacklist = new BlacklistStore({ entries: tables.entries, exceptions: tables.exceptions, audit, clock, sweepIntervalMs: 0 });
    await blacklist.start();
    platform = fakePlatform();
    enforcer = startEnforcer();
  });

  afterEach(async () => {
    enforcer.stop();
    await bus.close();
    await blacklist.stop();
    await audit.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe("member joins", () => {
    it("bans a joining user on a PERMANENT entry and reports the hit", async () => {
      const entry = await blacklistUser("42", "PERMANENT");
      const signal = joinSignal("42");

      await bus.publish(signal);
      await bus.drain();

      expect(platform.banMember).toHaveBeenCalledWith("42", "Blacklisted: raid participation");
      expect(blacklist.get(entry.id)?.times_triggered).toBe(1);
      const [violation] = bus.recent("POLICY_VIOLATION");
      expect(violation).toMatchObject({
        subject: { kind: "user", value: "42" },
        source: "blacklist-enforcement",
        severity: "high",
        correlation_id: signal.id,
        payload: { policy: "blacklist_enforcement", entry_id: entry.id, tier: "PERMANENT", action: "ban", enforced: true, guild_id: "g-1" },
      });
    });

    it("bans on an APPEAL_ELIGIBLE entry", async () => {
      await blacklistUser("42", "APPEAL_ELIGIBLE");

      const result = await enforcer.enforce(joinSignal("42"));

      expect(result?.action).toBe("ban");
      expect(platform.banMember).toHaveBeenCalledTimes(1);
    });

    it("times a TEMPORARY user out until the entry expires", async () => {
      await blacklistUser("42", "TEMPORARY");

      const result = await enforcer.enforce(joinSignal("42"));

      expect(result).toMatchObject({ action: "timeout", entry: { times_triggered: 1 } });
      expect(platform.timeoutMember).toHaveBeenCalledWith("42", "2026-03-08T12:00:00.000Z", "Blacklisted: raid participation");
      expect(platform.banMember).not.toHaveBeenCalled();
    });

    it("leaves users who are not blacklisted or are allowlisted alone", async () => {
      await blacklistUser("7", "PERMANENT");
      await blacklist.addException("user", "7", "staff account", "owner");

      expect(await enforcer.enforce(joinSignal("42"))).toBeNull();
      expect(await enforcer.enforce(joinSignal("7"))).toBeNull();
      expect(platform.banMember).not.toHaveBeenCalled();
      expect(bus.recent("POLICY_VIOLATION")).toEqual([]);
    });

    it("records a failed ban and still counts the hit", async () => {
      platform.banMember.mockRejectedValue(new Error("missing permissions"));
      const entry = await blacklistUser("42", "PERMANENT");

      const result = await enforcer.enforce(joinSignal("42"));
      await audit.flush();

      expect(result).toMatchObject({ action: "ban", error: "ban_member failed: missing permissions" });
      expect(blacklist.get(entry.id)?.times_triggered).toBe(1);
      const failed = audit.readSubject("user:42").filter((e) => e.type === "blacklist.enforcement_failed");
      expect(failed.map((e) => e.payload)).toEqual([
        { entry_id: entry.id, action: "ban", error: "ban_member failed: missing permissions" },
      ]);
      expect(bus.recent("POLICY_VIOLATION")[0]?.payload).toMatchObject({ enforced: false });
    });
  });

  describe("ban_lockdown escalations", () => {
    it("blacklists the user as APPEAL_ELIGIBLE", async () => {
      await publishBan("42");

      expect(blacklist.lookup("user", "42")).toMatchObject({
        tier: "APPEAL_ELIGIBLE",
        reason: "ban_lockdown escalation (raid)",
        added_by: "escalation",
      });
    });

    it("keeps an existing entry", async () => {
      const entry = await blacklistUser("42", "PERMANENT");

      await publishBan("42");

      expect(blacklist.history("user", "42").map((e) => e.id)).toEqual([entry.id]);
    });

    it("ignores other actions", async () => {
      await publishBan("42", "timeout");

      expect(blacklist.isBlacklisted("user", "42")).toBe(false);
    });

    it("can be switched off", async () => {
      enforcer.stop();
      enforcer = startEnforcer({ autoBlacklistOnBan: false });

      await publishBan("42");

      expect(blacklist.isBlacklisted("user", "42")).toBe(false);
    });
  });
});
