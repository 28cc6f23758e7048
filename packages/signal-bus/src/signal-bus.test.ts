import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm } from "node:fs/promises";
import { AuditStore } from "@wardline/journal";
import { ConflictError, ManualClock, ValidationError, createSignal } from "@wardline/schemas";
import type { OverflowError, Signal, SignalDraft } from "@wardline/schemas";
import { SignalBus } from "./signal-bus.js";

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

function threat(overrides: Partial<SignalDraft> = {}): Signal {
  return createSignal({
    type: "THREAT_DETECTED",
    subject: { kind: "user", value: "42" },
    severity: "high",
    confidence: 0.9,
    payload: { threat_type: "phishing" },
    source: "test-detector",
    ...overrides,
  });
}

function gate() {
  let open!: () => void;
  const opened = new Promise<void>((r) => { open = r; });
  return { opened, open };
}

describe("SignalBus", () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock("2026-03-01T12:00:00.000Z");
  });

  it("delivers to subscribers of the type and to wildcard subscribers only", async () => {
    const bus = new SignalBus({ clock });
    const threats: string[] = [];
    const all: string[] = [];
    const joins: string[] = [];
    bus.subscribe("THREAT_DETECTED", (s) => { threats.push(s.id); });
    bus.subscribe("*", (s) => { all.push(s.id); });
    bus.subscribe("MEMBER_JOINED", (s) => { joins.push(s.id); });

    const signal = threat();
    const receipt = await bus.publish(signal);
    await bus.drain();

    expect(receipt).toEqual({ signal_id: signal.id, delivered_to: 2, suppressed: false });
    expect(threats).toEqual([signal.id]);
    expect(all).toEqual([signal.id]);
    expect(joins).toEqual([]);
  });

  it("drains signals published by handlers until every handler has finished", async () => {
    const bus = new SignalBus({ clock });
    const handled: string[] = [];
    bus.subscribe("THREAT_DETECTED", async (s) => {
      await bus.publish(createSignal({
        type: "POLICY_VIOLATION",
        subject: s.subject,
        severity: "medium",
        confidence: 1,
        payload: { policy: "derived" },
        source: "relay",
      }));
    });
    bus.subscribe("POLICY_VIOLATION", async (s) => {
      await new Promise<void>((r) => setTimeout(r, 20));
      handled.push(s.type);
    });

    await bus.publish(threat());
    await bus.drain();

    expect(handled).toEqual(["POLICY_VIOLATION"]);
  });

  it("never runs handlers inside publish", () => {
    const bus = new SignalBus({ clock });
    let called = false;
    bus.subscribe("THREAT_DETECTED", () => { called = true; });
    void bus.publish(threat());
    expect(called).toBe(false);
  });

  it("delivers to each subscriber in publish order", async () => {
    const bus = new SignalBus({ clock });
    const fast: number[] = [];
    const slow: number[] = [];
    bus.subscribe("THREAT_DETECTED", (s) => { fast.push(Number(s.payload["n"])); });
    bus.subscribe("THREAT_DETECTED", async (s) => {
      await new Promise((r) => setTimeout(r, Number(s.payload["n"]) % 3));
      slow.push(Number(s.payload["n"]));
    });

    for (let n = 0; n < 30; n++) {
      void bus.publish(threat({ payload: { threat_type: "spam", n } }));
    }
    await bus.drain();

    const expected = Array.from({ length: 30 }, (_, n) => n);
    expect(fast).toEqual(expected);
    expect(slow).toEqual(expected);
  });

  it("rejects malformed signals synchronously", () => {
    const bus = new SignalBus({ clock });
    const received: Signal[] = [];
    bus.subscribe("*", (s) => { received.push(s); });
    const bad = { ...threat(), confidence: 1.2 };
    expect(() => bus.publish(bad)).toThrow(ValidationError);
    expect(() => bus.publish(threat({ payload: {} }))).toThrow("/payload: must have required property 'threat_type'");
    expect(bus.stats().published).toBe(0);
  });

  it("freezes signals handed to subscribers", async () => {
    const bus = new SignalBus({ clock });
    let seen: Signal | undefined;
    bus.subscribe("THREAT_DETECTED", (s) => { seen = s; });
    const loose: Signal = { ...threat(), payload: { threat_type: "spam" } };
    await bus.publish(loose);
    await bus.drain();
    expect(Object.isFrozen(seen)).toBe(true);
    expect(Object.isFrozen(seen?.payload)).toBe(true);
    expect(Object.isFrozen(loose)).toBe(false);
  });

  it("publishDraft stamps the source", async () => {
    const bus = new SignalBus({ clock });
    let seen: Signal | undefined;
    bus.subscribe("MEMBER_JOINED", (s) => { seen = s; });
    await bus.publishDraft(
      { type: "MEMBER_JOINED", subject: { kind: "user", value: "7" }, severity: "low", confidence: 1, payload: { guild_id: "g1" } },
      "member-join",
    );
    await bus.drain();
    expect(seen?.source).toBe("member-join");
    expect(seen?.created_at).toBe("2026-03-01T12:00:00.000Z");
  });

  describe("failure isolation", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "wardline-bus-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("keeps delivering after a handler throws and journals the failure", async () => {
      const audit = new AuditStore(dir, { fsync: false, lock: false, clock });
      await audit.init();
      const bus = new SignalBus({ clock, audit });
      const healthy: number[] = [];
      const flaky: number[] = [];
      bus.subscribe("THREAT_DETECTED", (s) => { healthy.push(Number(s.payload["n"])); }, { name: "healthy" });
      bus.subscribe(
        "THREAT_DETECTED",
        (s) => {
          if (s.payload["n"] === 1) throw new Error("handler exploded");
          flaky.push(Number(s.payload["n"]));
        },
        { name: "flaky" },
      );

      for (let n = 0; n < 3; n++) await bus.publish(threat({ payload: { threat_type: "spam", n } }));
      await bus.drain();

      expect(healthy).toEqual([0, 1, 2]);
      expect(flaky).toEqual([0, 2]);
      const stats = bus.stats();
      expect(stats.failed).toBe(1);
      expect(stats.delivered).toBe(5);

      const events = await audit.readStream("bus");
      expect(events.map((e) => e.type)).toEqual(["bus.subscriber_failed"]);
      expect(events[0]?.subject).toBe("user:42");
      expect(events[0]?.payload).toMatchObject({ subscriber: "flaky", signal_type: "THREAT_DETECTED", error: "handler exploded" });
    });
  });

  describe("overflow", () => {
    it("drop-oldest evicts the oldest queued signal and reports it", async () => {
      const bus = new SignalBus({ clock, inboxCapacity: 2, overflowPolicy: "drop-oldest" });
      const hold = gate();
      const received: string[] = [];
      bus.subscribe("THREAT_DETECTED", async (s) => {
        await hold.opened;
        received.push(s.id);
      }, { name: "slow" });
      const errors: OverflowError[] = [];
      bus.onOverflow((err) => errors.push(err));

      const s1 = threat();
      const s2 = threat();
      const s3 = threat();
      const s4 = threat();
      await bus.publish(s1);
      await tick(); // s1 is now being handled
      await bus.publish(s2);
      await bus.publish(s3);
      await bus.publish(s4);

      expect(errors).toHaveLength(1);
      expect(errors[0]?.signalId).toBe(s2.id);
      expect(errors[0]?.subscriber).toBe("slow");
      expect(errors[0]?.code).toBe("INBOX_OVERFLOW");

      hold.open();
      await bus.drain();
      expect(received).toEqual([s1.id, s3.id, s4.id]);
      expect(bus.stats().overflow).toBe(1);
      expect(bus.stats().subscribers[0]?.dropped).toBe(1);
    });

    it("block makes the publisher wait for space", async () => {
      const bus = new SignalBus({ clock, inboxCapacity: 1, overflowPolicy: "block" });
      const hold = gate();
      const received: string[] = [];
      bus.subscribe("THREAT_DETECTED", async (s) => {
        await hold.opened;
        received.push(s.id);
      });

      const s1 = threat();
      const s2 = threat();
      const s3 = threat();
      await bus.publish(s1);
      await tick();
      await bus.publish(s2);
      let admitted = false;
      const third = bus.publish(s3).then((receipt) => {
        admitted = true;
        return receipt;
      });
      await tick();
      expect(admitted).toBe(false);
      expect(bus.stats().subscribers[0]?.blocked).toBe(1);

      hold.open();
      expect(await third).toEqual({ signal_id: s3.id, delivered_to: 1, suppressed: false });
      await bus.drain();
      expect(received).toEqual([s1.id, s2.id, s3.id]);
      expect(bus.stats().overflow).toBe(0);
    });

    it("honours a per-subscriber policy override", async () => {
      const bus = new SignalBus({ clock, inboxCapacity: 1, overflowPolicy: "block" });
      const hold = gate();
      bus.subscribe("THREAT_DETECTED", async () => { await hold.opened; }, { policy: "drop-oldest" });
      await bus.publish(threat());
      await tick();
      await bus.publish(threat());
      await bus.publish(threat());
      expect(bus.stats().overflow).toBe(1);
      hold.open();
      await bus.drain();
    });
  });

  describe("deduplication", () => {
    it("suppresses a repeated dedup_key inside the window", async () => {
      const bus = new SignalBus({ clock, dedupWindowMs: 300_000 });
      const received: string[] = [];
      bus.subscribe("THREAT_DETECTED", (s) => { received.push(s.id); });

      const first = threat({ payload: { threat_type: "raid", dedup_key: "raid:g1" } });
      const second = threat({ payload: { threat_type: "raid", dedup_key: "raid:g1" } });
      await bus.publish(first);
      expect(await bus.publish(second)).toEqual({ signal_id: second.id, delivered_to: 0, suppressed: true });

      clock.advance(300_000);
      const third = threat({ payload: { threat_type: "raid", dedup_key: "raid:g1" } });
      expect((await bus.publish(third)).suppressed).toBe(false);
      await bus.drain();

      expect(received).toEqual([first.id, third.id]);
      expect(bus.stats().suppressed).toBe(1);
    });

    it("scopes keys by signal type and can be disabled", async () => {
      const bus = new SignalBus({ clock, dedupWindowMs: 0 });
      await bus.publish(threat({ payload: { threat_type: "raid", dedup_key: "k" } }));
      expect((await bus.publish(threat({ payload: { threat_type: "raid", dedup_key: "k" } }))).suppressed).toBe(false);

      const scoped = new SignalBus({ clock });
      await scoped.publish(threat({ payload: { threat_type: "raid", dedup_key: "k" } }));
      const violation = createSignal({
        type: "POLICY_VIOLATION",
        subject: { kind: "user", value: "42" },
        severity: "medium",
        confidence: 1,
        payload: { policy: "blacklist", dedup_key: "k" },
      });
      expect((await scoped.publish(violation)).suppressed).toBe(false);
    });
  });

  describe("close", () => {
    it("reports undelivered signals and refuses new ones", async () => {
      const bus = new SignalBus({ clock });
      const hold = gate();
      const received: string[] = [];
      bus.subscribe("THREAT_DETECTED", async (s) => {
        await hold.opened;
        received.push(s.id);
      });
      const s1 = threat();
      await bus.publish(s1);
      await tick();
      await bus.publish(threat());
      await bus.publish(threat());

      const closing = bus.close();
      hold.open();
      expect(await closing).toBe(2);
      expect(received).toEqual([s1.id]);
      expect(bus.isClosed).toBe(true);
      expect(() => bus.publish(threat())).toThrow(ConflictError);
      expect(await bus.close()).toBe(0);
    });
  });

  it("stops delivering after unsubscribe", async () => {
    const bus = new SignalBus({ clock });
    const received: string[] = [];
    const off = bus.subscribe("THREAT_DETECTED", (s) => { received.push(s.id); });
    const first = threat();
    await bus.publish(first);
    await bus.drain();
    off();
    const receipt = await bus.publish(threat());
    await bus.drain();
    expect(received).toEqual([first.id]);
    expect(receipt.delivered_to).toBe(0);
    expect(bus.stats().delivered).toBe(1);
  });

  it("keeps a bounded, most-recent-first history with counters", async () => {
    const bus = new SignalBus({ clock, historySize: 2 });
    const a = threat();
    const b = threat({ severity: "critical" });
    const c = createSignal({
      type: "MEMBER_JOINED",
      subject: { kind: "user", value: "7" },
      severity: "low",
      confidence: 1,
      payload: { guild_id: "g1" },
    });
    await bus.publish(a);
    await bus.publish(b);
    await bus.publish(c);

    expect(bus.recent().map((s) => s.id)).toEqual([c.id, b.id]);
    expect(bus.recent("THREAT_DETECTED").map((s) => s.id)).toEqual([b.id]);
    expect(bus.recent(undefined, 1).map((s) => s.id)).toEqual([c.id]);
    const stats = bus.stats();
    expect(stats.published).toBe(3);
    expect(stats.by_type).toEqual({ THREAT_DETECTED: 2, MEMBER_JOINED: 1 });
    expect(stats.by_severity).toEqual({ high: 1, critical: 1, low: 1 });
  });

  it("rejects a non-positive inbox capacity", () => {
    expect(() => new SignalBus({ inboxCapacity: 0 })).toThrow(RangeError);
    const bus = new SignalBus();
    expect(() => bus.subscribe("*", () => {}, { capacity: 1.5 })).toThrow(RangeError);
  });
});
