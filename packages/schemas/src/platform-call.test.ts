import { describe, it, expect } from "vitest";
import { callPlatform, PlatformTimeoutError, withDeadline } from "./platform-call.js";
import { PlatformActionError } from "./errors.js";

describe("withDeadline", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withDeadline(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it("rejects with PlatformTimeoutError when the deadline passes", async () => {
    const slow = new Promise<void>((resolve) => setTimeout(resolve, 2000));
    await expect(withDeadline(slow, 10, "ban")).rejects.toThrow("ban timed out after 10ms");
    await expect(withDeadline(slow, 10)).rejects.toBeInstanceOf(PlatformTimeoutError);
  });

  it("passes the promise through when the deadline is zero", async () => {
    await expect(withDeadline(Promise.resolve("ok"), 0)).resolves.toBe("ok");
  });

  it("propagates the original rejection", async () => {
    await expect(withDeadline(Promise.reject(new Error("boom")), 1000)).rejects.toThrow("boom");
  });
});

describe("callPlatform", () => {
  it("returns the action result", async () => {
    await expect(callPlatform("strip_roles", async () => ["r1", "r2"])).resolves.toEqual(["r1", "r2"]);
  });

  it("wraps failures in a PlatformActionError carrying the step", async () => {
    const err = await callPlatform("assign_role", async () => {
      throw new Error("missing permission");
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PlatformActionError);
    expect(err).toMatchObject({ step: "assign_role", code: "PLATFORM_ACTION_FAILED" });
    expect(err instanceof Error ? err.message : "").toBe("assign_role failed: missing permission");
  });

  it("turns a timeout into a PlatformActionError", async () => {
    const err = await callPlatform("lock_channel", () => new Promise<void>(() => {}), 10).catch((e: unknown) => e);
    expect(err instanceof Error ? err.message : "").toBe("lock_channel failed: lock_channel timed out after 10ms");
  });
});
