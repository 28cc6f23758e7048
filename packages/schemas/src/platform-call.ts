import { PlatformActionError } from "./errors.js";

export class PlatformTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlatformTimeoutError";
  }
}

/**
 * Races a promise against a deadline. The timer is unref'd and always
 * cleared. A non-positive deadline disables the race.
 */
export function withDeadline<T>(promise: Promise<T>, ms: number, label = "Platform call"): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PlatformTimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Runs one platform step under a deadline. Any failure (thrown error,
 * rejection or timeout) surfaces as a PlatformActionError named after
 * the step so callers can record it.
 */
export async function callPlatform<T>(step: string, action: () => Promise<T>, timeoutMs = 0): Promise<T> {
  try {
    return await withDeadline(action(), timeoutMs, step);
  } catch (err) {
    throw new PlatformActionError(step, err);
  }
}
