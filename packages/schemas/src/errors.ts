export type WardlineErrorCode =
  | "VALIDATION_FAILED"
  | "CONFLICT"
  | "DUPLICATE_ACTIVE_ENTRY"
  | "RATE_LIMITED"
  | "NOT_APPEALABLE"
  | "REMOVAL_NOT_PERMITTED"
  | "INVALID_TRANSITION"
  | "TERMINAL_STATE"
  | "NOT_FOUND"
  | "PLATFORM_ACTION_FAILED"
  | "INBOX_OVERFLOW";

export class WardlineError extends Error {
  readonly code: WardlineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: WardlineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "WardlineError";
    this.code = code;
    this.details = details;
  }
}

/** Malformed input. Thrown before any state is touched. */
export class ValidationError extends WardlineError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super("VALIDATION_FAILED", errors.length > 0 ? `${message}: ${errors.join(", ")}` : message, { errors });
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/** The current state forbids the operation. The original state is left untouched. */
export class ConflictError extends WardlineError {
  constructor(message: string, code: WardlineErrorCode = "CONFLICT", details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ConflictError";
  }
}

export class TerminalStateError extends ConflictError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TERMINAL_STATE", details);
    this.name = "TerminalStateError";
  }
}

export class NotFoundError extends WardlineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, details);
    this.name = "NotFoundError";
  }
}

/** A platform mutation or notification failed. Recorded, never fatal. */
export class PlatformActionError extends WardlineError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super("PLATFORM_ACTION_FAILED", `${step} failed: ${msg}`, { step });
    this.name = "PlatformActionError";
    this.step = step;
  }
}

/** A queued signal was dropped because a subscriber inbox was full. */
export class OverflowError extends WardlineError {
  readonly subscriber: string;
  readonly signalId: string;

  constructor(subscriber: string, signalId: string, capacity: number) {
    super("INBOX_OVERFLOW", `Inbox for "${subscriber}" full (capacity ${capacity}); dropped signal ${signalId}`, {
      subscriber,
      signal_id: signalId,
      capacity,
    });
    this.name = "OverflowError";
    this.subscriber = subscriber;
    this.signalId = signalId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
