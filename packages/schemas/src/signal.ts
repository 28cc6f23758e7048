import { v4 as uuid } from "uuid";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { ValidationError } from "./errors.js";
import { SUBJECT_KINDS } from "./types.js";
import type { Signal, SignalDraft, Subject, SubjectKind } from "./types.js";

export function subjectKey(subject: Subject): string {
  return `${subject.kind}:${subject.value}`;
}

function isSubjectKind(value: string): value is SubjectKind {
  return (SUBJECT_KINDS as readonly string[]).includes(value);
}

/** Parses "user:42" back into a Subject. */
export function parseSubjectKey(key: string): Subject {
  const idx = key.indexOf(":");
  if (idx <= 0 || idx === key.length - 1) {
    throw new ValidationError(`Invalid subject key: "${key}". Expected "<kind>:<value>".`);
  }
  const kind = key.slice(0, idx);
  if (!isSubjectKind(kind)) {
    throw new ValidationError(`Unknown subject kind: "${kind}"`, [`kind must be one of: ${SUBJECT_KINDS.join(", ")}`]);
  }
  return { kind, value: key.slice(idx + 1) };
}

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return value;
  for (const v of Object.values(value)) deepFreeze(v);
  return Object.freeze(value);
}

/**
 * Stamps a draft with an id and creation time and freezes it. The draft's
 * payload is cloned so later edits by the producer cannot leak in.
 */
export function createSignal(draft: SignalDraft, options?: { clock?: Clock; source?: string }): Signal {
  const clock = options?.clock ?? systemClock;
  const signal: Signal = {
    id: uuid(),
    type: draft.type,
    subject: { kind: draft.subject.kind, value: draft.subject.value },
    source: draft.source ?? options?.source ?? "unknown",
    severity: draft.severity,
    confidence: draft.confidence,
    payload: structuredClone(draft.payload),
    created_at: new Date(clock.now()).toISOString(),
    ...(draft.correlation_id !== undefined ? { correlation_id: draft.correlation_id } : {}),
  };
  return deepFreeze(signal);
}
