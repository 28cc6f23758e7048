import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { SignalSchema, SignalPayloadSchemas, SubjectSchema } from "./signal.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import { EscalationRuleSchema, EscalationRuleFileSchema } from "./escalation-rule.schema.js";
import {
  AllowlistExceptionSchema,
  AppealSchema,
  BlacklistEntrySchema,
  EscalationRecordSchema,
  EvidenceSnapshotSchema,
  QuarantineEntrySchema,
} from "./records.schema.js";
import { ValidationError } from "./errors.js";
import { ESCALATION_LEVELS, SIGNAL_TYPES } from "./types.js";
import type {
  AllowlistException,
  Appeal,
  BlacklistEntry,
  EscalationLevel,
  EscalationRecord,
  EscalationRule,
  EvidenceSnapshot,
  JournalEvent,
  QuarantineEntry,
  Signal,
  SignalType,
  Subject,
} from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// Under ESM the CJS build of ajv-formats arrives wrapped in .default
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateSignal: ValidateFunction<Signal> = ajv.compile<Signal>(SignalSchema);
const validateJournalEvent: ValidateFunction<JournalEvent> = ajv.compile<JournalEvent>(JournalEventSchema);
const validateEscalationRule: ValidateFunction<EscalationRule> = ajv.compile<EscalationRule>(EscalationRuleSchema);
const validateEscalationRuleFile: ValidateFunction<{ rules: EscalationRule[] }> =
  ajv.compile<{ rules: EscalationRule[] }>(EscalationRuleFileSchema);

const validateSubject = ajv.compile<Subject>(SubjectSchema);
const validateEscalationRecord = ajv.compile<EscalationRecord>(EscalationRecordSchema);
const validateQuarantineEntry = ajv.compile<QuarantineEntry>(QuarantineEntrySchema);
const validateEvidenceSnapshot = ajv.compile<EvidenceSnapshot>(EvidenceSnapshotSchema);
const validateBlacklistEntry = ajv.compile<BlacklistEntry>(BlacklistEntrySchema);
const validateAllowlistException = ajv.compile<AllowlistException>(AllowlistExceptionSchema);
const validateAppeal = ajv.compile<Appeal>(AppealSchema);

const payloadValidators = new Map<SignalType, ValidateFunction>(
  SIGNAL_TYPES.map((type) => [type, ajv.compile(SignalPayloadSchemas[type])])
);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined, prefix = ""): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${`${prefix}${e.instancePath}` || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

/** Validates the envelope and the per-type payload contract. */
export function validateSignalData(data: unknown): ValidationResult {
  if (!validateSignal(data)) {
    return toResult(false, validateSignal.errors);
  }
  const validatePayload = payloadValidators.get(data.type);
  if (!validatePayload) return { valid: false, errors: [`/type: no payload schema for ${data.type}`] };
  const valid = validatePayload(data.payload);
  return toResult(valid, validatePayload.errors, "/payload");
}

export function assertValidSignal(data: unknown): asserts data is Signal {
  const result = validateSignalData(data);
  if (!result.valid) {
    throw new ValidationError("Invalid signal", result.errors);
  }
}

export function validateJournalEventData(data: unknown): ValidationResult {
  const valid = validateJournalEvent(data);
  return toResult(valid, validateJournalEvent.errors);
}

export function validateEscalationRuleData(data: unknown): ValidationResult {
  const valid = validateEscalationRule(data);
  return toResult(valid, validateEscalationRule.errors);
}

export function parseEscalationRule(data: unknown): EscalationRule {
  if (validateEscalationRule(data)) return data;
  throw new ValidationError("Invalid escalation rule", toResult(false, validateEscalationRule.errors).errors);
}

export function parseEscalationRuleFile(data: unknown): EscalationRule[] {
  if (validateEscalationRuleFile(data)) return data.rules;
  throw new ValidationError("Invalid escalation rule file", toResult(false, validateEscalationRuleFile.errors).errors);
}

export function parseSubject(data: unknown): Subject {
  if (validateSubject(data)) return { kind: data.kind, value: data.value };
  throw new ValidationError("Invalid subject", toResult(false, validateSubject.errors).errors);
}

export function isEscalationLevel(value: unknown): value is EscalationLevel {
  return typeof value === "number" && (ESCALATION_LEVELS as readonly number[]).includes(value);
}

// ─── Record guards (used when loading persisted lines) ──────────────

export function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}

export function isEscalationRule(data: unknown): data is EscalationRule {
  return validateEscalationRule(data);
}

export function isEscalationRecord(data: unknown): data is EscalationRecord {
  return validateEscalationRecord(data);
}

export function isQuarantineEntry(data: unknown): data is QuarantineEntry {
  return validateQuarantineEntry(data);
}

export function isEvidenceSnapshot(data: unknown): data is EvidenceSnapshot {
  return validateEvidenceSnapshot(data);
}

export function isBlacklistEntry(data: unknown): data is BlacklistEntry {
  return validateBlacklistEntry(data);
}

export function isAllowlistException(data: unknown): data is AllowlistException {
  return validateAllowlistException(data);
}

export function isAppeal(data: unknown): data is Appeal {
  return validateAppeal(data);
}
