import {
  BLACKLIST_TIERS,
  BLACKLIST_TYPES,
  ESCALATION_ACTIONS,
  QUARANTINE_REASONS,
} from "./types.js";
import { SubjectSchema } from "./signal.schema.js";

// Shapes of the records the stores persist. Used to reject corrupt or
// foreign lines on load; unknown extra keys are tolerated for forward
// compatibility.

const isoString = { type: "string", format: "date-time" } as const;

export const EscalationRecordSchema = {
  type: "object",
  required: ["record_id", "signal_id", "subject", "threat_type", "confidence", "level", "action_taken", "aggregated", "timestamp"],
  properties: {
    record_id: { type: "string", minLength: 1 },
    signal_id: { type: "string", minLength: 1 },
    subject: SubjectSchema,
    threat_type: { type: "string" },
    confidence: { type: "number", minimum: 0, maximum: 1 },
    level: { type: "integer", minimum: 1, maximum: 5 },
    action_taken: { type: "string", enum: [...ESCALATION_ACTIONS] },
    on_call_notified: { type: "string" },
    notification_gap: { type: "string" },
    action_error: { type: "string" },
    aggregated: { type: "boolean" },
    timestamp: isoString,
  },
} as const;

const PlatformFailureSchema = {
  type: "object",
  required: ["step", "message", "at"],
  properties: {
    step: { type: "string" },
    message: { type: "string" },
    at: isoString,
  },
} as const;

export const QuarantineEntrySchema = {
  type: "object",
  required: [
    "entry_id", "subject", "state", "reason", "confidence", "evidence_refs",
    "quarantined_at", "quarantined_by", "platform_failures", "review_count",
  ],
  properties: {
    entry_id: { type: "string", minLength: 1 },
    subject: SubjectSchema,
    state: { type: "string", enum: ["NONE", "QUARANTINED", "UNDER_REVIEW", "RELEASED"] },
    reason: { type: "string", enum: [...QUARANTINE_REASONS] },
    threat_type: { type: "string" },
    confidence: { type: "number", minimum: 0, maximum: 1 },
    evidence_refs: { type: "array", items: { type: "string" } },
    quarantined_at: isoString,
    quarantined_by: { type: "string" },
    prior_roles: { type: "array", items: { type: "string" } },
    platform_failures: { type: "array", items: PlatformFailureSchema },
    review_request: {
      type: "object",
      required: ["requested_by", "requested_at"],
      properties: {
        requested_by: { type: "string" },
        reason: { type: "string" },
        requested_at: isoString,
      },
    },
    review_count: { type: "integer", minimum: 0 },
    review_note: { type: "string" },
    reviewed_by: { type: "string" },
    released_at: isoString,
    roles_restored: { type: "boolean" },
  },
} as const;

export const EvidenceSnapshotSchema = {
  type: "object",
  required: ["id", "subject", "originating_signal_id", "payload", "chain_of_custody", "created_at"],
  properties: {
    id: { type: "string", minLength: 1 },
    subject: SubjectSchema,
    originating_signal_id: { type: ["string", "null"] },
    payload: { type: "object" },
    chain_of_custody: {
      type: "array",
      items: {
        type: "object",
        required: ["actor", "action", "timestamp"],
        properties: {
          actor: { type: "string" },
          action: { type: "string" },
          timestamp: isoString,
        },
      },
    },
    created_at: isoString,
  },
} as const;

export const BlacklistEntrySchema = {
  type: "object",
  required: ["id", "type", "value", "tier", "reason", "added_by", "created_at", "status", "times_triggered"],
  properties: {
    id: { type: "string", minLength: 1 },
    type: { type: "string", enum: [...BLACKLIST_TYPES] },
    value: { type: "string", minLength: 1 },
    tier: { type: "string", enum: [...BLACKLIST_TIERS] },
    reason: { type: "string" },
    added_by: { type: "string" },
    created_at: isoString,
    expires_at: isoString,
    status: { type: "string", enum: ["active", "expired", "removed"] },
    removed_at: isoString,
    removed_by: { type: "string" },
    removal_reason: { type: "string" },
    times_triggered: { type: "integer", minimum: 0 },
    last_triggered: isoString,
  },
} as const;

export const AllowlistExceptionSchema = {
  type: "object",
  required: ["type", "value", "reason", "added_by", "created_at"],
  properties: {
    type: { type: "string", enum: [...BLACKLIST_TYPES] },
    value: { type: "string", minLength: 1 },
    reason: { type: "string" },
    added_by: { type: "string" },
    created_at: isoString,
  },
} as const;

export const AppealSchema = {
  type: "object",
  required: ["id", "blacklist_entry_id", "submitted_by", "reason", "status", "submitted_at"],
  properties: {
    id: { type: "string", minLength: 1 },
    blacklist_entry_id: { type: "string", minLength: 1 },
    submitted_by: { type: "string", minLength: 1 },
    reason: { type: "string" },
    status: { type: "string", enum: ["pending", "approved", "denied"] },
    submitted_at: isoString,
    decided_by: { type: "string" },
    decided_at: isoString,
    decision_note: { type: "string" },
    notification_error: { type: "string" },
  },
} as const;
