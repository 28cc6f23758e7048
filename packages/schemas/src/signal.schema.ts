import { SIGNAL_TYPES, SEVERITIES, SUBJECT_KINDS, ESCALATION_ACTIONS } from "./types.js";
import type { SignalType } from "./types.js";

export const SubjectSchema = {
  type: "object",
  required: ["kind", "value"],
  properties: {
    kind: { type: "string", enum: [...SUBJECT_KINDS] },
    value: { type: "string", minLength: 1, maxLength: 512 },
  },
  additionalProperties: false,
} as const;

export const SignalSchema = {
  type: "object",
  required: ["id", "type", "subject", "source", "severity", "confidence", "payload", "created_at"],
  properties: {
    id: { type: "string", minLength: 1 },
    type: { type: "string", enum: [...SIGNAL_TYPES] },
    subject: SubjectSchema,
    source: { type: "string", minLength: 1, maxLength: 128 },
    severity: { type: "string", enum: [...SEVERITIES] },
    confidence: { type: "number", minimum: 0, maximum: 1 },
    payload: { type: "object" },
    created_at: { type: "string", format: "date-time" },
    correlation_id: { type: "string", minLength: 1, maxLength: 256 },
  },
  additionalProperties: false,
} as const;

const dedupKey = { type: "string", minLength: 1, maxLength: 256 } as const;

/**
 * Per-type payload contracts. Payloads stay open mappings; these name the
 * keys each consumer relies on.
 */
export const SignalPayloadSchemas: Record<SignalType, Record<string, unknown>> = {
  THREAT_DETECTED: {
    type: "object",
    required: ["threat_type"],
    properties: {
      threat_type: { type: "string", minLength: 1, maxLength: 64 },
      dedup_key: dedupKey,
    },
  },
  POLICY_VIOLATION: {
    type: "object",
    required: ["policy"],
    properties: {
      policy: { type: "string", minLength: 1, maxLength: 64 },
      dedup_key: dedupKey,
    },
  },
  ESCALATION_REQUIRED: {
    type: "object",
    required: ["level", "action", "origin_signal_id"],
    properties: {
      level: { type: "integer", minimum: 1, maximum: 5 },
      action: { type: "string", enum: [...ESCALATION_ACTIONS] },
      origin_signal_id: { type: "string", minLength: 1 },
      threat_type: { type: "string" },
      dedup_key: dedupKey,
    },
  },
  MEMBER_JOINED: {
    type: "object",
    required: ["guild_id"],
    properties: {
      guild_id: { type: "string", minLength: 1 },
      dedup_key: dedupKey,
    },
  },
  MESSAGE_OBSERVED: {
    type: "object",
    required: ["channel_id", "message_id"],
    properties: {
      channel_id: { type: "string", minLength: 1 },
      message_id: { type: "string", minLength: 1 },
      dedup_key: dedupKey,
    },
  },
};
