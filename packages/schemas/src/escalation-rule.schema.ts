import { ESCALATION_ACTIONS } from "./types.js";

export const EscalationRuleSchema = {
  type: "object",
  required: ["threat_type", "confidence_threshold", "level", "action"],
  properties: {
    threat_type: { type: "string", minLength: 1, maxLength: 64, pattern: "^(\\*|[a-z0-9_.-]+)$" },
    confidence_threshold: { type: "number", minimum: 0, maximum: 1 },
    level: { type: "integer", minimum: 1, maximum: 5 },
    action: { type: "string", enum: [...ESCALATION_ACTIONS] },
  },
  additionalProperties: false,
} as const;

export const EscalationRuleFileSchema = {
  type: "object",
  required: ["rules"],
  properties: {
    rules: { type: "array", items: EscalationRuleSchema },
  },
} as const;
