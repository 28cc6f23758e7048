import { JOURNAL_EVENT_TYPES, JOURNAL_STREAMS } from "./types.js";

export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "stream", "subject", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    stream: { type: "string", enum: [...JOURNAL_STREAMS] },
    subject: { type: "string", minLength: 1 },
    type: { type: "string", enum: [...JOURNAL_EVENT_TYPES] },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
