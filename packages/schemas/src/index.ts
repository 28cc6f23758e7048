export * from "./types.js";
export * from "./errors.js";
export { systemClock, ManualClock, isoAt, DAY_MS } from "./clock.js";
export type { Clock } from "./clock.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { ConsoleLogger, silentLogger, parseLogLevel } from "./logger.js";
export type { LogLevel } from "./logger.js";
export { callPlatform, withDeadline, PlatformTimeoutError } from "./platform-call.js";
export { createSignal, subjectKey, parseSubjectKey, deepFreeze } from "./signal.js";
export {
  validateSignalData,
  assertValidSignal,
  validateJournalEventData,
  validateEscalationRuleData,
  parseEscalationRule,
  parseEscalationRuleFile,
  parseSubject,
  isEscalationLevel,
  isJournalEvent,
  isEscalationRule,
  isEscalationRecord,
  isQuarantineEntry,
  isEvidenceSnapshot,
  isBlacklistEntry,
  isAllowlistException,
  isAppeal,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { SignalSchema, SignalPayloadSchemas, SubjectSchema } from "./signal.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export { EscalationRuleSchema } from "./escalation-rule.schema.js";
export { isRecord, statusForError, sendError, badRequest, parseLimit } from "./route-helpers.js";
