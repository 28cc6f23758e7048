export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener, IntegrityReport } from "./journal.js";
export { AuditStore } from "./audit-store.js";
export type { AuditStoreOptions } from "./audit-store.js";
export { EvidenceStore } from "./evidence-store.js";
export type { SnapshotInput } from "./evidence-store.js";
export { redactPayload } from "./redact.js";
