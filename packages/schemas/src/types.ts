/**
 * Wardline Core Types
 *
 * Canonical data models shared by the bus, the responders and the
 * command surface. Every component references these types.
 */

// ─── Subjects ───────────────────────────────────────────────────────

export const SUBJECT_KINDS = ["user", "guild", "channel", "domain", "ip", "email"] as const;
export type SubjectKind = (typeof SUBJECT_KINDS)[number];

export interface Subject {
  kind: SubjectKind;
  value: string;
}

// ─── Signals ────────────────────────────────────────────────────────

export const SIGNAL_TYPES = [
  "THREAT_DETECTED",
  "POLICY_VIOLATION",
  "ESCALATION_REQUIRED",
  "MEMBER_JOINED",
  "MESSAGE_OBSERVED",
] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

export const SEVERITIES = ["low", "medium", "high", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export type SignalPayload = Record<string, unknown>;

export interface Signal {
  readonly id: string;
  readonly type: SignalType;
  readonly subject: Readonly<Subject>;
  readonly source: string;
  readonly severity: Severity;
  readonly confidence: number;
  readonly payload: Readonly<SignalPayload>;
  readonly created_at: string;
  readonly correlation_id?: string;
}

/** A signal before the bus stamps it with an id and creation time. */
export interface SignalDraft {
  type: SignalType;
  subject: Subject;
  severity: Severity;
  confidence: number;
  payload: SignalPayload;
  source?: string;
  correlation_id?: string;
}

export type SignalHandler = (signal: Signal) => void | Promise<void>;

export type OverflowPolicy = "block" | "drop-oldest";

// ─── Escalation ─────────────────────────────────────────────────────

export const ESCALATION_ACTIONS = ["log", "watch", "alert_mods", "timeout", "ban_lockdown"] as const;
export type EscalationAction = (typeof ESCALATION_ACTIONS)[number];

export const ESCALATION_LEVELS = [1, 2, 3, 4, 5] as const;
export type EscalationLevel = (typeof ESCALATION_LEVELS)[number];

export interface EscalationRule {
  threat_type: string;
  confidence_threshold: number;
  level: EscalationLevel;
  action: EscalationAction;
}

export interface EscalationRecord {
  record_id: string;
  signal_id: string;
  subject: Subject;
  threat_type: string;
  confidence: number;
  level: EscalationLevel;
  action_taken: EscalationAction;
  on_call_notified?: string;
  notification_gap?: string;
  action_error?: string;
  aggregated: boolean;
  timestamp: string;
}

// ─── Quarantine ─────────────────────────────────────────────────────

export type QuarantineState = "NONE" | "QUARANTINED" | "UNDER_REVIEW" | "RELEASED";

export const QUARANTINE_REASONS = ["malware", "phishing", "harassment", "spam", "raid", "exploit", "manual"] as const;
export type QuarantineReason = (typeof QUARANTINE_REASONS)[number];

export interface PlatformFailure {
  step: string;
  message: string;
  at: string;
}

export interface ReviewRequest {
  requested_by: string;
  reason?: string;
  requested_at: string;
}

export interface QuarantineEntry {
  entry_id: string;
  subject: Subject;
  state: QuarantineState;
  reason: QuarantineReason;
  threat_type?: string;
  confidence: number;
  evidence_refs: string[];
  quarantined_at: string;
  quarantined_by: string;
  prior_roles?: string[];
  platform_failures: PlatformFailure[];
  review_request?: ReviewRequest;
  review_count: number;
  review_note?: string;
  reviewed_by?: string;
  released_at?: string;
  roles_restored?: boolean;
}

export interface CustodyEvent {
  actor: string;
  action: string;
  timestamp: string;
}

export interface EvidenceSnapshot {
  id: string;
  subject: Subject;
  originating_signal_id: string | null;
  payload: Record<string, unknown>;
  chain_of_custody: CustodyEvent[];
  created_at: string;
}

// ─── Blacklist & Appeals ────────────────────────────────────────────

export const BLACKLIST_TYPES = ["user", "guild", "ip", "domain", "email"] as const;
export type BlacklistType = (typeof BLACKLIST_TYPES)[number];

export const BLACKLIST_TIERS = ["TEMPORARY", "APPEAL_ELIGIBLE", "PERMANENT"] as const;
export type BlacklistTier = (typeof BLACKLIST_TIERS)[number];

export type BlacklistStatus = "active" | "expired" | "removed";

export interface BlacklistEntry {
  id: string;
  type: BlacklistType;
  value: string;
  tier: BlacklistTier;
  reason: string;
  added_by: string;
  created_at: string;
  expires_at?: string;
  status: BlacklistStatus;
  removed_at?: string;
  removed_by?: string;
  removal_reason?: string;
  times_triggered: number;
  last_triggered?: string;
}

export interface AllowlistException {
  type: BlacklistType;
  value: string;
  reason: string;
  added_by: string;
  created_at: string;
}

export type AppealStatus = "pending" | "approved" | "denied";
export type AppealDecision = "approve" | "deny";

export interface Appeal {
  id: string;
  blacklist_entry_id: string;
  submitted_by: string;
  reason: string;
  status: AppealStatus;
  submitted_at: string;
  decided_by?: string;
  decided_at?: string;
  decision_note?: string;
  notification_error?: string;
}

// ─── Platform collaborator ──────────────────────────────────────────

/**
 * The chat platform as the core sees it. Every call may fail; callers
 * record failures instead of assuming success.
 */
export interface PlatformClient {
  /** Removes every role from the member and returns the removed role ids. */
  stripRoles(userId: string, reason: string): Promise<string[]>;
  assignRole(userId: string, roleId: string, reason: string): Promise<void>;
  removeRole(userId: string, roleId: string, reason: string): Promise<void>;
  restoreRoles(userId: string, roleIds: string[], reason: string): Promise<void>;
  restrictToChannel(userId: string, channelId: string, reason: string): Promise<void>;
  lockChannel(channelId: string, reason: string): Promise<void>;
  unlockChannel(channelId: string, reason: string): Promise<void>;
  timeoutMember(userId: string, until: string, reason: string): Promise<void>;
  banMember(userId: string, reason: string): Promise<void>;
  sendDirectMessage(userId: string, message: string): Promise<void>;
  postAlert(channelId: string, message: string): Promise<void>;
}

// ─── Journal Events ─────────────────────────────────────────────────

export const JOURNAL_STREAMS = ["bus", "escalation", "quarantine", "evidence", "blacklist"] as const;
export type JournalStream = (typeof JOURNAL_STREAMS)[number];

export const JOURNAL_EVENT_TYPES = [
  "bus.subscriber_failed",
  "bus.signal_dropped",
  "bus.closed",
  "escalation.rule_set",
  "escalation.rule_removed",
  "escalation.evaluated",
  "escalation.action_failed",
  "escalation.oncall_notified",
  "escalation.oncall_failed",
  "escalation.oncall_changed",
  "quarantine.entered",
  "quarantine.evidence_added",
  "quarantine.review_requested",
  "quarantine.released",
  "quarantine.maintained",
  "quarantine.action_failed",
  "evidence.snapshot_created",
  "evidence.custody_recorded",
  "blacklist.added",
  "blacklist.removed",
  "blacklist.expired",
  "blacklist.hit",
  "blacklist.enforcement_failed",
  "blacklist.exception_added",
  "blacklist.exception_removed",
  "appeal.submitted",
  "appeal.rejected",
  "appeal.approved",
  "appeal.denied",
  "store.save_failed",
] as const;
export type JournalEventType = (typeof JOURNAL_EVENT_TYPES)[number];

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  stream: JournalStream;
  subject: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ─── Routes ─────────────────────────────────────────────────────────

export interface RouteRequest {
  method: string;
  path: string;
  params: Record<string, string>;
  query: Record<string, string>;
  body: unknown;
}

export interface RouteResponse {
  json(data: unknown): void;
  text(data: string, contentType?: string): void;
  status(code: number): { json(data: unknown): void; text(data: string, contentType?: string): void };
}

export type RouteHandler = (req: RouteRequest, res: RouteResponse) => Promise<void>;

export interface Route {
  method: "GET" | "POST" | "PUT" | "DELETE";
  path: string;
  handler: RouteHandler;
}
