export { EscalationEngine } from "./escalation-engine.js";
export type { EscalationEngineConfig, EscalationStats, OnCallRoster } from "./escalation-engine.js";
export { RuleTable, DEFAULT_RULES, WILDCARD, ruleKey } from "./rule-table.js";
export type { Resolution } from "./rule-table.js";
export { CorrelationWindow } from "./correlation-window.js";
export type { Correlation } from "./correlation-window.js";
export { createEscalationStores } from "./stores.js";
export { createEscalationRoutes } from "./escalation-routes.js";
