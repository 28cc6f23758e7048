export { SignalBus } from "./signal-bus.js";
export type {
  SignalBusOptions,
  SubscribeOptions,
  PublishReceipt,
  OverflowListener,
  SignalBusStats,
} from "./signal-bus.js";
export { Inbox } from "./inbox.js";
export type { InboxStats } from "./inbox.js";
export { DetectorRegistry, memberJoinDetector } from "./detector-registry.js";
export type { Detector, Observation, ObserveResult, DetectorRejection } from "./detector-registry.js";
