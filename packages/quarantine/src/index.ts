export { QuarantineMachine } from "./quarantine-machine.js";
export type { QuarantineMachineConfig, QuarantineOutcome, QuarantineRequest, QuarantineStats } from "./quarantine-machine.js";
export { createQuarantineStore } from "./stores.js";
export { createQuarantineRoutes } from "./quarantine-routes.js";
