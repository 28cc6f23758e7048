export { ApiServer, RateLimiter, parseSignalDraft, parseObservation } from "./server.js";
export type { ApiServerConfig } from "./server.js";
