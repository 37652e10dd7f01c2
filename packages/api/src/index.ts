export { ApiServer, DEFAULT_VERSION, RateLimiter, validateApiConfig } from "./server.js";
export type { ApiServerConfig, RateLimitConfig, RateLimitDecision } from "./server.js";
export { SerialQueue } from "./serial-queue.js";
