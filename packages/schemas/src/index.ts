export * from "./types.js";
export * from "./errors.js";
export { TimeoutError, withTimeout, sleep, pollUntil } from "./timeout.js";
export type { PollOptions } from "./timeout.js";
export { redactPayload, redactRecord, REDACTED } from "./redact.js";
export { ConsoleLogger, createLogger, logError, parseLogLevel } from "./logger.js";
export type { ConsoleLoggerOptions } from "./logger.js";
export { isInteractRequest, isSiteProfilesDocument, validateInteractRequest, validateSiteProfiles } from "./validator.js";
export type { SiteProfilesDocument, ValidationResult } from "./validator.js";
export { InteractRequestSchema, MAX_COMMAND_LENGTH } from "./interact-request.schema.js";
export { SiteProfileSchema, SiteProfilesSchema } from "./site-profiles.schema.js";
