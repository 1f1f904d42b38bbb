// Main entry point

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./events/index.js";
export { EventBroker, type BrokerStats, type EventBrokerOptions, type PublishOptions } from "./broker/EventBroker.js";
export * from "./sessions/index.js";
export * from "./orchestrator/index.js";
export * from "./escalation/index.js";
export * from "./agents/index.js";
export * from "./transcripts/index.js";
export { SessionWatchdog, type SessionWatchdogDeps } from "./watchdog/SessionWatchdog.js";
export * from "./runtime/index.js";
export * from "./gateway/index.js";
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export { ErrorSanitizer, type SanitizedError } from "./utils/error-sanitizer.js";
