/**
 * Events Module
 *
 * Event names, payload schemas and the handler-boundary validator.
 */

export { EventTypes, EndReasons, EscalationReasons, type EventType, type EndReason } from "./EventTypes.js";
export * from "./schemas.js";
