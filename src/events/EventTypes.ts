/**
 * Catalogue of event names exchanged through the broker.
 *
 * Routing events are not listed here: their names come from the
 * `workflow.routes` table in configuration.
 */
export const EventTypes = {
  /** gateway → coordinator */
  NEW_MESSAGE: "new-message",
  /** coordinator → sentiment classifier */
  SENTIMENT_TASK: "sentiment-task",
  SENTIMENT_RESULT: "sentiment-result",
  /** coordinator → intent classifier */
  INTENT_TASK: "intent-task",
  INTENT_RESULT: "intent-result",
  /** any component → coordinator */
  ESCALATION_REQUEST: "escalation-request",
  /** coordinator → escalation queue; the single canonical entry point */
  ESCALATION_TASK: "escalation-task",
  ESCALATION_QUEUED: "escalation-queued",
  OPERATOR_NOTIFICATION: "operator-notification",
  OPERATOR_AVAILABLE: "operator-available",
  OPERATOR_ASSIGNED: "operator-assigned",
  /** operator UI → escalation queue */
  ESCALATION_RESOLVED: "escalation-resolved",
  /** escalation queue → everyone, after a resolution was recorded */
  ESCALATION_CLOSED: "escalation-closed",
  AGENT_ERROR: "agent-error",
  /** business handler reply to the end user */
  AGENT_RESPONSE: "agent-response",
  CONVERSATION_TIMEOUT: "conversation-timeout",
  CONVERSATION_END: "conversation-end",
  /** transcript recorder → everyone, once the transcript is stored */
  TRANSCRIPT_SAVED: "transcript-saved",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/** Reasons carried by conversation-end. */
export const EndReasons = {
  RESOLVED_BY_AGENT: "RESOLVED_BY_AGENT",
  RESOLVED_BY_OPERATOR: "RESOLVED_BY_OPERATOR",
  TIMEOUT: "TIMEOUT",
} as const;

export type EndReason = (typeof EndReasons)[keyof typeof EndReasons];

/** Escalation reasons produced by the coordinator itself. */
export const EscalationReasons = {
  NEGATIVE_SENTIMENT_PREFIX: "NEGATIVE_SENTIMENT_",
  LOW_INTENT_CONFIDENCE: "LOW_INTENT_CONFIDENCE",
  UNKNOWN_INTENT: "UNKNOWN_INTENT",
  SYSTEM_ERROR: "SYSTEM_ERROR",
  AGENT_ERROR_PREFIX: "AGENT_ERROR_",
} as const;
