// Payload schemas for every event in the catalogue

import { z } from "zod";
import type { EventPayload, SupportEvent } from "../types/index.js";
import { EventTypes } from "./EventTypes.js";

const sessionId = z.string().min(1);
const record = z.record(z.string(), z.unknown());
const confidence = z.number().min(0).max(1);

export const prioritySchema = z.enum(["HIGH", "NORMAL", "LOW"]);
export const conversationStatusSchema = z.enum(["ACTIVE", "ESCALATED", "RESOLVED", "ABANDONED"]);

export const newMessageSchema = z.object({
  session_id: sessionId,
  text: z.string(),
  customer_email: z.string().optional(),
  customer_id: z.string().optional(),
});

export const sentimentTaskSchema = z.object({
  session_id: sessionId,
  text: z.string(),
});

export const sentimentResultSchema = z.object({
  session_id: sessionId,
  sentiment: z.string().min(1),
  confidence: confidence.optional(),
});

export const intentTaskSchema = z.object({
  session_id: sessionId,
  text: z.string(),
  history: z.array(z.string()),
});

export const intentResultSchema = z.object({
  session_id: sessionId,
  intent: z.string().min(1),
  confidence,
  entities: record.optional(),
});

export const escalationRequestSchema = z.object({
  session_id: sessionId,
  reason: z.string().min(1),
  details: record.optional(),
  priority: prioritySchema.optional(),
  requesting_agent: z.string().optional(),
});

export const escalationTaskSchema = z.object({
  session_id: sessionId,
  reason: z.string().min(1),
  details: record,
  priority: prioritySchema,
  snapshot: record.nullable(),
});

export const escalationQueuedSchema = z.object({
  session_id: sessionId,
  status: z.literal("QUEUED"),
  queue_position: z.number().int().nonnegative(),
  est_wait: z.number().nonnegative(),
});

export const operatorNotificationSchema = z.object({
  type: z.literal("NEW_ESCALATION"),
  session_id: sessionId,
  reason: z.string(),
  priority: prioritySchema,
  queue_size: z.number().int().nonnegative(),
});

export const operatorAvailableSchema = z.object({
  operator_id: z.string().min(1),
  operator_name: z.string().optional(),
});

export const operatorAssignedSchema = z.discriminatedUnion("assigned", [
  z.object({
    assigned: z.literal(true),
    operator_id: z.string().min(1),
    operator_name: z.string(),
    session_id: sessionId,
    reason: z.string(),
    snapshot: record.nullable(),
    enqueued_at: z.string(),
    wait_seconds: z.number().nonnegative(),
  }),
  z.object({
    assigned: z.literal(false),
    operator_id: z.string().min(1),
    reason: z.literal("QUEUE_EMPTY"),
  }),
]);

export const escalationResolvedSchema = z.object({
  session_id: sessionId,
  operator_id: z.string().min(1),
  notes: z.string().optional(),
});

export const escalationClosedSchema = z.object({
  session_id: sessionId,
  operator_id: z.string().min(1),
  notes: z.string().optional(),
  handling_seconds: z.number().nonnegative(),
  total_seconds: z.number().nonnegative(),
});

export const agentErrorSchema = z.object({
  session_id: sessionId.optional(),
  agent_name: z.string().min(1),
  error: z.string(),
  task: z.string().optional(),
});

export const agentResponseSchema = z.object({
  session_id: sessionId,
  text: z.string(),
  agent: z.string().min(1).optional(),
  final: z.boolean().optional(),
});

export const conversationTimeoutSchema = z.object({
  session_id: sessionId,
  idle_seconds: z.number().nonnegative().optional(),
});

export const conversationEndSchema = z.object({
  session_id: sessionId,
  status: conversationStatusSchema,
  reason: z.string().min(1),
  operator_id: z.string().optional(),
});

export const transcriptSavedSchema = z.object({
  session_id: sessionId,
  status: conversationStatusSchema,
  end_reason: z.string().min(1),
});

export type NewMessagePayload = z.infer<typeof newMessageSchema>;
export type SentimentTaskPayload = z.infer<typeof sentimentTaskSchema>;
export type SentimentResultPayload = z.infer<typeof sentimentResultSchema>;
export type IntentTaskPayload = z.infer<typeof intentTaskSchema>;
export type IntentResultPayload = z.infer<typeof intentResultSchema>;
export type EscalationRequestPayload = z.infer<typeof escalationRequestSchema>;
export type EscalationTaskPayload = z.infer<typeof escalationTaskSchema>;
export type EscalationQueuedPayload = z.infer<typeof escalationQueuedSchema>;
export type OperatorNotificationPayload = z.infer<typeof operatorNotificationSchema>;
export type OperatorAvailablePayload = z.infer<typeof operatorAvailableSchema>;
export type OperatorAssignedPayload = z.infer<typeof operatorAssignedSchema>;
export type EscalationResolvedPayload = z.infer<typeof escalationResolvedSchema>;
export type EscalationClosedPayload = z.infer<typeof escalationClosedSchema>;
export type AgentErrorPayload = z.infer<typeof agentErrorSchema>;
export type AgentResponsePayload = z.infer<typeof agentResponseSchema>;
export type ConversationTimeoutPayload = z.infer<typeof conversationTimeoutSchema>;
export type ConversationEndPayload = z.infer<typeof conversationEndSchema>;
export type TranscriptSavedPayload = z.infer<typeof transcriptSavedSchema>;

/**
 * Payload type per event name: one tagged variant per case.
 */
export interface EventPayloadMap {
  [EventTypes.NEW_MESSAGE]: NewMessagePayload;
  [EventTypes.SENTIMENT_TASK]: SentimentTaskPayload;
  [EventTypes.SENTIMENT_RESULT]: SentimentResultPayload;
  [EventTypes.INTENT_TASK]: IntentTaskPayload;
  [EventTypes.INTENT_RESULT]: IntentResultPayload;
  [EventTypes.ESCALATION_REQUEST]: EscalationRequestPayload;
  [EventTypes.ESCALATION_TASK]: EscalationTaskPayload;
  [EventTypes.ESCALATION_QUEUED]: EscalationQueuedPayload;
  [EventTypes.OPERATOR_NOTIFICATION]: OperatorNotificationPayload;
  [EventTypes.OPERATOR_AVAILABLE]: OperatorAvailablePayload;
  [EventTypes.OPERATOR_ASSIGNED]: OperatorAssignedPayload;
  [EventTypes.ESCALATION_RESOLVED]: EscalationResolvedPayload;
  [EventTypes.ESCALATION_CLOSED]: EscalationClosedPayload;
  [EventTypes.AGENT_ERROR]: AgentErrorPayload;
  [EventTypes.AGENT_RESPONSE]: AgentResponsePayload;
  [EventTypes.CONVERSATION_TIMEOUT]: ConversationTimeoutPayload;
  [EventTypes.CONVERSATION_END]: ConversationEndPayload;
  [EventTypes.TRANSCRIPT_SAVED]: TranscriptSavedPayload;
}

export type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

/**
 * Validate an event payload at the handler boundary.
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, event: SupportEvent): ParseResult<z.infer<S>> {
  const result = schema.safeParse(event.payload);
  if (result.success) {
    return { ok: true, data: result.data };
  }
  const error = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "payload"}: ${issue.message}`)
    .join("; ");
  return { ok: false, error: `Malformed '${event.type}' payload (${error})` };
}

/**
 * Best-effort session id lookup on a payload that may have failed validation.
 */
export function sessionIdOf(payload: Readonly<EventPayload>): string | undefined {
  const value = payload.session_id;
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
