// Conversation views derived from a context

import type { ConversationContext, ConversationSnapshot, Message, MessageSnapshot } from "../types/index.js";

/**
 * Plain, detached copy of a context shaped for event payloads and storage.
 * Optional message fields that were never set are left out.
 */
export function toSnapshot(context: Readonly<ConversationContext>): ConversationSnapshot {
  return {
    session_id: context.sessionId,
    start_time: context.startTime,
    customer_email: context.customerEmail ?? null,
    customer_id: context.customerId ?? null,
    status: context.status,
    current_sentiment: context.currentSentiment ?? null,
    sentiment_confidence: context.sentimentConfidence ?? null,
    current_intent: context.currentIntent ?? null,
    intent_confidence: context.intentConfidence ?? null,
    messages: context.messages.map(toMessageSnapshot),
    entities: structuredClone(context.entities),
    metadata: structuredClone(context.metadata),
    escalation_reason: context.escalationReason ?? null,
    operator_id: context.operatorId ?? null,
  };
}

function toMessageSnapshot(message: Message): MessageSnapshot {
  const snapshot: MessageSnapshot = {
    sender: message.sender,
    text: message.text,
    timestamp: message.timestamp,
  };
  if (message.intentLabel !== undefined) {snapshot.intent_label = message.intentLabel;}
  if (message.sentimentLabel !== undefined) {snapshot.sentiment_label = message.sentimentLabel;}
  if (message.entities !== undefined) {snapshot.entities = structuredClone(message.entities);}
  if (message.agentAction !== undefined) {snapshot.agent_action = structuredClone(message.agentAction);}
  return snapshot;
}

/** Texts of every USER message, oldest first. */
export function userMessageHistory(context: Readonly<ConversationContext>): string[] {
  return context.messages.filter((m) => m.sender === "USER").map((m) => m.text);
}

/** The last `n` messages regardless of sender. */
export function lastMessages(context: Readonly<ConversationContext>, n = 3): Message[] {
  return n <= 0 ? [] : context.messages.slice(-n);
}

/** Most recent USER message text, or "" when there is none. */
export function lastUserText(context: Readonly<ConversationContext>): string {
  for (let i = context.messages.length - 1; i >= 0; i--) {
    const message = context.messages[i];
    if (message?.sender === "USER") {
      return message.text;
    }
  }
  return "";
}
