/**
 * Support workflow RPC handlers for the Gateway
 *
 * Each handler validates its params, turns the call into the matching broker
 * event and, since delivery is synchronous, can report what the workflow did
 * with it by the time publish returns.
 */

import { z } from "zod";
import type { EventBroker } from "../../broker/EventBroker.js";
import { EventTypes, prioritySchema, type EventPayloadMap } from "../../events/index.js";
import type { SupportRuntime } from "../../runtime/SupportRuntime.js";
import { toSnapshot } from "../../sessions/snapshot.js";
import type { EventPayload, SupportEvent } from "../../types/index.js";
import { parseParams, type JsonRpcHandler } from "../json-rpc.js";

const sessionId = z.string().min(1);
const record = z.record(z.string(), z.unknown());

const chatSendSchema = z.object({
  sessionId,
  text: z.string().min(1),
  customerEmail: z.string().email().optional(),
  customerId: z.string().optional(),
});

const chatRespondSchema = z.object({
  sessionId,
  text: z.string().min(1),
  agent: z.string().min(1).optional(),
  final: z.boolean().optional(),
});

const sentimentSchema = z.object({
  sessionId,
  sentiment: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

const intentSchema = z.object({
  sessionId,
  intent: z.string().min(1),
  confidence: z.number().min(0).max(1),
  entities: record.optional(),
});

const operatorSchema = z.object({
  operatorId: z.string().min(1),
  operatorName: z.string().optional(),
});

const escalationRequestSchema = z.object({
  sessionId,
  reason: z.string().min(1),
  details: record.optional(),
  priority: prioritySchema.optional(),
});

const escalationResolveSchema = z.object({
  sessionId,
  operatorId: z.string().min(1),
  notes: z.string().optional(),
});

const sessionGetSchema = z.object({ sessionId });

/**
 * Publish an event and collect the events of `collectType` that the
 * synchronous dispatch produced.
 */
function publishAndCollect<K extends keyof EventPayloadMap>(
  broker: EventBroker,
  eventType: K,
  payload: EventPayloadMap[K],
  collectType: string,
  accept: (event: SupportEvent) => boolean
): { event: SupportEvent; collected: EventPayload[] } {
  const collected: EventPayload[] = [];
  const unsubscribe = broker.subscribe(collectType, (outcome) => {
    if (accept(outcome)) {
      collected.push(outcome.payload);
    }
  });
  try {
    const event = broker.publish(eventType, payload);
    return { event, collected };
  } finally {
    unsubscribe();
  }
}

/**
 * Create support RPC handlers map.
 */
export function createSupportHandlers(runtime: SupportRuntime): Map<string, JsonRpcHandler> {
  const handlers = new Map<string, JsonRpcHandler>();
  const { broker, registry, escalationQueue } = runtime;

  // chat.send: customer message into gate 0
  handlers.set("chat.send", async (params) => {
    const p = parseParams("chat.send", chatSendSchema, params);
    const event = broker.publish(EventTypes.NEW_MESSAGE, {
      session_id: p.sessionId,
      text: p.text,
      ...(p.customerEmail !== undefined ? { customer_email: p.customerEmail } : {}),
      ...(p.customerId !== undefined ? { customer_id: p.customerId } : {}),
    });

    const context = registry.get(p.sessionId);
    return {
      eventId: event.id,
      sessionId: p.sessionId,
      status: context?.status ?? null,
      messages: context?.messages.length ?? 0,
    };
  });

  // chat.respond: business handler reply to the customer
  handlers.set("chat.respond", async (params) => {
    const p = parseParams("chat.respond", chatRespondSchema, params);
    const { event, collected } = publishAndCollect(
      broker,
      EventTypes.AGENT_RESPONSE,
      {
        session_id: p.sessionId,
        text: p.text,
        ...(p.agent !== undefined ? { agent: p.agent } : {}),
        ...(p.final !== undefined ? { final: p.final } : {}),
      },
      EventTypes.CONVERSATION_END,
      (outcome) => outcome.payload.session_id === p.sessionId
    );
    return { eventId: event.id, ended: collected.length > 0 };
  });

  // classifier.sentiment: external classifier answering a sentiment-task
  handlers.set("classifier.sentiment", async (params) => {
    const p = parseParams("classifier.sentiment", sentimentSchema, params);
    const event = broker.publish(EventTypes.SENTIMENT_RESULT, {
      session_id: p.sessionId,
      sentiment: p.sentiment,
      ...(p.confidence !== undefined ? { confidence: p.confidence } : {}),
    });
    return { eventId: event.id, status: registry.get(p.sessionId)?.status ?? null };
  });

  // classifier.intent: external classifier answering an intent-task
  handlers.set("classifier.intent", async (params) => {
    const p = parseParams("classifier.intent", intentSchema, params);
    const event = broker.publish(EventTypes.INTENT_RESULT, {
      session_id: p.sessionId,
      intent: p.intent,
      confidence: p.confidence,
      ...(p.entities !== undefined ? { entities: p.entities } : {}),
    });
    return { eventId: event.id, status: registry.get(p.sessionId)?.status ?? null };
  });

  // operator.available: take the next escalation, if any
  handlers.set("operator.available", async (params) => {
    const p = parseParams("operator.available", operatorSchema, params);
    const { event, collected } = publishAndCollect(
      broker,
      EventTypes.OPERATOR_AVAILABLE,
      {
        operator_id: p.operatorId,
        ...(p.operatorName !== undefined ? { operator_name: p.operatorName } : {}),
      },
      EventTypes.OPERATOR_ASSIGNED,
      (outcome) => outcome.payload.operator_id === p.operatorId
    );
    return { eventId: event.id, assignment: collected[0] ?? null };
  });

  // escalation.request: hand a session to a human
  handlers.set("escalation.request", async (params) => {
    const p = parseParams("escalation.request", escalationRequestSchema, params);
    const event = broker.publish(EventTypes.ESCALATION_REQUEST, {
      session_id: p.sessionId,
      reason: p.reason,
      ...(p.details !== undefined ? { details: p.details } : {}),
      ...(p.priority !== undefined ? { priority: p.priority } : {}),
      requesting_agent: "gateway",
    });
    return { eventId: event.id, queuePosition: escalationQueue.positionOf(p.sessionId) };
  });

  // escalation.resolve: operator closes an escalation
  handlers.set("escalation.resolve", async (params) => {
    const p = parseParams("escalation.resolve", escalationResolveSchema, params);
    const { event, collected } = publishAndCollect(
      broker,
      EventTypes.ESCALATION_RESOLVED,
      {
        session_id: p.sessionId,
        operator_id: p.operatorId,
        ...(p.notes !== undefined ? { notes: p.notes } : {}),
      },
      EventTypes.ESCALATION_CLOSED,
      (outcome) => outcome.payload.session_id === p.sessionId
    );
    return { eventId: event.id, resolved: collected.length > 0, closed: collected[0] ?? null };
  });

  // queue.status: waiting line for operator dashboards
  handlers.set("queue.status", async () => escalationQueue.getStatus());

  // session.get: live conversation snapshot
  handlers.set("session.get", async (params) => {
    const p = parseParams("session.get", sessionGetSchema, params);
    const context = registry.get(p.sessionId);
    return context ? { exists: true, session: toSnapshot(context) } : { exists: false, sessionId: p.sessionId };
  });

  // stats.get: counters of every component
  handlers.set("stats.get", async () => runtime.getStats());

  return handlers;
}
