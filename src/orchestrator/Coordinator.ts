/**
 * Coordinator
 *
 * Gate state machine driving each conversation:
 *
 *   new-message ──(gate 0)──▶ sentiment-task
 *   sentiment-result ──(gate 1)──▶ intent-task | escalation
 *   intent-result ──(gate 2)──▶ route event | escalation
 *
 * The per-session state is not stored separately; it follows from the
 * context status plus whichever result was last applied. Every failure
 * degrades to a logged no-op or an escalation, never to a thrown error.
 */

import type { z } from "zod";
import type { EventBroker } from "../broker/EventBroker.js";
import type { SessionRegistry } from "../sessions/SessionRegistry.js";
import { lastUserText, toSnapshot, userMessageHistory } from "../sessions/snapshot.js";
import {
  EndReasons,
  EscalationReasons,
  EventTypes,
  agentErrorSchema,
  agentResponseSchema,
  conversationTimeoutSchema,
  escalationClosedSchema,
  escalationRequestSchema,
  intentResultSchema,
  newMessageSchema,
  operatorAssignedSchema,
  parsePayload,
  sentimentResultSchema,
  sessionIdOf,
  type EndReason,
} from "../events/index.js";
import type { ConversationStatus, EscalationPriority, SupportEvent, WorkflowConfig } from "../types/index.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";
import type { LayerLogger, Logger } from "../utils/logger.js";

/** Name reported in agent-error events raised by the coordinator itself */
export const COORDINATOR_AGENT_NAME = "coordinator";

export interface CoordinatorStats {
  messagesProcessed: number;
  escalations: number;
  routed: number;
  errors: number;
  activeSessions: number;
}

export interface CoordinatorDeps {
  broker: EventBroker;
  registry: SessionRegistry;
  logger: Logger;
  workflow: Pick<WorkflowConfig, "escalationSentiments" | "intentConfidenceThreshold" | "routes">;
}

interface EscalationOptions {
  details?: Record<string, unknown>;
  priority?: EscalationPriority;
}

export class Coordinator {
  private broker: EventBroker;
  private registry: SessionRegistry;
  private logger: LayerLogger;
  private readonly escalationSentiments: Set<string>;
  private readonly threshold: number;
  private readonly routes: Map<string, string>;
  private unsubscribers: Array<() => void> = [];
  private stats = { messagesProcessed: 0, escalations: 0, routed: 0, errors: 0 };

  constructor(deps: CoordinatorDeps) {
    this.broker = deps.broker;
    this.registry = deps.registry;
    this.logger = deps.logger.forLayer("coordinator");
    this.escalationSentiments = new Set(deps.workflow.escalationSentiments.map((label) => label.toUpperCase()));
    this.threshold = deps.workflow.intentConfidenceThreshold;
    this.routes = new Map(Object.entries(deps.workflow.routes));
  }

  /**
   * Subscribe every handler. Calling twice has no extra effect.
   */
  start(): void {
    if (this.unsubscribers.length > 0) {
      return;
    }

    const bindings: Array<[string, (event: SupportEvent) => void]> = [
      [EventTypes.NEW_MESSAGE, (e) => this.handleNewMessage(e)],
      [EventTypes.SENTIMENT_RESULT, (e) => this.handleSentimentResult(e)],
      [EventTypes.INTENT_RESULT, (e) => this.handleIntentResult(e)],
      [EventTypes.ESCALATION_REQUEST, (e) => this.handleEscalationRequest(e)],
      [EventTypes.AGENT_ERROR, (e) => this.handleAgentError(e)],
      [EventTypes.AGENT_RESPONSE, (e) => this.handleAgentResponse(e)],
      [EventTypes.OPERATOR_ASSIGNED, (e) => this.handleOperatorAssigned(e)],
      [EventTypes.ESCALATION_CLOSED, (e) => this.handleEscalationClosed(e)],
      [EventTypes.CONVERSATION_TIMEOUT, (e) => this.handleConversationTimeout(e)],
    ];

    for (const [eventType, handler] of bindings) {
      this.unsubscribers.push(this.broker.subscribe(eventType, handler));
    }

    this.logger.info("Coordinator started", { routes: Array.from(this.routes.keys()) });
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.logger.info("Coordinator stopped");
  }

  getStats(): CoordinatorStats {
    return {
      ...this.stats,
      activeSessions: this.registry.count(),
    };
  }

  // ==========================================================================
  // Gates
  // ==========================================================================

  /**
   * Gate 0: record the user turn and ask for its sentiment.
   */
  private handleNewMessage(event: SupportEvent): void {
    const parsed = this.parse(newMessageSchema, event);
    if (!parsed) {return;}

    const { session_id: sessionId, text } = parsed;
    try {
      this.stats.messagesProcessed++;
      this.registry.getOrCreate(sessionId, {
        customerEmail: parsed.customer_email,
        customerId: parsed.customer_id,
      });
      const message = this.registry.addMessage(sessionId, "USER", text);
      if (!message) {
        throw new Error(`Session ${sessionId} disappeared before the message was stored`);
      }

      this.logger.info(`[gate 0] New message for ${sessionId}`);
      this.broker.publish(EventTypes.SENTIMENT_TASK, { session_id: sessionId, text });
    } catch (error) {
      this.emergencyEscalate(sessionId, "gate 0", error);
    }
  }

  /**
   * Gate 1: stop on a configured escalation sentiment, otherwise ask for the
   * intent of the latest user turn.
   */
  private handleSentimentResult(event: SupportEvent): void {
    const parsed = this.parse(sentimentResultSchema, event);
    if (!parsed) {return;}

    const { session_id: sessionId, sentiment, confidence } = parsed;
    try {
      const context = this.registry.updateSentiment(sessionId, sentiment, confidence);
      if (!context) {
        this.logger.warn(`[gate 1] Session ${sessionId} not found; ignoring sentiment result`);
        return;
      }

      const label = sentiment.toUpperCase();
      if (this.escalationSentiments.has(label)) {
        this.logger.warn(`[gate 1] Escalation sentiment for ${sessionId}: ${label}`);
        this.escalate(sessionId, `${EscalationReasons.NEGATIVE_SENTIMENT_PREFIX}${label}`, {
          details: { sentiment, confidence: confidence ?? null },
          priority: "HIGH",
        });
        return;
      }

      this.logger.info(`[gate 1] Sentiment ${label} accepted for ${sessionId}`);
      this.broker.publish(EventTypes.INTENT_TASK, {
        session_id: sessionId,
        text: lastUserText(context),
        history: userMessageHistory(context),
      });
    } catch (error) {
      this.emergencyEscalate(sessionId, "gate 1", error);
    }
  }

  /**
   * Gate 2: route a confident, known intent; escalate anything else.
   * Confidence equal to the threshold routes.
   */
  private handleIntentResult(event: SupportEvent): void {
    const parsed = this.parse(intentResultSchema, event);
    if (!parsed) {return;}

    const { session_id: sessionId, intent, confidence, entities } = parsed;
    try {
      const context = this.registry.updateIntent(sessionId, intent, confidence);
      if (!context) {
        this.logger.warn(`[gate 2] Session ${sessionId} not found; ignoring intent result`);
        return;
      }
      if (entities && Object.keys(entities).length > 0) {
        this.registry.mergeEntities(sessionId, entities);
      }

      if (confidence < this.threshold) {
        this.logger.warn(`[gate 2] Low confidence for ${sessionId}: ${confidence} < ${this.threshold}`);
        this.escalate(sessionId, EscalationReasons.LOW_INTENT_CONFIDENCE, { details: { intent, confidence } });
        return;
      }

      const route = this.routes.get(intent);
      if (route === undefined) {
        this.logger.warn(`[gate 2] No route for intent '${intent}' (${sessionId})`);
        this.escalate(sessionId, EscalationReasons.UNKNOWN_INTENT, { details: { intent } });
        return;
      }

      this.stats.routed++;
      this.logger.info(`[gate 2] Routing ${sessionId} to '${route}'`);
      this.broker.publish(route, toSnapshot(context));
    } catch (error) {
      this.emergencyEscalate(sessionId, "gate 2", error);
    }
  }

  // ==========================================================================
  // Escalation and error intake
  // ==========================================================================

  private handleEscalationRequest(event: SupportEvent): void {
    const parsed = this.parse(escalationRequestSchema, event);
    if (!parsed) {return;}

    this.logger.info(`Escalation requested for ${parsed.session_id}: ${parsed.reason}`, {
      requestingAgent: parsed.requesting_agent,
    });
    this.escalate(parsed.session_id, parsed.reason, {
      details: parsed.details,
      priority: parsed.priority,
    });
  }

  private handleAgentError(event: SupportEvent): void {
    this.stats.errors++;
    const result = parsePayload(agentErrorSchema, event);
    if (!result.ok) {
      // Reporting this one would loop back here
      this.logger.error(result.error, { eventId: event.id });
      return;
    }

    const { session_id: sessionId, agent_name: agentName, error, task } = result.data;
    this.logger.error(`Agent '${agentName}' reported an error${sessionId ? ` for ${sessionId}` : ""}: ${error}`, { task });
    if (!sessionId) {
      return;
    }

    this.escalate(sessionId, `${EscalationReasons.AGENT_ERROR_PREFIX}${agentName}`, {
      details: { agent: agentName, error, ...(task !== undefined ? { task } : {}) },
    });
  }

  // ==========================================================================
  // Conversation lifecycle
  // ==========================================================================

  private handleAgentResponse(event: SupportEvent): void {
    const parsed = this.parse(agentResponseSchema, event);
    if (!parsed) {return;}

    const { session_id: sessionId, text, agent, final } = parsed;
    const message = this.registry.addMessage(sessionId, "AGENT", text, {
      agentAction: { agent: agent ?? null, final: final ?? false },
    });
    if (!message) {
      this.logger.warn(`Response for unknown session ${sessionId} dropped`);
      return;
    }

    if (final) {
      this.endConversation(sessionId, "RESOLVED", EndReasons.RESOLVED_BY_AGENT);
    }
  }

  private handleOperatorAssigned(event: SupportEvent): void {
    const parsed = this.parse(operatorAssignedSchema, event);
    if (!parsed || !parsed.assigned) {return;}

    if (!this.registry.assignOperator(parsed.session_id, parsed.operator_id)) {
      this.logger.warn(`Operator ${parsed.operator_id} assigned to unknown session ${parsed.session_id}`);
    }
  }

  private handleEscalationClosed(event: SupportEvent): void {
    const parsed = this.parse(escalationClosedSchema, event);
    if (!parsed) {return;}

    this.endConversation(parsed.session_id, "RESOLVED", EndReasons.RESOLVED_BY_OPERATOR, parsed.operator_id);
  }

  private handleConversationTimeout(event: SupportEvent): void {
    const parsed = this.parse(conversationTimeoutSchema, event);
    if (!parsed) {return;}

    this.endConversation(parsed.session_id, "ABANDONED", EndReasons.TIMEOUT);
  }

  private endConversation(sessionId: string, status: ConversationStatus, reason: EndReason, operatorId?: string): void {
    const context = this.registry.setStatus(sessionId, status);
    if (!context) {
      this.logger.warn(`Cannot end unknown session ${sessionId} (${reason})`);
      return;
    }

    this.logger.info(`Conversation ${sessionId} ended: ${status} (${reason})`);
    this.broker.publish(EventTypes.CONVERSATION_END, {
      session_id: sessionId,
      status,
      reason,
      ...(operatorId !== undefined ? { operator_id: operatorId } : {}),
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Mark the session escalated (when it still exists) and publish the one
   * canonical escalation-task the queue listens to.
   */
  private escalate(sessionId: string, reason: string, options: EscalationOptions = {}): void {
    this.stats.escalations++;
    const context = this.registry.markEscalated(sessionId, reason);
    if (!context) {
      this.logger.warn(`Escalating ${sessionId} without a live context`);
    }

    this.broker.publish(EventTypes.ESCALATION_TASK, {
      session_id: sessionId,
      reason,
      details: options.details ?? {},
      priority: options.priority ?? "NORMAL",
      snapshot: context ? toSnapshot(context) : null,
    });
  }

  private emergencyEscalate(sessionId: string, stage: string, error: unknown): void {
    this.stats.errors++;
    const sanitized = ErrorSanitizer.sanitize(error);
    this.logger.error(`[${stage}] Failed for ${sessionId}: ${sanitized.message}`, { code: sanitized.code });

    try {
      this.escalate(sessionId, EscalationReasons.SYSTEM_ERROR, {
        details: { stage, error: sanitized.message },
        priority: "HIGH",
      });
    } catch (escalationError) {
      this.logger.logError(`emergency escalation of ${sessionId}`, escalationError);
    }
  }

  /**
   * Validate a payload; on failure report an agent-error naming the
   * coordinator and return undefined.
   */
  private parse<S extends z.ZodTypeAny>(schema: S, event: SupportEvent): z.infer<S> | undefined {
    const result = parsePayload(schema, event);
    if (result.ok) {
      return result.data;
    }

    this.logger.warn(result.error, { eventId: event.id });

    const sessionId = sessionIdOf(event.payload);
    this.broker.publish(EventTypes.AGENT_ERROR, {
      ...(sessionId !== undefined ? { session_id: sessionId } : {}),
      agent_name: COORDINATOR_AGENT_NAME,
      error: result.error,
      task: event.type,
    });
    return undefined;
  }
}
