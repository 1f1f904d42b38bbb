/**
 * EscalationAgent
 *
 * Connects the EscalationQueue to the broker: takes escalation-task,
 * operator-available and escalation-resolved in, and announces queueing,
 * assignment and closure to whoever listens (operator dashboards, the
 * coordinator, the gateway). A conversation that ends while still waiting
 * in line is withdrawn from it.
 */

import type { z } from "zod";
import type { EventBroker } from "../broker/EventBroker.js";
import {
  EventTypes,
  conversationEndSchema,
  escalationResolvedSchema,
  escalationTaskSchema,
  operatorAvailableSchema,
  parsePayload,
  sessionIdOf,
} from "../events/index.js";
import type { SupportEvent } from "../types/index.js";
import type { LayerLogger, Logger } from "../utils/logger.js";
import type { EscalationQueue } from "./EscalationQueue.js";

export const ESCALATION_AGENT_NAME = "escalation";

export interface EscalationAgentDeps {
  broker: EventBroker;
  queue: EscalationQueue;
  logger: Logger;
}

export class EscalationAgent {
  private broker: EventBroker;
  private queue: EscalationQueue;
  private logger: LayerLogger;
  private unsubscribers: Array<() => void> = [];

  constructor(deps: EscalationAgentDeps) {
    this.broker = deps.broker;
    this.queue = deps.queue;
    this.logger = deps.logger.forLayer("escalation");
  }

  start(): void {
    if (this.unsubscribers.length > 0) {
      return;
    }

    this.unsubscribers = [
      this.broker.subscribe(EventTypes.ESCALATION_TASK, (e) => this.handleEscalationTask(e)),
      this.broker.subscribe(EventTypes.OPERATOR_AVAILABLE, (e) => this.handleOperatorAvailable(e)),
      this.broker.subscribe(EventTypes.ESCALATION_RESOLVED, (e) => this.handleResolution(e)),
      this.broker.subscribe(EventTypes.CONVERSATION_END, (e) => this.handleConversationEnd(e)),
    ];
    this.logger.info("Escalation agent started");
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  private handleEscalationTask(event: SupportEvent): void {
    const task = this.parse(escalationTaskSchema, event);
    if (!task) {return;}

    if (this.queue.has(task.session_id)) {
      this.logger.info(`Escalation for ${task.session_id} already open; not re-announced`, {
        reason: task.reason,
        position: this.queue.positionOf(task.session_id),
      });
      return;
    }

    const position = this.queue.enqueue(task.session_id, task.reason, task.details, task.priority, task.snapshot);

    this.broker.publish(EventTypes.ESCALATION_QUEUED, {
      session_id: task.session_id,
      status: "QUEUED",
      queue_position: position,
      est_wait: this.queue.estimateWaitSeconds(position),
    });

    this.broker.publish(EventTypes.OPERATOR_NOTIFICATION, {
      type: "NEW_ESCALATION",
      session_id: task.session_id,
      reason: task.reason,
      priority: task.priority,
      queue_size: this.queue.size(),
    });
  }

  private handleOperatorAvailable(event: SupportEvent): void {
    const operator = this.parse(operatorAvailableSchema, event);
    if (!operator) {return;}

    const result = this.queue.assignNext(operator.operator_id);
    if (!result.assigned) {
      this.broker.publish(EventTypes.OPERATOR_ASSIGNED, {
        assigned: false,
        operator_id: operator.operator_id,
        reason: result.reason,
      });
      return;
    }

    const { record } = result;
    this.broker.publish(EventTypes.OPERATOR_ASSIGNED, {
      assigned: true,
      operator_id: operator.operator_id,
      operator_name: operator.operator_name ?? operator.operator_id,
      session_id: record.sessionId,
      reason: record.reason,
      snapshot: record.snapshot,
      enqueued_at: new Date(record.enqueuedAt).toISOString(),
      wait_seconds: result.waitSeconds,
    });
  }

  private handleResolution(event: SupportEvent): void {
    const resolution = this.parse(escalationResolvedSchema, event);
    if (!resolution) {return;}

    const result = this.queue.resolve(resolution.session_id, resolution.operator_id, resolution.notes);
    if (!result) {
      return;
    }

    this.broker.publish(EventTypes.ESCALATION_CLOSED, {
      session_id: resolution.session_id,
      operator_id: resolution.operator_id,
      ...(resolution.notes !== undefined ? { notes: resolution.notes } : {}),
      handling_seconds: result.handlingSeconds,
      total_seconds: result.totalSeconds,
    });
  }

  private handleConversationEnd(event: SupportEvent): void {
    const end = this.parse(conversationEndSchema, event);
    if (!end) {return;}

    const record = this.queue.withdraw(end.session_id);
    if (record) {
      this.logger.info(`Conversation ${end.session_id} ended while waiting for an operator; escalation closed`, {
        reason: record.reason,
        endReason: end.reason,
      });
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, event: SupportEvent): z.infer<S> | undefined {
    const result = parsePayload(schema, event);
    if (result.ok) {
      return result.data;
    }

    this.logger.warn(result.error, { eventId: event.id });
    const sessionId = sessionIdOf(event.payload);
    this.broker.publish(EventTypes.AGENT_ERROR, {
      ...(sessionId !== undefined ? { session_id: sessionId } : {}),
      agent_name: ESCALATION_AGENT_NAME,
      error: result.error,
      task: event.type,
    });
    return undefined;
  }
}
