/**
 * ClassificationAgent
 *
 * Plugs a Classifier into one task/result event pair:
 *   sentiment-task → sentiment-result
 *   intent-task    → intent-result
 *
 * A synchronous classifier answers inside the task dispatch; an async one
 * answers later through its own publish. Failures become agent-error events
 * so the coordinator can hand the session to a human.
 */

import type { EventBroker } from "../broker/EventBroker.js";
import { EventTypes, intentTaskSchema, parsePayload, sentimentTaskSchema, sessionIdOf } from "../events/index.js";
import type { SupportEvent } from "../types/index.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";
import { runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";
import type { ClassificationKind, ClassificationResult, Classifier } from "./types.js";

export interface ClassificationAgentDeps {
  broker: EventBroker;
  classifier: Classifier;
  kind: ClassificationKind;
  logger: Logger;
  /** Reported as agent_name in agent-error; defaults to `<kind>-classifier` */
  name?: string;
}

export class ClassificationAgent {
  readonly name: string;
  readonly kind: ClassificationKind;
  private broker: EventBroker;
  private classifier: Classifier;
  private logger: LayerLogger;
  private pending: Set<Promise<void>> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(deps: ClassificationAgentDeps) {
    this.broker = deps.broker;
    this.classifier = deps.classifier;
    this.kind = deps.kind;
    this.name = deps.name ?? `${deps.kind}-classifier`;
    this.logger = deps.logger.forLayer("classifier");
  }

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    const taskType = this.kind === "sentiment" ? EventTypes.SENTIMENT_TASK : EventTypes.INTENT_TASK;
    this.unsubscribe = this.broker.subscribe(taskType, (event) => this.handleTask(event));
    this.logger.info(`${this.name} listening on '${taskType}'`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Wait for every in-flight async classification to publish its outcome.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private handleTask(event: SupportEvent): void {
    const task = this.parseTask(event);
    if (!task) {return;}

    const { sessionId, text, history } = task;
    let outcome: ClassificationResult | Promise<ClassificationResult>;
    try {
      outcome = this.classifier.classify(text, history);
    } catch (error) {
      this.reportFailure(sessionId, event.type, error);
      return;
    }

    if (!(outcome instanceof Promise)) {
      this.publishResult(sessionId, outcome);
      return;
    }

    const tracked = runWithTraceAsync("classifier", async () => {
      try {
        this.publishResult(sessionId, await outcome);
      } catch (error) {
        this.reportFailure(sessionId, event.type, error);
      }
    })
      .catch((error: unknown) => {
        this.logger.logError(`${this.kind} result for ${sessionId}`, error);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private parseTask(event: SupportEvent): { sessionId: string; text: string; history?: string[] } | undefined {
    if (this.kind === "sentiment") {
      const result = parsePayload(sentimentTaskSchema, event);
      if (result.ok) {
        return { sessionId: result.data.session_id, text: result.data.text };
      }
      this.reportMalformed(event, result.error);
      return undefined;
    }

    const result = parsePayload(intentTaskSchema, event);
    if (result.ok) {
      return { sessionId: result.data.session_id, text: result.data.text, history: result.data.history };
    }
    this.reportMalformed(event, result.error);
    return undefined;
  }

  private publishResult(sessionId: string, result: ClassificationResult): void {
    this.logger.debug(`${this.kind} for ${sessionId}: ${result.label} (${result.confidence})`);

    if (this.kind === "sentiment") {
      this.broker.publish(EventTypes.SENTIMENT_RESULT, {
        session_id: sessionId,
        sentiment: result.label,
        confidence: result.confidence,
      });
      return;
    }

    this.broker.publish(EventTypes.INTENT_RESULT, {
      session_id: sessionId,
      intent: result.label,
      confidence: result.confidence,
      ...(result.entities !== undefined ? { entities: result.entities } : {}),
    });
  }

  private reportFailure(sessionId: string, task: string, error: unknown): void {
    const message = ErrorSanitizer.message(error);
    this.logger.error(`${this.name} failed for ${sessionId}: ${message}`);
    this.broker.publish(EventTypes.AGENT_ERROR, {
      session_id: sessionId,
      agent_name: this.name,
      error: message,
      task,
    });
  }

  private reportMalformed(event: SupportEvent, error: string): void {
    this.logger.warn(error, { eventId: event.id });
    const sessionId = sessionIdOf(event.payload);
    this.broker.publish(EventTypes.AGENT_ERROR, {
      ...(sessionId !== undefined ? { session_id: sessionId } : {}),
      agent_name: this.name,
      error,
      task: event.type,
    });
  }
}
