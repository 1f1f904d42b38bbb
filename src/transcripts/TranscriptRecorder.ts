/**
 * TranscriptRecorder
 *
 * Passive observer of conversation-end. Snapshots the final state of the
 * conversation, hands it to a TranscriptWriter and removes the session from
 * the registry straight away, so a message arriving while the write is in
 * flight opens a fresh conversation. A stored transcript is announced with
 * transcript-saved; a failed write is logged with the session id.
 */

import type { EventBroker } from "../broker/EventBroker.js";
import { EventTypes, conversationEndSchema, parsePayload } from "../events/index.js";
import type { SessionRegistry } from "../sessions/SessionRegistry.js";
import { toSnapshot } from "../sessions/snapshot.js";
import type { SupportEvent } from "../types/index.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";
import type { LayerLogger, Logger } from "../utils/logger.js";
import type { TranscriptRecord, TranscriptWriter } from "./types.js";

export interface TranscriptRecorderDeps {
  broker: EventBroker;
  registry: SessionRegistry;
  writer: TranscriptWriter;
  logger: Logger;
}

export interface RecorderStats {
  written: number;
  failed: number;
  pending: number;
}

export class TranscriptRecorder {
  private broker: EventBroker;
  private registry: SessionRegistry;
  private writer: TranscriptWriter;
  private logger: LayerLogger;
  private pending: Set<Promise<void>> = new Set();
  /** Sessions whose transcript write has not settled yet */
  private closing: Set<string> = new Set();
  private stats = { written: 0, failed: 0 };
  private unsubscribe: (() => void) | null = null;

  constructor(deps: TranscriptRecorderDeps) {
    this.broker = deps.broker;
    this.registry = deps.registry;
    this.writer = deps.writer;
    this.logger = deps.logger.forLayer("transcript");
  }

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.broker.subscribe(EventTypes.CONVERSATION_END, (event) => this.handleConversationEnd(event));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Wait for every write started so far.
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  getStats(): RecorderStats {
    return { ...this.stats, pending: this.pending.size };
  }

  private handleConversationEnd(event: SupportEvent): void {
    const result = parsePayload(conversationEndSchema, event);
    if (!result.ok) {
      this.logger.warn(result.error, { eventId: event.id });
      return;
    }

    const { session_id: sessionId, status, reason, operator_id: operatorId } = result.data;
    const context = this.registry.get(sessionId);
    if (!context) {
      this.logger.warn(`No live session ${sessionId} to record`);
      return;
    }

    // A context reopened after the end carries its own, non-final status.
    if (this.closing.has(sessionId) && context.status !== status) {
      this.logger.info(`Transcript for ${sessionId} already being written; repeated end ignored`);
      return;
    }

    const record: TranscriptRecord = {
      session_id: sessionId,
      status,
      end_reason: reason,
      operator_id: operatorId ?? context.operatorId ?? null,
      ended_at: event.timestamp,
      conversation: toSnapshot(context),
    };

    let outcome: void | Promise<void>;
    try {
      outcome = this.writer.writeConversation(record);
    } catch (error) {
      this.registry.delete(sessionId);
      this.onWriteFailed(sessionId, error);
      return;
    }
    this.registry.delete(sessionId);

    if (!isPromise(outcome)) {
      this.onWritten(record);
      return;
    }

    this.closing.add(sessionId);
    const tracked: Promise<void> = outcome
      .then(
        () => this.onWritten(record),
        (error: unknown) => this.onWriteFailed(sessionId, error)
      )
      .finally(() => {
        this.closing.delete(sessionId);
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private onWritten(record: TranscriptRecord): void {
    this.stats.written++;
    this.logger.info(`Transcript recorded for ${record.session_id}`);
    this.broker.publish(EventTypes.TRANSCRIPT_SAVED, {
      session_id: record.session_id,
      status: record.status,
      end_reason: record.end_reason,
    });
  }

  private onWriteFailed(sessionId: string, error: unknown): void {
    this.stats.failed++;
    this.logger.error(`Transcript write failed for ${sessionId}: ${ErrorSanitizer.message(error)}`);
  }
}

function isPromise(value: unknown): value is Promise<unknown> {
  return value instanceof Promise;
}
