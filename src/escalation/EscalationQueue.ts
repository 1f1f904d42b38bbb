/**
 * EscalationQueue
 *
 * Waiting line of sessions handed to human operators.
 * Two-level priority: HIGH entries go ahead of everything else but stay
 * FIFO among themselves; NORMAL and LOW share the back of the line in
 * arrival order. Wait and handling times are derived from timestamps when
 * asked for, never tracked incrementally.
 */

import type { EscalationPriority, EscalationRecord, EventPayload } from "../types/index.js";
import { createLogger, type LayerLogger, type Logger } from "../utils/logger.js";

/** Placeholder average time an operator spends on one escalation */
export const DEFAULT_AVG_HANDLING_SECONDS = 300;

export type AssignResult =
  | { assigned: true; record: Readonly<EscalationRecord>; waitSeconds: number }
  | { assigned: false; reason: "QUEUE_EMPTY" };

export interface ResolveResult {
  record: Readonly<EscalationRecord>;
  handlingSeconds: number;
  totalSeconds: number;
}

export interface QueueEntryStatus {
  sessionId: string;
  reason: string;
  priority: EscalationPriority;
  position: number;
  waitingSeconds: number;
}

export interface QueueStatus {
  queueSize: number;
  activeEscalations: number;
  estimatedWaitSeconds: number;
  queue: QueueEntryStatus[];
}

export interface EscalationStats {
  totalEscalations: number;
  queued: number;
  assigned: number;
  resolved: number;
  /** Left the line because the conversation ended before an operator took it */
  withdrawn: number;
  byReason: Record<string, number>;
}

export interface EscalationQueueOptions {
  logger?: Logger;
  avgHandlingSeconds?: number;
}

export class EscalationQueue {
  private queue: EscalationRecord[] = [];
  /** Every escalation not yet resolved, queued or assigned */
  private active: Map<string, EscalationRecord> = new Map();
  private totals = { totalEscalations: 0, resolved: 0, withdrawn: 0 };
  private byReason: Map<string, number> = new Map();
  private readonly avgHandlingSeconds: number;
  private logger: LayerLogger;

  constructor(options: EscalationQueueOptions = {}) {
    this.avgHandlingSeconds = options.avgHandlingSeconds ?? DEFAULT_AVG_HANDLING_SECONDS;
    this.logger = (options.logger ?? createLogger()).forLayer("escalation");
  }

  /**
   * Add a session to the line and return its 1-based position.
   *
   * A session already waiting keeps its record and place; one already with
   * an operator reports position 0.
   */
  enqueue(
    sessionId: string,
    reason: string,
    details: Record<string, unknown> = {},
    priority: EscalationPriority = "NORMAL",
    snapshot: EventPayload | null = null
  ): number {
    const existing = this.active.get(sessionId);
    if (existing) {
      const position = this.positionOf(sessionId);
      this.logger.info(`Session ${sessionId} already escalated (${existing.status}); keeping position ${position}`);
      return position;
    }

    const record: EscalationRecord = {
      sessionId,
      reason,
      details: structuredClone(details),
      priority,
      status: "QUEUED",
      enqueuedAt: Date.now(),
      snapshot: snapshot === null ? null : structuredClone(snapshot),
    };

    let index = this.queue.length;
    if (priority === "HIGH") {
      const firstNonHigh = this.queue.findIndex((entry) => entry.priority !== "HIGH");
      index = firstNonHigh === -1 ? this.queue.length : firstNonHigh;
    }
    this.queue.splice(index, 0, record);
    this.active.set(sessionId, record);

    this.totals.totalEscalations++;
    this.byReason.set(reason, (this.byReason.get(reason) ?? 0) + 1);

    this.logger.info(`Queued ${sessionId} at position ${index + 1}`, { reason, priority });
    return index + 1;
  }

  /**
   * Hand the front of the line to an operator.
   */
  assignNext(operatorId: string): AssignResult {
    const record = this.queue.shift();
    if (!record) {
      this.logger.info(`No escalations waiting for operator ${operatorId}`);
      return { assigned: false, reason: "QUEUE_EMPTY" };
    }

    record.status = "ASSIGNED";
    record.operatorId = operatorId;
    record.assignedAt = Date.now();

    const waitSeconds = elapsedSeconds(record.enqueuedAt, record.assignedAt);
    this.logger.info(`Assigned ${record.sessionId} to operator ${operatorId}`, { waitSeconds });
    return { assigned: true, record, waitSeconds };
  }

  /**
   * Close an escalation. Unknown or already-resolved sessions are a logged
   * no-op returning undefined, since duplicate resolutions happen.
   */
  resolve(sessionId: string, operatorId: string, notes?: string): ResolveResult | undefined {
    const record = this.active.get(sessionId);
    if (!record) {
      this.logger.warn(`Resolve for ${sessionId} ignored: no active escalation`);
      return undefined;
    }

    if (record.status === "QUEUED") {
      this.queue = this.queue.filter((entry) => entry.sessionId !== sessionId);
    } else if (record.operatorId !== operatorId) {
      this.logger.warn(`Session ${sessionId} resolved by ${operatorId} but assigned to ${record.operatorId}`);
    }

    const now = Date.now();
    record.status = "RESOLVED";
    record.resolvedAt = now;
    record.operatorId = operatorId;
    record.notes = notes;

    this.active.delete(sessionId);
    this.totals.resolved++;

    const handlingSeconds = record.assignedAt === undefined ? 0 : elapsedSeconds(record.assignedAt, now);
    const totalSeconds = elapsedSeconds(record.enqueuedAt, now);
    this.logger.info(`Resolved ${sessionId}`, { operatorId, handlingSeconds, totalSeconds });
    return { record, handlingSeconds, totalSeconds };
  }

  /**
   * Take a still-waiting session out of the line and close its record.
   * Assigned, resolved and unknown sessions are left alone.
   */
  withdraw(sessionId: string): Readonly<EscalationRecord> | undefined {
    const record = this.active.get(sessionId);
    if (!record || record.status !== "QUEUED") {
      return undefined;
    }

    this.queue = this.queue.filter((entry) => entry.sessionId !== sessionId);
    record.status = "RESOLVED";
    record.resolvedAt = Date.now();
    this.active.delete(sessionId);
    this.totals.withdrawn++;

    this.logger.info(`Withdrew ${sessionId} from the line`, { reason: record.reason });
    return record;
  }

  /**
   * Expected wait for someone at `position`.
   */
  estimateWaitSeconds(position: number): number {
    return Math.max(0, position) * this.avgHandlingSeconds;
  }

  /**
   * 1-based position in line; 0 when assigned or unknown.
   */
  positionOf(sessionId: string): number {
    return this.queue.findIndex((entry) => entry.sessionId === sessionId) + 1;
  }

  get(sessionId: string): Readonly<EscalationRecord> | undefined {
    return this.active.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  size(): number {
    return this.queue.length;
  }

  getStatus(): QueueStatus {
    const now = Date.now();
    return {
      queueSize: this.queue.length,
      activeEscalations: this.active.size,
      estimatedWaitSeconds: this.estimateWaitSeconds(this.queue.length),
      queue: this.queue.map((entry, i) => ({
        sessionId: entry.sessionId,
        reason: entry.reason,
        priority: entry.priority,
        position: i + 1,
        waitingSeconds: elapsedSeconds(entry.enqueuedAt, now),
      })),
    };
  }

  getStats(): EscalationStats {
    return {
      totalEscalations: this.totals.totalEscalations,
      queued: this.queue.length,
      assigned: this.active.size - this.queue.length,
      resolved: this.totals.resolved,
      withdrawn: this.totals.withdrawn,
      byReason: Object.fromEntries(this.byReason),
    };
  }
}

function elapsedSeconds(from: number, to: number): number {
  return Math.max(0, Math.floor((to - from) / 1000));
}
