/**
 * SessionRegistry
 *
 * In-memory store for the live state of every active conversation.
 * Contexts are created lazily on the first message and leave only through
 * `delete`, after a terminal event.
 *
 * Every operation here is synchronous, so each one runs to completion on the
 * event loop before any other caller can observe the table; that is the
 * table-wide exclusion the workflow relies on. Field-level mutations of a
 * single session are expected from one logical owner at a time (the
 * Coordinator).
 */

import type {
  ConversationContext,
  ConversationStatus,
  Message,
  MessageExtras,
  Sender,
  SessionAttributes,
} from "../types/index.js";
import { SessionExistsError } from "../utils/errors.js";
import { createLogger, type LayerLogger, type Logger } from "../utils/logger.js";

export interface RegistryStats {
  sessionsCreated: number;
  sessionsActive: number;
  sessionsEnded: number;
  totalMessages: number;
}

export class SessionRegistry {
  private contexts: Map<string, ConversationContext> = new Map();
  private stats = { sessionsCreated: 0, sessionsEnded: 0, totalMessages: 0 };
  private logger: LayerLogger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? createLogger()).forLayer("registry");
  }

  /**
   * Create a new session.
   * @throws SessionExistsError when the id is already present
   */
  createSession(sessionId: string, attrs: SessionAttributes = {}): Readonly<ConversationContext> {
    if (this.contexts.has(sessionId)) {
      throw new SessionExistsError(sessionId);
    }

    const now = Date.now();
    const context: ConversationContext = {
      sessionId,
      startTime: new Date(now).toISOString(),
      customerEmail: attrs.customerEmail,
      customerId: attrs.customerId,
      status: "ACTIVE",
      messages: [],
      entities: {},
      metadata: { ...attrs.metadata },
      lastActivityAt: now,
    };

    this.contexts.set(sessionId, context);
    this.stats.sessionsCreated++;

    this.logger.info(`Session created: ${sessionId}`);
    return context;
  }

  get(sessionId: string): Readonly<ConversationContext> | undefined {
    return this.contexts.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.contexts.has(sessionId);
  }

  /**
   * Existing session, or a new one built from `attrs`.
   * Attributes are ignored when the session already exists.
   */
  getOrCreate(sessionId: string, attrs: SessionAttributes = {}): Readonly<ConversationContext> {
    return this.contexts.get(sessionId) ?? this.createSession(sessionId, attrs);
  }

  /**
   * Append a message. Returns undefined for an unknown session.
   */
  addMessage(sessionId: string, sender: Sender, text: string, extra: MessageExtras = {}): Readonly<Message> | undefined {
    const context = this.contexts.get(sessionId);
    if (!context) {
      this.logger.warn(`Cannot add message to unknown session: ${sessionId}`);
      return undefined;
    }

    const message: Message = {
      sender,
      text,
      timestamp: new Date().toISOString(),
      ...extra,
    };

    context.messages.push(message);
    this.touch(context);
    this.stats.totalMessages++;

    this.logger.debug(`Added ${sender} message to session ${sessionId}`, { messages: context.messages.length });
    return message;
  }

  /**
   * Record the current sentiment and label the latest USER message with it.
   */
  updateSentiment(sessionId: string, sentiment: string, confidence?: number): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "updateSentiment");
    if (!context) {return undefined;}

    context.currentSentiment = sentiment;
    context.sentimentConfidence = confidence;
    const last = this.lastMessageFrom(context, "USER");
    if (last) {
      last.sentimentLabel = sentiment;
    }

    this.touch(context);
    return context;
  }

  /**
   * Record the current intent and label the latest USER message with it.
   */
  updateIntent(sessionId: string, intent: string, confidence: number): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "updateIntent");
    if (!context) {return undefined;}

    context.currentIntent = intent;
    context.intentConfidence = confidence;
    const last = this.lastMessageFrom(context, "USER");
    if (last) {
      last.intentLabel = intent;
    }

    this.touch(context);
    return context;
  }

  /**
   * Merge entities into the session (last write wins) and into the latest
   * USER message.
   */
  mergeEntities(sessionId: string, entities: Record<string, unknown>): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "mergeEntities");
    if (!context) {return undefined;}

    Object.assign(context.entities, structuredClone(entities));
    const last = this.lastMessageFrom(context, "USER");
    if (last) {
      last.entities = { ...last.entities, ...structuredClone(entities) };
    }

    this.touch(context);
    return context;
  }

  markEscalated(sessionId: string, reason: string): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "markEscalated");
    if (!context) {return undefined;}

    context.status = "ESCALATED";
    context.escalationReason = reason;
    this.touch(context);
    return context;
  }

  assignOperator(sessionId: string, operatorId: string): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "assignOperator");
    if (!context) {return undefined;}

    context.operatorId = operatorId;
    this.touch(context);
    return context;
  }

  setStatus(sessionId: string, status: ConversationStatus): Readonly<ConversationContext> | undefined {
    const context = this.require(sessionId, "setStatus");
    if (!context) {return undefined;}

    context.status = status;
    this.touch(context);
    return context;
  }

  /**
   * Remove a session. The only way a context leaves the registry.
   */
  delete(sessionId: string): Readonly<ConversationContext> | undefined {
    const context = this.contexts.get(sessionId);
    if (!context) {
      return undefined;
    }

    this.contexts.delete(sessionId);
    this.stats.sessionsEnded++;
    this.logger.info(`Session deleted: ${sessionId}`);
    return context;
  }

  count(): number {
    return this.contexts.size;
  }

  list(): Readonly<ConversationContext>[] {
    return Array.from(this.contexts.values());
  }

  sessionIds(): string[] {
    return Array.from(this.contexts.keys());
  }

  getStats(): RegistryStats {
    return {
      ...this.stats,
      sessionsActive: this.contexts.size,
    };
  }

  /**
   * Drop every session. Does not count them as ended.
   */
  clear(): number {
    const removed = this.contexts.size;
    this.contexts.clear();
    this.logger.warn(`Cleared all sessions (removed ${removed})`);
    return removed;
  }

  private require(sessionId: string, operation: string): ConversationContext | undefined {
    const context = this.contexts.get(sessionId);
    if (!context) {
      this.logger.warn(`${operation}: unknown session ${sessionId}`);
    }
    return context;
  }

  private lastMessageFrom(context: ConversationContext, sender: Sender): Message | undefined {
    for (let i = context.messages.length - 1; i >= 0; i--) {
      const message = context.messages[i];
      if (message?.sender === sender) {
        return message;
      }
    }
    return undefined;
  }

  private touch(context: ConversationContext): void {
    context.lastActivityAt = Date.now();
  }
}
