// Core types for the deskflow support workflow

export type { SystemConfig, LoggingConfig, WorkflowConfig, EscalationConfig, WatchdogConfig, GatewayConfig } from "../config/schema.js";

/** Free-form key/value data carried by an event. */
export type EventPayload = Record<string, unknown>;

/**
 * Envelope for everything that travels through the broker.
 * Frozen once published; `id` is generated when the publisher supplies none.
 */
export interface SupportEvent<P extends EventPayload = EventPayload> {
  readonly id: string;
  readonly type: string;
  readonly payload: Readonly<P>;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type EventHandler = (event: SupportEvent) => void;

export type Sender = "USER" | "AGENT";

export type ConversationStatus = "ACTIVE" | "ESCALATED" | "RESOLVED" | "ABANDONED";

export type EscalationPriority = "HIGH" | "NORMAL" | "LOW";

export type EscalationStatus = "QUEUED" | "ASSIGNED" | "RESOLVED";

/**
 * One turn of a conversation. Append-only; only the labels are filled in
 * after the fact, on the most recent message of the matching sender.
 */
export interface Message {
  sender: Sender;
  text: string;
  timestamp: string;
  intentLabel?: string;
  sentimentLabel?: string;
  entities?: Record<string, unknown>;
  agentAction?: Record<string, unknown>;
}

export interface MessageExtras {
  intentLabel?: string;
  sentimentLabel?: string;
  entities?: Record<string, unknown>;
  agentAction?: Record<string, unknown>;
}

/**
 * Hot-path state of one live conversation, owned by the SessionRegistry.
 */
export interface ConversationContext {
  sessionId: string;
  startTime: string;
  customerEmail?: string;
  customerId?: string;
  status: ConversationStatus;
  currentSentiment?: string;
  sentimentConfidence?: number;
  currentIntent?: string;
  intentConfidence?: number;
  messages: Message[];
  /** Merged across the conversation, last write wins */
  entities: Record<string, unknown>;
  metadata: Record<string, unknown>;
  escalationReason?: string;
  operatorId?: string;
  /** ms since epoch; bumped by every registry mutation */
  lastActivityAt: number;
}

export interface SessionAttributes {
  customerEmail?: string;
  customerId?: string;
  metadata?: Record<string, unknown>;
}

/** Wire form of a message inside a conversation snapshot. */
export type MessageSnapshot = {
  sender: Sender;
  text: string;
  timestamp: string;
  intent_label?: string;
  sentiment_label?: string;
  entities?: Record<string, unknown>;
  agent_action?: Record<string, unknown>;
};

/**
 * Plain copy of a ConversationContext, shaped for event payloads and
 * transcript storage.
 */
export type ConversationSnapshot = {
  session_id: string;
  start_time: string;
  customer_email: string | null;
  customer_id: string | null;
  status: ConversationStatus;
  current_sentiment: string | null;
  sentiment_confidence: number | null;
  current_intent: string | null;
  intent_confidence: number | null;
  messages: MessageSnapshot[];
  entities: Record<string, unknown>;
  metadata: Record<string, unknown>;
  escalation_reason: string | null;
  operator_id: string | null;
};

/**
 * A session waiting for, or being handled by, a human operator.
 */
export interface EscalationRecord {
  sessionId: string;
  reason: string;
  details: Record<string, unknown>;
  priority: EscalationPriority;
  status: EscalationStatus;
  /** ms since epoch */
  enqueuedAt: number;
  assignedAt?: number;
  resolvedAt?: number;
  operatorId?: string;
  notes?: string;
  snapshot: EventPayload | null;
}

export type ServiceLayer =
  | "broker"
  | "registry"
  | "coordinator"
  | "escalation"
  | "classifier"
  | "transcript"
  | "watchdog"
  | "gateway"
  | "config"
  | "cli";

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  layer: ServiceLayer;
  startTime: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  layer?: ServiceLayer;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  id: string | number;
  method: string;
  params?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}
