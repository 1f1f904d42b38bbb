/**
 * Simulate command - run customer turns through an in-process workflow
 */

import { createDemoIntentClassifier, createDemoSentimentClassifier } from "../../agents/ScriptedClassifier.js";
import { loadConfig } from "../../config/index.js";
import { EventTypes } from "../../events/index.js";
import { SupportRuntime, type RuntimeStats } from "../../runtime/SupportRuntime.js";
import type { TranscriptRecord } from "../../transcripts/types.js";
import type { EventPayload, SystemConfig } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";
import type { CliOptions, EventLine, SimulatedTurn } from "../types.js";
import { formatAsTable, printHeader, printInfo } from "../utils/output.js";

export interface SimulationOptions {
  config?: SystemConfig;
  /** Answer every routed task with a final reply */
  resolve?: boolean;
  /** Operator that picks up and closes every escalation */
  operator?: string;
}

export interface SimulationResult {
  events: EventLine[];
  transcripts: TranscriptRecord[];
  stats: RuntimeStats;
}

const SUMMARY_LIMIT = 60;

/**
 * One-line rendering of a payload without its session id.
 */
export function summarizePayload(payload: Readonly<EventPayload>): string {
  return Object.entries(payload)
    .filter(([key]) => key !== "session_id")
    .map(([key, value]) => {
      const text = typeof value === "string" ? value : JSON.stringify(value);
      const shown = text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT - 3)}...` : text;
      return `${key}=${shown}`;
    })
    .join(" ");
}

/**
 * Run turns in order against a fresh runtime and record every event.
 */
export async function runSimulation(turns: SimulatedTurn[], options: SimulationOptions = {}): Promise<SimulationResult> {
  const config = options.config ?? loadConfig();
  const transcripts: TranscriptRecord[] = [];
  const runtime = new SupportRuntime({
    config: { ...config, watchdog: { ...config.watchdog, enabled: false } },
    logger: createLogger({ ...config.logging, level: "error" }),
    transcriptWriter: {
      writeConversation: (record) => {
        transcripts.push(record);
      },
    },
    sentimentClassifier: createDemoSentimentClassifier(),
    intentClassifier: createDemoIntentClassifier(),
  });

  const events: EventLine[] = [];
  const observed = new Set<string>([...Object.values(EventTypes), ...Object.values(config.workflow.routes)]);
  for (const eventType of observed) {
    runtime.broker.subscribe(eventType, (event) => {
      const sessionId = event.payload.session_id;
      events.push({
        type: event.type,
        session: typeof sessionId === "string" ? sessionId : "-",
        summary: summarizePayload(event.payload),
      });
    });
  }

  runtime.start();

  if (options.resolve) {
    for (const routeEvent of new Set(Object.values(config.workflow.routes))) {
      runtime.broker.subscribe(routeEvent, (event) => {
        const sessionId = event.payload.session_id;
        if (typeof sessionId !== "string") {
          return;
        }
        runtime.broker.publish(EventTypes.AGENT_RESPONSE, {
          session_id: sessionId,
          text: `Handled by ${routeEvent}`,
          agent: routeEvent,
          final: true,
        });
      });
    }
  }

  for (const turn of turns) {
    runtime.broker.publish(EventTypes.NEW_MESSAGE, { session_id: turn.sessionId, text: turn.text });
  }

  const operatorId = options.operator;
  if (operatorId) {
    while (runtime.escalationQueue.getStatus().queueSize > 0) {
      runtime.broker.publish(EventTypes.OPERATOR_AVAILABLE, { operator_id: operatorId });
      const assigned = runtime.registry.list().find((context) => context.operatorId === operatorId);
      if (!assigned) {
        break;
      }
      runtime.broker.publish(EventTypes.ESCALATION_RESOLVED, { session_id: assigned.sessionId, operator_id: operatorId });
    }
  }

  await runtime.shutdown();
  return { events, transcripts, stats: runtime.getStats() };
}

/** Simulate command */
export async function simulateCommand(
  texts: string[],
  options: CliOptions & { session?: string; resolve?: boolean; operator?: string }
): Promise<void> {
  const sessionId = options.session ?? "sim-1";
  const turns = texts.map((text) => ({ sessionId, text }));
  const result = await runSimulation(turns, {
    config: loadConfig(options.config),
    resolve: options.resolve,
    operator: options.operator,
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  printHeader("Events");
  console.log(formatAsTable(result.events));

  printHeader("Conversations ended");
  console.log(
    formatAsTable(
      result.transcripts.map((record) => ({
        session: record.session_id,
        status: record.status,
        reason: record.end_reason,
        operator: record.operator_id,
        messages: record.conversation.messages.length,
      }))
    )
  );

  const open = result.stats.registry.sessionsActive;
  if (open > 0) {
    printInfo(`${open} conversation(s) still open`);
  }
}
