/**
 * SessionWatchdog
 *
 * The workflow itself never times out a conversation. This interval timer
 * publishes conversation-timeout for ACTIVE sessions idle longer than the
 * configured limit; the coordinator treats that like any other terminal
 * trigger.
 */

import type { EventBroker } from "../broker/EventBroker.js";
import { EventTypes } from "../events/index.js";
import type { SessionRegistry } from "../sessions/SessionRegistry.js";
import type { WatchdogConfig } from "../types/index.js";
import { runWithTrace, type LayerLogger, type Logger } from "../utils/logger.js";

export interface SessionWatchdogDeps {
  broker: EventBroker;
  registry: SessionRegistry;
  logger: Logger;
  options: Pick<WatchdogConfig, "idleTimeoutMs" | "checkIntervalMs">;
}

export class SessionWatchdog {
  private broker: EventBroker;
  private registry: SessionRegistry;
  private logger: LayerLogger;
  private readonly idleTimeoutMs: number;
  private readonly checkIntervalMs: number;
  private interval: NodeJS.Timeout | null = null;
  private timedOut = 0;

  constructor(deps: SessionWatchdogDeps) {
    this.broker = deps.broker;
    this.registry = deps.registry;
    this.logger = deps.logger.forLayer("watchdog");
    this.idleTimeoutMs = deps.options.idleTimeoutMs;
    this.checkIntervalMs = deps.options.checkIntervalMs;
  }

  start(): void {
    if (this.interval) {
      return;
    }

    this.interval = setInterval(() => {
      runWithTrace("watchdog", () => this.sweep());
    }, this.checkIntervalMs);
    // Do not keep the process alive for the watchdog alone
    this.interval.unref();

    this.logger.info("Watchdog started", { idleTimeoutMs: this.idleTimeoutMs, checkIntervalMs: this.checkIntervalMs });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.logger.info("Watchdog stopped");
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Publish a timeout for every idle ACTIVE session. Returns their ids.
   */
  sweep(now: number = Date.now()): string[] {
    const idle = this.registry
      .list()
      .filter((context) => context.status === "ACTIVE" && now - context.lastActivityAt > this.idleTimeoutMs);

    const timedOut: string[] = [];
    for (const context of idle) {
      const idleSeconds = Math.floor((now - context.lastActivityAt) / 1000);
      this.logger.info(`Session ${context.sessionId} idle for ${idleSeconds}s`);
      try {
        this.broker.publish(EventTypes.CONVERSATION_TIMEOUT, {
          session_id: context.sessionId,
          idle_seconds: idleSeconds,
        });
        timedOut.push(context.sessionId);
      } catch (error) {
        this.logger.logError(`timeout of ${context.sessionId}`, error);
      }
    }

    this.timedOut += timedOut.length;
    return timedOut;
  }

  getStats(): { timedOut: number; running: boolean } {
    return { timedOut: this.timedOut, running: this.isRunning() };
  }
}
