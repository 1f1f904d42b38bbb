/**
 * SupportRuntime
 *
 * Composition root. Builds one isolated set of workflow components around a
 * fresh broker and registry; nothing is shared through module state, so any
 * number of runtimes can live side by side (one per test, for instance).
 */

import { EventBroker, type BrokerStats } from "../broker/EventBroker.js";
import { getDefaultConfig } from "../config/index.js";
import { ClassificationAgent } from "../agents/ClassificationAgent.js";
import type { Classifier } from "../agents/types.js";
import { EscalationAgent } from "../escalation/EscalationAgent.js";
import { EscalationQueue, type EscalationStats } from "../escalation/EscalationQueue.js";
import { Coordinator, type CoordinatorStats } from "../orchestrator/Coordinator.js";
import { SessionRegistry, type RegistryStats } from "../sessions/SessionRegistry.js";
import { JsonlTranscriptWriter } from "../transcripts/JsonlTranscriptWriter.js";
import { TranscriptRecorder, type RecorderStats } from "../transcripts/TranscriptRecorder.js";
import type { TranscriptWriter } from "../transcripts/types.js";
import type { SystemConfig } from "../types/index.js";
import { createLogger, type LayerLogger, type Logger } from "../utils/logger.js";
import { SessionWatchdog } from "../watchdog/SessionWatchdog.js";

export interface SupportRuntimeOptions {
  config?: SystemConfig;
  logger?: Logger;
  /** Defaults to daily JSONL files under `transcripts.path` */
  transcriptWriter?: TranscriptWriter;
  /** Without one, sentiment-task is left to external subscribers */
  sentimentClassifier?: Classifier;
  intentClassifier?: Classifier;
}

export interface RuntimeStats {
  broker: BrokerStats;
  coordinator: CoordinatorStats;
  registry: RegistryStats;
  escalation: EscalationStats;
  transcripts: RecorderStats;
  watchdog: { timedOut: number; running: boolean } | null;
}

export class SupportRuntime {
  readonly config: SystemConfig;
  readonly logger: Logger;
  readonly broker: EventBroker;
  readonly registry: SessionRegistry;
  readonly coordinator: Coordinator;
  readonly escalationQueue: EscalationQueue;
  readonly escalationAgent: EscalationAgent;
  readonly recorder: TranscriptRecorder;
  readonly watchdog: SessionWatchdog | null;
  readonly classificationAgents: ClassificationAgent[] = [];
  private log: LayerLogger;
  private started = false;

  constructor(options: SupportRuntimeOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.logger = options.logger ?? createLogger(this.config.logging);
    this.log = this.logger.forLayer("coordinator");

    this.broker = new EventBroker({ logger: this.logger, maxPublishDepth: this.config.workflow.maxPublishDepth });
    this.registry = new SessionRegistry(this.logger);
    this.coordinator = new Coordinator({
      broker: this.broker,
      registry: this.registry,
      logger: this.logger,
      workflow: this.config.workflow,
    });
    this.escalationQueue = new EscalationQueue({
      logger: this.logger,
      avgHandlingSeconds: this.config.escalation.avgHandlingSeconds,
    });
    this.escalationAgent = new EscalationAgent({ broker: this.broker, queue: this.escalationQueue, logger: this.logger });
    this.recorder = new TranscriptRecorder({
      broker: this.broker,
      registry: this.registry,
      writer: options.transcriptWriter ?? new JsonlTranscriptWriter(this.config.transcripts.path, this.logger),
      logger: this.logger,
    });

    if (options.sentimentClassifier) {
      this.classificationAgents.push(
        new ClassificationAgent({ broker: this.broker, classifier: options.sentimentClassifier, kind: "sentiment", logger: this.logger })
      );
    }
    if (options.intentClassifier) {
      this.classificationAgents.push(
        new ClassificationAgent({ broker: this.broker, classifier: options.intentClassifier, kind: "intent", logger: this.logger })
      );
    }

    this.watchdog = this.config.watchdog.enabled
      ? new SessionWatchdog({
          broker: this.broker,
          registry: this.registry,
          logger: this.logger,
          options: this.config.watchdog,
        })
      : null;
  }

  /**
   * Subscribe every component. The coordinator goes first so that it sees
   * each event before observers of the same type.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.coordinator.start();
    this.escalationAgent.start();
    this.recorder.start();
    for (const agent of this.classificationAgents) {
      agent.start();
    }
    this.watchdog?.start();
    this.started = true;
    this.log.info("Support runtime started", { classifiers: this.classificationAgents.map((a) => a.name) });
  }

  /**
   * Stop timers, let in-flight classifications and transcript writes
   * finish, then detach from the broker.
   */
  async shutdown(): Promise<void> {
    this.watchdog?.stop();
    for (const agent of this.classificationAgents) {
      await agent.drain();
    }
    await this.recorder.flush();

    for (const agent of this.classificationAgents) {
      agent.stop();
    }
    this.recorder.stop();
    this.escalationAgent.stop();
    this.coordinator.stop();
    this.started = false;
    this.log.info("Support runtime stopped");
  }

  isStarted(): boolean {
    return this.started;
  }

  getStats(): RuntimeStats {
    return {
      broker: this.broker.getStats(),
      coordinator: this.coordinator.getStats(),
      registry: this.registry.getStats(),
      escalation: this.escalationQueue.getStats(),
      transcripts: this.recorder.getStats(),
      watchdog: this.watchdog?.getStats() ?? null,
    };
  }
}

export function createSupportRuntime(options?: SupportRuntimeOptions): SupportRuntime {
  return new SupportRuntime(options);
}
