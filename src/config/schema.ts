// Configuration schema and defaults

import path from "path";
import { homedir } from "os";
import { z } from "zod";

export const DEFAULT_HOME = path.join(homedir(), ".deskflow");

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  /** Directory for JSONL log files; console only when unset */
  logsPath: z.string().min(1).optional(),
});

export const workflowConfigSchema = z.object({
  /** Sentiment labels that stop the pipeline at gate 1 (compared upper-cased) */
  escalationSentiments: z.array(z.string().min(1)).default(["NEGATIVE", "ANGRY"]),
  /** Gate 2 routes when confidence >= threshold */
  intentConfidenceThreshold: z.number().min(0).max(1).default(0.7),
  /** intent -> downstream task event */
  routes: z.record(z.string(), z.string().min(1)).default({
    track_order: "handle-order-tracking",
    process_return: "handle-returns",
    general_inquiry: "handle-general-inquiry",
    update_account: "handle-account",
  }),
  maxPublishDepth: z.number().int().positive().default(32),
});

export const escalationConfigSchema = z.object({
  /** Placeholder average an operator spends per escalation */
  avgHandlingSeconds: z.number().int().nonnegative().default(300),
});

export const watchdogConfigSchema = z.object({
  enabled: z.boolean().default(false),
  idleTimeoutMs: z.number().int().positive().default(15 * 60 * 1000),
  checkIntervalMs: z.number().int().positive().default(60 * 1000),
});

export const transcriptsConfigSchema = z.object({
  path: z.string().min(1).default(path.join(DEFAULT_HOME, "transcripts")),
});

export const gatewayConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(18790),
});

export const systemConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  workflow: workflowConfigSchema.default({}),
  escalation: escalationConfigSchema.default({}),
  watchdog: watchdogConfigSchema.default({}),
  transcripts: transcriptsConfigSchema.default({}),
  gateway: gatewayConfigSchema.default({}),
});

export type SystemConfig = z.infer<typeof systemConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;
export type EscalationConfig = z.infer<typeof escalationConfigSchema>;
export type WatchdogConfig = z.infer<typeof watchdogConfigSchema>;
export type TranscriptsConfig = z.infer<typeof transcriptsConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;

/** Input shape accepted before defaults are applied. */
export type SystemConfigInput = z.input<typeof systemConfigSchema>;
