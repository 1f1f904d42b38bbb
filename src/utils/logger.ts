// Layered logger with trace context propagation

import fs from "fs";
import path from "path";
import { AsyncLocalStorage } from "async_hooks";
import type { LogEntry, LogLevel, ServiceLayer, TraceContext } from "../types/index.js";

/**
 * Generate a short unique ID for trace/span identification.
 */
function generateId(): string {
  return Math.random().toString(36).substring(2, 10) + Date.now().toString(36);
}

/**
 * AsyncLocalStorage for propagating trace context across nested dispatches
 * and async boundaries.
 */
const traceStorage = new AsyncLocalStorage<TraceContext>();

export function getTraceContext(): TraceContext | undefined {
  return traceStorage.getStore();
}

function childContext(layer: ServiceLayer): TraceContext {
  const parent = getTraceContext();
  return {
    traceId: parent?.traceId ?? generateId(),
    spanId: generateId(),
    parentSpanId: parent?.spanId,
    layer,
    startTime: Date.now(),
  };
}

/**
 * Run a function within a trace context.
 * A nested call inherits the trace id of the enclosing one.
 */
export function runWithTrace<T>(layer: ServiceLayer, fn: () => T): T {
  return traceStorage.run(childContext(layer), fn);
}

export async function runWithTraceAsync<T>(layer: ServiceLayer, fn: () => Promise<T>): Promise<T> {
  return traceStorage.run(childContext(layer), fn);
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for daily JSONL files */
  logsPath?: string;
}

export class Logger {
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private fileErrorLogged = false;
  private defaultLayer?: ServiceLayer;

  constructor(options: LoggerOptions = {}, defaultLayer?: ServiceLayer) {
    this.defaultLayer = defaultLayer;
    this.minLevel = options.level ?? "info";
    if (options.logsPath) {
      const date = new Date().toISOString().split("T")[0];
      this.logFile = path.join(options.logsPath, `deskflow-${date}.log`);
    }
  }

  /**
   * Create a child logger bound to a specific service layer.
   */
  forLayer(layer: ServiceLayer): LayerLogger {
    return new LayerLogger(this, layer);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    layer?: ServiceLayer
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const traceCtx = getTraceContext();
    const effectiveLayer = layer ?? this.defaultLayer ?? traceCtx?.layer;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
      layer: effectiveLayer,
      traceId: traceCtx?.traceId,
      spanId: traceCtx?.spanId,
      parentSpanId: traceCtx?.parentSpanId,
    };

    const colors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const layerColors: Record<ServiceLayer, string> = {
      broker: "\x1b[35m", // magenta
      registry: "\x1b[94m", // bright blue
      coordinator: "\x1b[34m", // blue
      escalation: "\x1b[91m", // bright red
      classifier: "\x1b[95m", // bright magenta
      transcript: "\x1b[96m", // bright cyan
      watchdog: "\x1b[93m", // bright yellow
      gateway: "\x1b[35m", // magenta
      config: "\x1b[90m", // gray
      cli: "\x1b[90m", // gray
    };
    const reset = "\x1b[0m";
    const dim = "\x1b[2m";

    const levelPrefix = `${colors[level]}[${level.toUpperCase().padEnd(5)}]${reset}`;
    const layerPrefix = effectiveLayer
      ? `${layerColors[effectiveLayer]}[${effectiveLayer.toUpperCase().padEnd(12)}]${reset}`
      : "[            ]";
    const tracePrefix = traceCtx?.traceId
      ? `${dim}[${traceCtx.traceId.substring(0, 8)}]${reset}`
      : "";

    const line = `${levelPrefix} ${layerPrefix} ${tracePrefix} ${message}`;
    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, JSON.stringify(entry, errorReplacer) + "\n");
      } catch (err) {
        if (!this.fileErrorLogged) {
          console.error(`[LOGGER ERROR] Failed to write to log file: ${this.logFile}`, err);
          this.fileErrorLogged = true;
        }
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("debug", message, context, layer);
  }

  info(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("info", message, context, layer);
  }

  warn(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("warn", message, context, layer);
  }

  error(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("error", message, context, layer);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Layer-specific logger that automatically tags logs with a service layer.
 */
export class LayerLogger {
  constructor(
    private parent: Logger,
    private layer: ServiceLayer
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, context, this.layer);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, context, this.layer);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, context, this.layer);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, context, this.layer);
  }

  /**
   * Log the start of an operation with input data.
   */
  logInput(operation: string, input: unknown): void {
    this.debug(`→ ${operation}`, { input: sanitizeForLog(input) });
  }

  /**
   * Log the completion of an operation with output data and duration.
   */
  logOutput(operation: string, output: unknown, startTime: number): void {
    const durationMs = Date.now() - startTime;
    this.debug(`← ${operation} (${durationMs}ms)`, {
      output: sanitizeForLog(output),
      durationMs,
    });
  }

  logError(operation: string, error: unknown, startTime?: number): void {
    const durationMs = startTime ? Date.now() - startTime : undefined;
    this.error(`✗ ${operation} failed${durationMs !== undefined ? ` (${durationMs}ms)` : ""}`, {
      error: error instanceof Error ? { message: error.message, stack: error.stack } : error,
      durationMs,
    });
  }
}

const SENSITIVE_KEYS = ["password", "token", "secret", "apikey", "api_key", "authorization"];

/**
 * Truncate large values and redact sensitive fields before logging.
 */
export function sanitizeForLog(data: unknown, maxDepth = 3, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]";
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === "string") {
    return data.length > 500 ? data.substring(0, 500) + "...[truncated]" : data;
  }

  if (typeof data !== "object") {
    return data;
  }

  if (Array.isArray(data)) {
    const head = data.slice(0, 10).map((item) => sanitizeForLog(item, maxDepth, currentDepth + 1));
    return data.length > 10 ? [...head, `...[${data.length - 10} more]`] : head;
  }

  const sanitized: Record<string, unknown> = {};
  const entries = Object.entries(data);

  for (const [key, value] of entries.slice(0, 20)) {
    if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = sanitizeForLog(value, maxDepth, currentDepth + 1);
    }
  }
  if (entries.length > 20) {
    sanitized["..."] = `[${entries.length - 20} more keys]`;
  }

  return sanitized;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(options?: LoggerOptions, defaultLayer?: ServiceLayer): Logger {
  return new Logger(options, defaultLayer);
}
