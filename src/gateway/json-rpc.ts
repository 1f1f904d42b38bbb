// JSON-RPC Protocol Handler

import { randomUUID } from "crypto";
import { z } from "zod";
import type { JsonRpcError, JsonRpcRequest, JsonRpcResponse } from "../types/index.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";
import { InvalidParamsError } from "../utils/errors.js";
import { createLogger, runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";

export type JsonRpcHandler = (params: unknown) => Promise<unknown>;

const idSchema = z.union([z.string(), z.number()]);

const requestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: idSchema.nullable().optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export class JsonRpcServer {
  private handlers = new Map<string, JsonRpcHandler>();
  private logger: LayerLogger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? createLogger()).forLayer("gateway");
  }

  register(method: string, handler: JsonRpcHandler): void {
    this.handlers.set(method, handler);
  }

  /**
   * Register multiple handlers at once.
   */
  registerBatch(handlers: Map<string, JsonRpcHandler>): void {
    for (const [method, handler] of handlers.entries()) {
      this.handlers.set(method, handler);
    }
  }

  unregister(method: string): void {
    this.handlers.delete(method);
  }

  methods(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /**
   * Handle one raw message. Returns the serialized response, or null for a
   * notification (a request without id).
   */
  async handleMessage(message: string): Promise<string | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(message);
    } catch {
      return this.createError(null, JsonRpcServer.Errors.ParseError, "Parse error");
    }

    const parsed = requestSchema.safeParse(raw);
    if (!parsed.success) {
      return this.createError(extractId(raw), JsonRpcServer.Errors.InvalidRequest, "Invalid Request");
    }

    const { id, method, params } = parsed.data;
    const response = await this.handleRequest({ method, params }, id ?? null);
    return id === undefined ? null : response;
  }

  private async handleRequest(request: Omit<JsonRpcRequest, "id">, responseId: string | number | null): Promise<string> {
    const handler = this.handlers.get(request.method);

    if (!handler) {
      return this.createError(responseId, JsonRpcServer.Errors.MethodNotFound, "Method not found");
    }

    // Params must be an object or array if present
    if (request.params !== undefined && request.params !== null && typeof request.params !== "object") {
      return this.createError(responseId, JsonRpcServer.Errors.InvalidParams, "Invalid params", "params must be an object or array");
    }

    return runWithTraceAsync("gateway", async () => {
      const startTime = Date.now();
      this.logger.logInput(request.method, request.params);
      try {
        const result = await handler(request.params);
        this.logger.logOutput(request.method, result, startTime);
        return this.createResult(responseId, result);
      } catch (error) {
        if (error instanceof InvalidParamsError) {
          return this.createError(responseId, JsonRpcServer.Errors.InvalidParams, "Invalid params", error.issues);
        }
        this.logger.logError(request.method, error, startTime);
        return this.createError(responseId, JsonRpcServer.Errors.InternalError, "Internal error", ErrorSanitizer.message(error));
      }
    });
  }

  private createResult(id: string | number | null, result: unknown): string {
    const response: JsonRpcResponse = {
      jsonrpc: "2.0",
      id,
      result: result ?? null,
    };
    return JSON.stringify(response);
  }

  private createError(id: string | number | null, code: number, message: string, data?: unknown): string {
    const error: JsonRpcError = { code, message };
    if (data !== undefined) {
      error.data = data;
    }

    const response: JsonRpcResponse = {
      jsonrpc: "2.0",
      id,
      error,
    };
    return JSON.stringify(response);
  }

  // Standard error codes
  static readonly Errors = {
    ParseError: -32700,
    InvalidRequest: -32600,
    MethodNotFound: -32601,
    InvalidParams: -32602,
    InternalError: -32603,
  } as const;
}

/**
 * Validate handler params, throwing InvalidParamsError on failure.
 */
export function parseParams<S extends z.ZodTypeAny>(method: string, schema: S, params: unknown): z.infer<S> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new InvalidParamsError(
      method,
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "params"}: ${issue.message}`)
    );
  }
  return result.data;
}

function extractId(raw: unknown): string | number | null {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const id = idSchema.safeParse(raw.id);
    return id.success ? id.data : null;
  }
  return null;
}

export function createRequest(method: string, params?: unknown, id?: string | number): string {
  return JSON.stringify({
    jsonrpc: "2.0",
    id: id ?? randomUUID(),
    method,
    params,
  });
}

export function createNotification(method: string, params?: unknown): string {
  return JSON.stringify({
    jsonrpc: "2.0",
    method,
    params,
  });
}
