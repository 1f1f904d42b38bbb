/**
 * WebSocket RPC client for Gateway communication
 */

import WebSocket from "ws";
import { z } from "zod";
import type { RpcCallOptions } from "../types.js";

const responseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number()]).nullable(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const notificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.unknown().optional(),
});

export type NotificationListener = (method: string, params: unknown) => void;

/** Gateway RPC client */
export class GatewayRpcClient {
  private ws: WebSocket | null = null;
  private messageId = 0;
  private listeners: NotificationListener[] = [];
  private pendingRequests = new Map<number | string, {
    resolve: (value: unknown) => void;
    reject: (error: Error) => void;
  }>();

  constructor(
    private host: string = "127.0.0.1",
    private port: number = 18790,
    private timeout: number = 5000
  ) {}

  /** Connect to Gateway */
  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const url = `ws://${this.host}:${this.port}`;
      const ws = new WebSocket(url);
      this.ws = ws;

      ws.on("open", () => {
        resolve();
      });

      ws.on("error", (error) => {
        reject(new Error(`Failed to connect to Gateway: ${error.message}`));
      });

      ws.on("message", (data) => {
        this.handleMessage(data.toString());
      });

      ws.on("close", () => {
        for (const { reject: rejectPending } of this.pendingRequests.values()) {
          rejectPending(new Error("Connection closed"));
        }
        this.pendingRequests.clear();
      });
    });
  }

  /** Call RPC method */
  async call(method: string, params: Record<string, unknown> = {}, options?: RpcCallOptions): Promise<unknown> {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      await this.connect();
    }
    const ws = this.ws;
    if (!ws) {
      throw new Error("Not connected to Gateway");
    }

    const id = ++this.messageId;
    const request = JSON.stringify({ jsonrpc: "2.0", id, method, params });

    return new Promise((resolve, reject) => {
      const timeoutMs = options?.timeout ?? this.timeout;

      const timer = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new Error(`RPC call timeout: ${method}`));
      }, timeoutMs);

      this.pendingRequests.set(id, {
        resolve: (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      });

      ws.send(request, (error) => {
        if (error) {
          clearTimeout(timer);
          this.pendingRequests.delete(id);
          reject(error);
        }
      });
    });
  }

  /** Receive server notifications (relayed broker events) */
  onNotification(listener: NotificationListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  /** Handle incoming message */
  handleMessage(raw: string): void {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      return;
    }

    const response = responseSchema.safeParse(message);
    if (response.success && response.data.id !== null) {
      const handlers = this.pendingRequests.get(response.data.id);
      if (!handlers) {
        return;
      }
      this.pendingRequests.delete(response.data.id);

      const { error, result } = response.data;
      if (error) {
        handlers.reject(new Error(`${error.message} (${error.code})${error.data !== undefined ? `: ${JSON.stringify(error.data)}` : ""}`));
      } else {
        handlers.resolve(result ?? null);
      }
      return;
    }

    const notification = notificationSchema.safeParse(message);
    if (notification.success) {
      for (const listener of this.listeners) {
        listener(notification.data.method, notification.data.params);
      }
    }
  }

  /** Close connection */
  close(): void {
    this.ws?.close();
    this.ws = null;
  }

  /** Check if connected */
  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }
}
