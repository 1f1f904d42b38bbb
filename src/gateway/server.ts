// WebSocket Gateway Server

import { WebSocketServer, WebSocket } from "ws";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { SupportRuntime } from "../runtime/SupportRuntime.js";
import { EventTypes } from "../events/index.js";
import type { SupportEvent } from "../types/index.js";
import { JsonRpcServer, createNotification, parseParams } from "./json-rpc.js";
import { createSupportHandlers } from "./handlers/support.handler.js";
import { createLogger, type Logger, type LayerLogger } from "../utils/logger.js";

/** Broker events pushed to every connected client */
export const OUTBOUND_EVENTS: readonly string[] = [
  EventTypes.ESCALATION_QUEUED,
  EventTypes.OPERATOR_NOTIFICATION,
  EventTypes.OPERATOR_ASSIGNED,
  EventTypes.ESCALATION_CLOSED,
  EventTypes.AGENT_RESPONSE,
  EventTypes.CONVERSATION_END,
  EventTypes.TRANSCRIPT_SAVED,
];

export interface ClientInfo {
  id: string;
  type: string;
  version?: string;
  connectedAt: number;
}

export interface GatewayServerOptions {
  host: string;
  port: number;
  logger?: Logger;
}

const connectSchema = z.object({
  clientType: z.string().min(1),
  version: z.string().optional(),
});

const disconnectSchema = z.object({ clientId: z.string().min(1) });

/**
 * Serialize a broker event as an `event` notification.
 */
export function eventNotification(event: SupportEvent): string {
  return createNotification("event", {
    type: event.type,
    id: event.id,
    timestamp: event.timestamp,
    payload: event.payload,
  });
}

export class GatewayServer {
  private wss: WebSocketServer | null = null;
  private rpc: JsonRpcServer;
  private clients = new Map<string, ClientInfo>();
  private sockets = new Map<string, WebSocket>();
  private unsubscribers: Array<() => void> = [];
  private layerLogger: LayerLogger;

  constructor(
    private runtime: SupportRuntime,
    private options: GatewayServerOptions
  ) {
    const logger = options.logger ?? createLogger();
    this.layerLogger = logger.forLayer("gateway");
    this.rpc = new JsonRpcServer(logger);
    this.setupHandlers();
  }

  /**
   * Events relayed to clients: the fixed outbound set plus every route
   * target, so business handlers can live on the other end of a socket.
   */
  relayedEvents(): string[] {
    const routeTargets = Object.values(this.runtime.config.workflow.routes);
    return Array.from(new Set([...OUTBOUND_EVENTS, ...routeTargets]));
  }

  getRpc(): JsonRpcServer {
    return this.rpc;
  }

  private setupHandlers(): void {
    this.rpc.registerBatch(createSupportHandlers(this.runtime));

    // connect: client registration
    this.rpc.register("connect", async (params) => {
      const { clientType, version } = parseParams("connect", connectSchema, params);
      const clientInfo: ClientInfo = {
        id: randomUUID(),
        type: clientType,
        version,
        connectedAt: Date.now(),
      };

      this.clients.set(clientInfo.id, clientInfo);
      this.layerLogger.info(`Client connected: ${clientType}`, { clientId: clientInfo.id, version });
      return { clientId: clientInfo.id, ...clientInfo, methods: this.rpc.methods() };
    });

    // disconnect: client deregistration
    this.rpc.register("disconnect", async (params) => {
      const { clientId } = parseParams("disconnect", disconnectSchema, params);
      const removed = this.clients.delete(clientId);
      this.layerLogger.info(`Client disconnected: ${clientId}`);
      return { success: removed };
    });
  }

  async start(): Promise<void> {
    const { host, port } = this.options;
    await new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });
      this.wss = wss;

      wss.on("listening", () => {
        this.layerLogger.info(`Gateway listening on ${host}:${port}`);
        resolve();
      });

      wss.on("error", (error) => {
        this.layerLogger.error("Gateway error", { error: error.message });
        reject(error);
      });

      wss.on("connection", (ws, req) => {
        const socketId = randomUUID();
        this.sockets.set(socketId, ws);
        this.layerLogger.info(`WebSocket connected: ${socketId} from ${req.socket.remoteAddress ?? "unknown"}`);

        ws.on("message", (data) => {
          this.rpc
            .handleMessage(data.toString())
            .then((response) => {
              if (response) {
                ws.send(response);
              }
            })
            .catch((error: unknown) => {
              this.layerLogger.logError("message", error);
            });
        });

        ws.on("close", () => {
          this.sockets.delete(socketId);
          this.layerLogger.info(`WebSocket disconnected: ${socketId}`);
        });

        ws.on("error", (error) => {
          this.layerLogger.error(`WebSocket error: ${socketId}`, { error: error.message });
        });
      });
    });

    for (const eventType of this.relayedEvents()) {
      this.unsubscribers.push(this.runtime.broker.subscribe(eventType, (event) => this.broadcastEvent(event)));
    }
  }

  async stop(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    for (const socket of this.sockets.values()) {
      socket.close();
    }
    this.sockets.clear();
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    }

    this.layerLogger.info("Gateway stopped");
  }

  /**
   * Bound address; the configured one until the server is listening.
   * Port 0 resolves to the port the OS picked.
   */
  address(): { host: string; port: number } {
    const bound = this.wss?.address();
    if (bound && typeof bound === "object") {
      return { host: bound.address, port: bound.port };
    }
    return { host: this.options.host, port: this.options.port };
  }

  broadcastEvent(event: SupportEvent): number {
    return this.broadcast(eventNotification(event));
  }

  /**
   * Send a serialized notification to every open socket.
   */
  broadcast(notification: string): number {
    let sent = 0;
    for (const socket of this.sockets.values()) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(notification);
        sent++;
      }
    }
    return sent;
  }

  getConnectedClients(): ClientInfo[] {
    return Array.from(this.clients.values());
  }
}
