// Gateway entry point

import { createDemoIntentClassifier, createDemoSentimentClassifier } from "../agents/ScriptedClassifier.js";
import { loadConfig, ensureStorageDirectories } from "../config/index.js";
import { SupportRuntime } from "../runtime/SupportRuntime.js";
import { createLogger } from "../utils/logger.js";
import { GatewayServer } from "./server.js";

export { GatewayServer, eventNotification, OUTBOUND_EVENTS, type ClientInfo, type GatewayServerOptions } from "./server.js";
export { JsonRpcServer, parseParams, createRequest, createNotification, type JsonRpcHandler } from "./json-rpc.js";
export { createSupportHandlers } from "./handlers/support.handler.js";

export interface StartGatewayOptions {
  configPath?: string;
  /** Answer classification tasks in-process with keyword rules */
  demoClassifiers?: boolean;
  port?: number;
  host?: string;
}

export interface RunningGateway {
  runtime: SupportRuntime;
  server: GatewayServer;
  stop(): Promise<void>;
}

export async function startGateway(options: StartGatewayOptions = {}): Promise<RunningGateway> {
  const config = loadConfig(options.configPath);
  ensureStorageDirectories(config);

  const logger = createLogger(config.logging);
  const runtime = new SupportRuntime({
    config,
    logger,
    ...(options.demoClassifiers
      ? { sentimentClassifier: createDemoSentimentClassifier(), intentClassifier: createDemoIntentClassifier() }
      : {}),
  });
  runtime.start();

  const server = new GatewayServer(runtime, {
    host: options.host ?? config.gateway.host,
    port: options.port ?? config.gateway.port,
    logger,
  });

  try {
    await server.start();
  } catch (error) {
    await runtime.shutdown();
    throw error;
  }

  return {
    runtime,
    server,
    async stop() {
      await server.stop();
      await runtime.shutdown();
    },
  };
}
