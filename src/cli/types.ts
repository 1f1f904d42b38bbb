/**
 * CLI types and interfaces
 */

/** CLI command options */
export interface CliOptions {
  json?: boolean;
  verbose?: boolean;
  config?: string;
}

/** Output format */
export type OutputFormat = "table" | "json";

/** RPC call options */
export interface RpcCallOptions {
  json?: boolean;
  timeout?: number;
}

/** One scripted customer turn for `simulate` */
export interface SimulatedTurn {
  sessionId: string;
  text: string;
}

/** One broker event as the simulation prints it */
export interface EventLine {
  type: string;
  session: string;
  summary: string;
}
