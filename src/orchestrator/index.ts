/**
 * Orchestrator Module
 *
 * The gated state machine that drives every conversation.
 */

export { Coordinator, type CoordinatorDeps, type CoordinatorStats } from "./Coordinator.js";
