export {
  EscalationQueue,
  DEFAULT_AVG_HANDLING_SECONDS,
  type AssignResult,
  type ResolveResult,
  type QueueStatus,
  type QueueEntryStatus,
  type EscalationStats,
  type EscalationQueueOptions,
} from "./EscalationQueue.js";
export { EscalationAgent, ESCALATION_AGENT_NAME, type EscalationAgentDeps } from "./EscalationAgent.js";
