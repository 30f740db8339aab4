/**
 * Tool Agents
 *
 * Signal-driven agents that each wrap one tool in a request lifecycle.
 */

export { ToolAgent, type ToolAgentOptions, type ToolSignalHandler, type SignalOutcome } from "./tool-agent";
export { AgentRegistry, type AgentInfo } from "./registry";
export { SignalBus, type SignalHandler, type SubscribeFilter } from "./bus";
export {
  AGENT_CATALOG,
  createToolAgent,
  createCatalogAgents,
  type AgentSettings,
  type CatalogEntry,
  type CreateToolAgentOptions,
  type CreateCatalogAgentsOptions,
} from "./catalog";
export {
  LifecycleSignalSchema,
  SignalEnvelopeSchema,
  LIFECYCLE_SIGNAL_TYPES,
  isLifecycleSignalType,
  type LifecycleSignal,
  type LifecycleSignalType,
  type SignalEnvelope,
  type AgentReply,
  type MetricsReportSignal,
  type CacheClearedSignal,
  type OutgoingPayload,
  type OutgoingSignal,
} from "./signals";
