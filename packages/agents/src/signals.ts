/**
 * Agent signals
 *
 * Incoming signals are validated with zod before they reach an agent.
 * Outgoing signals are lifecycle notifications plus the agent's own replies.
 */

import { z } from "zod";
import {
  JsonObjectSchema,
  JsonValueSchema,
  PrioritySchema,
  type LifecycleMetrics,
  type ToolNotification,
} from "@tool-agents/types";

// ============================================================================
// INCOMING
// ============================================================================

export const ToolRequestSignalSchema = z.object({
  type: z.literal("tool_request"),
  requestId: z.string().min(1).optional(),
  params: JsonObjectSchema,
  priority: PrioritySchema.optional(),
});

export const CancelRequestSignalSchema = z.object({
  type: z.literal("cancel_request"),
  requestId: z.string().min(1),
});

export const GetMetricsSignalSchema = z.object({ type: z.literal("get_metrics") });

export const ClearCacheSignalSchema = z.object({ type: z.literal("clear_cache") });

export const LifecycleSignalSchema = z.discriminatedUnion("type", [
  ToolRequestSignalSchema,
  CancelRequestSignalSchema,
  GetMetricsSignalSchema,
  ClearCacheSignalSchema,
]);

export type LifecycleSignal = z.infer<typeof LifecycleSignalSchema>;
export type LifecycleSignalType = LifecycleSignal["type"];

export const LIFECYCLE_SIGNAL_TYPES: readonly LifecycleSignalType[] = [
  "tool_request",
  "cancel_request",
  "get_metrics",
  "clear_cache",
];

export function isLifecycleSignalType(type: string): type is LifecycleSignalType {
  return LIFECYCLE_SIGNAL_TYPES.some((known) => known === type);
}

/** Any signal with a type; the rest of the payload is left to the handler */
export const SignalEnvelopeSchema = z.object({ type: z.string().min(1) }).catchall(JsonValueSchema);

export type SignalEnvelope = z.infer<typeof SignalEnvelopeSchema>;

// ============================================================================
// OUTGOING
// ============================================================================

export interface MetricsReportSignal {
  type: "metrics_report";
  tool: string;
  metrics: LifecycleMetrics;
  cacheSize: number;
  queueLength: number;
  activeRequests: number;
}

export interface CacheClearedSignal {
  type: "cache_cleared";
  tool: string;
}

export type AgentReply = MetricsReportSignal | CacheClearedSignal;

export type OutgoingPayload = ToolNotification | AgentReply;

/** What the bus carries: the payload stamped with its source agent */
export type OutgoingSignal = OutgoingPayload & {
  agent: string;
  timestamp: string;
};
