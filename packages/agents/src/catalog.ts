/**
 * Agent catalog
 *
 * Builds the stock tool agents from the tools package. Each agent gets its
 * own ToolExecutor so tool timeouts can be tuned per agent.
 */

import {
  ToolExecutor,
  regexExtractorTool,
  repoSearchTool,
  todoExtractorTool,
  validatorFor,
  type AnyTool,
} from "@tool-agents/tools";
import type { Clock, LifecycleConfigInput, Logger } from "@tool-agents/runtime";
import type { SignalBus } from "./bus";
import { ToolAgent, type ToolSignalHandler } from "./tool-agent";

export interface CatalogEntry {
  name: string;
  tool: AnyTool;
}

export const AGENT_CATALOG: readonly CatalogEntry[] = [
  { name: "repo_search_agent", tool: repoSearchTool },
  { name: "regex_extractor_agent", tool: regexExtractorTool },
  { name: "todo_extractor_agent", tool: todoExtractorTool },
];

export interface AgentSettings extends LifecycleConfigInput {
  enabled?: boolean;
  toolTimeoutMs?: number;
}

export interface CreateToolAgentOptions {
  bus: SignalBus;
  name?: string;
  settings?: AgentSettings;
  handleToolSignal?: ToolSignalHandler;
  clock?: Clock;
  logger?: Logger;
}

export function createToolAgent(tool: AnyTool, options: CreateToolAgentOptions): ToolAgent {
  const settings = options.settings ?? {};

  return new ToolAgent({
    name: options.name ?? `${tool.name}_agent`,
    tool: tool.name,
    description: tool.description,
    invoker: new ToolExecutor({ tools: [tool], timeoutMs: settings.toolTimeoutMs, logger: options.logger }),
    validateParams: validatorFor(tool),
    handleToolSignal: options.handleToolSignal,
    bus: options.bus,
    config: {
      cacheTtlMs: settings.cacheTtlMs,
      rateLimitWindowMs: settings.rateLimitWindowMs,
      rateLimitMax: settings.rateLimitMax,
    },
    clock: options.clock,
    logger: options.logger,
  });
}

export interface CreateCatalogAgentsOptions {
  bus: SignalBus;
  /** Per-agent settings keyed by agent name; `enabled: false` skips the agent */
  agents?: Record<string, AgentSettings>;
  /** Tool timeout for agents that do not set their own */
  toolTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export function createCatalogAgents(options: CreateCatalogAgentsOptions): ToolAgent[] {
  const agents: ToolAgent[] = [];

  for (const entry of AGENT_CATALOG) {
    const settings = options.agents?.[entry.name] ?? {};
    if (settings.enabled === false) continue;

    agents.push(
      createToolAgent(entry.tool, {
        bus: options.bus,
        name: entry.name,
        settings: { ...settings, toolTimeoutMs: settings.toolTimeoutMs ?? options.toolTimeoutMs },
        clock: options.clock,
        logger: options.logger,
      })
    );
  }

  return agents;
}
