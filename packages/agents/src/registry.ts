/**
 * Agent Registry
 *
 * Routes incoming signals to tool agents by name.
 */

import { OperationalError } from "@tool-agents/runtime";
import type { MetricsReport } from "@tool-agents/types";
import type { SignalOutcome, ToolAgent } from "./tool-agent";

export interface AgentInfo {
  name: string;
  tool: string;
  description: string;
}

export class AgentRegistry {
  private agents = new Map<string, ToolAgent>();

  register(agent: ToolAgent): void {
    if (this.agents.has(agent.name)) {
      throw new OperationalError(`Agent already registered: ${agent.name}`, "DUPLICATE_AGENT", {
        agent: agent.name,
      });
    }
    this.agents.set(agent.name, agent);
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  /**
   * @throws OperationalError UNKNOWN_AGENT
   */
  get(name: string): ToolAgent {
    const agent = this.agents.get(name);
    if (!agent) {
      throw new OperationalError(`Unknown agent: ${name}`, "UNKNOWN_AGENT", {
        agent: name,
        available: this.names(),
      });
    }
    return agent;
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  list(): AgentInfo[] {
    return [...this.agents.values()].map((agent) => ({
      name: agent.name,
      tool: agent.tool,
      description: agent.description,
    }));
  }

  all(): ToolAgent[] {
    return [...this.agents.values()];
  }

  send(name: string, signal: unknown): Promise<SignalOutcome> {
    return this.get(name).handleSignal(signal);
  }

  metrics(): Record<string, MetricsReport> {
    const report: Record<string, MetricsReport> = {};
    for (const agent of this.agents.values()) {
      report[agent.name] = agent.lifecycle.getMetrics();
    }
    return report;
  }

  /** Wait until every agent has drained its queue */
  async drain(): Promise<void> {
    await Promise.all(this.all().map((agent) => agent.drain()));
  }
}
