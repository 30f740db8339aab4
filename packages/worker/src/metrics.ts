/**
 * Worker Metrics
 *
 * Renders every agent's lifecycle metrics in the Prometheus text format.
 */

import type { MetricsReport } from "@tool-agents/types";

interface MetricDefinition {
  name: string;
  help: string;
  type: "counter" | "gauge";
  value: (report: MetricsReport) => number;
}

export const METRICS: readonly MetricDefinition[] = [
  {
    name: "tool_agent_requests_total",
    help: "Completed tool executions",
    type: "counter",
    value: (r) => r.total,
  },
  {
    name: "tool_agent_requests_successful_total",
    help: "Tool executions that succeeded",
    type: "counter",
    value: (r) => r.successful,
  },
  {
    name: "tool_agent_requests_failed_total",
    help: "Tool executions that failed validation or invocation",
    type: "counter",
    value: (r) => r.failed,
  },
  {
    name: "tool_agent_cache_hits_total",
    help: "Requests answered from the result cache",
    type: "counter",
    value: (r) => r.cacheHits,
  },
  {
    name: "tool_agent_execution_time_avg_ms",
    help: "Running average execution time of successful requests",
    type: "gauge",
    value: (r) => r.averageExecutionTimeMs,
  },
  {
    name: "tool_agent_queue_length",
    help: "Requests waiting for the execution slot",
    type: "gauge",
    value: (r) => r.queueLength,
  },
  {
    name: "tool_agent_active_requests",
    help: "Requests currently executing",
    type: "gauge",
    value: (r) => r.activeCount,
  },
  {
    name: "tool_agent_cache_entries",
    help: "Entries held in the result cache, including expired ones",
    type: "gauge",
    value: (r) => r.cacheSize,
  },
];

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/**
 * Export metrics in Prometheus format
 */
export function exportPrometheusMetrics(reports: Record<string, MetricsReport>): string {
  const agents = Object.keys(reports).sort();
  const lines: string[] = [];

  for (const metric of METRICS) {
    lines.push(`# HELP ${metric.name} ${metric.help}`);
    lines.push(`# TYPE ${metric.name} ${metric.type}`);
    for (const agent of agents) {
      lines.push(`${metric.name}{agent="${escapeLabel(agent)}"} ${metric.value(reports[agent])}`);
    }
  }

  return lines.join("\n") + "\n";
}
