/**
 * Worker - hosts the tool agents
 *
 * Builds the catalog agents from config, optionally records every
 * notification in the Postgres ledger, serves health and metrics over HTTP,
 * and drains all agents on shutdown.
 */

import { AgentRegistry, SignalBus, createCatalogAgents, type OutgoingSignal } from "@tool-agents/agents";
import {
  createNotificationLedger,
  createNotificationSchema,
  type NotificationLedger,
  type Queryable,
} from "@tool-agents/db";
import { getLogger, type Clock, type Logger } from "@tool-agents/runtime";
import type { WorkerConfig } from "./config";
import { MetricsServer } from "./http-server";

export interface ToolWorkerOptions {
  config: WorkerConfig;
  /** Enables the notification ledger */
  db?: Queryable;
  /** Skip the HTTP server (embedding, tests) */
  serveMetrics?: boolean;
  clock?: Clock;
  logger?: Logger;
}

export class ToolWorker {
  readonly bus: SignalBus;
  readonly registry = new AgentRegistry();

  private readonly config: WorkerConfig;
  private readonly db?: Queryable;
  private readonly logger: Logger;
  private readonly server: MetricsServer;
  private readonly serveMetrics: boolean;
  private ledger?: NotificationLedger;
  private unsubscribeLedger?: () => void;
  private started = false;
  private draining = false;

  constructor(options: ToolWorkerOptions) {
    this.config = options.config;
    this.db = options.db;
    this.serveMetrics = options.serveMetrics ?? true;

    const baseLogger = options.logger ?? getLogger();
    this.logger = baseLogger.child({ component: "worker" });
    this.bus = new SignalBus(baseLogger);

    for (const agent of createCatalogAgents({
      bus: this.bus,
      agents: options.config.agents,
      toolTimeoutMs: options.config.toolTimeoutMs,
      clock: options.clock,
      logger: baseLogger,
    })) {
      this.registry.register(agent);
    }

    this.server = new MetricsServer({
      metrics: () => this.registry.metrics(),
      isReady: () => this.isReady(),
      logger: baseLogger,
    });
  }

  /**
   * Prepare the ledger and start the metrics server
   */
  async start(): Promise<void> {
    if (this.started) return;

    if (this.db) {
      await createNotificationSchema(this.db);
      const ledger = createNotificationLedger(this.db);
      this.ledger = ledger;
      this.unsubscribeLedger = this.bus.subscribe((signal) => this.record(ledger, signal));
    }

    if (this.serveMetrics) {
      await this.server.start(this.config.metricsPort);
    }

    this.started = true;
    this.logger.info("Worker started", {
      agents: this.registry.names(),
      ledger: this.ledger !== undefined,
      metricsPort: this.serveMetrics ? this.server.port : undefined,
    });
  }

  /**
   * Route one incoming signal to an agent
   */
  send(agent: string, signal: unknown) {
    return this.registry.send(agent, signal);
  }

  isReady(): boolean {
    return this.started && !this.draining;
  }

  /**
   * Stop accepting scrapes as ready, wait for every agent to finish its
   * queue, then stop the server.
   */
  async shutdown(): Promise<void> {
    if (this.draining) return;
    this.draining = true;

    this.logger.info("Worker draining", { metrics: this.registry.metrics() });
    await this.registry.drain();

    this.unsubscribeLedger?.();
    await this.server.stop();
    this.started = false;
    this.logger.info("Worker stopped");
  }

  private async record(ledger: NotificationLedger, signal: OutgoingSignal): Promise<void> {
    // Replies to get_metrics / clear_cache are not request history
    if (signal.type === "metrics_report" || signal.type === "cache_cleared") return;
    await ledger.append(signal.agent, signal);
  }
}

export { loadWorkerConfig, parseWorkerConfig, WorkerConfigSchema, type WorkerConfig } from "./config";
export { MetricsServer, createRequestHandler } from "./http-server";
export { exportPrometheusMetrics } from "./metrics";
export { setupErrorBoundary, safeExecute, createErrorReport, isTestEnvironment } from "./error-boundary";
