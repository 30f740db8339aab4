/**
 * HTTP Server for Worker Metrics
 *
 * Exposes a /metrics endpoint for Prometheus scraping and /health, /ready
 * endpoints for liveness and readiness probes.
 */

import { createServer, type Server } from "http";
import type { AddressInfo } from "net";
import type { MetricsReport } from "@tool-agents/types";
import { getLogger, toError, type Logger } from "@tool-agents/runtime";
import { exportPrometheusMetrics } from "./metrics";

export interface RequestLike {
  url?: string;
  method?: string;
}

export interface ResponseLike {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export interface MetricsServerOptions {
  /** Current per-agent metrics, read on every scrape */
  metrics: () => Record<string, MetricsReport>;
  /** Readiness; /ready answers 503 while false */
  isReady?: () => boolean;
  logger?: Logger;
}

const JSON_HEADERS = { "Content-Type": "application/json" };

/**
 * Build the request handler used by the metrics server
 */
export function createRequestHandler(options: MetricsServerOptions) {
  const logger = (options.logger ?? getLogger()).child({ component: "http-server" });
  const isReady = options.isReady ?? (() => true);

  return (req: RequestLike, res: ResponseLike): void => {
    const { url, method } = req;
    const pathname = (url ?? "/").split("?")[0];

    logger.debug("HTTP request", { method, url });

    if (method !== undefined && method !== "GET") {
      res.writeHead(405, { ...JSON_HEADERS, Allow: "GET" });
      res.end(JSON.stringify({ error: "Method Not Allowed" }));
      return;
    }

    // Health check endpoint
    if (pathname === "/health" || pathname === "/healthz") {
      res.writeHead(200, JSON_HEADERS);
      res.end(JSON.stringify({ status: "healthy", timestamp: new Date().toISOString() }));
      return;
    }

    // Readiness check endpoint
    if (pathname === "/ready" || pathname === "/readyz") {
      const ready = isReady();
      res.writeHead(ready ? 200 : 503, JSON_HEADERS);
      res.end(JSON.stringify({ status: ready ? "ready" : "not_ready", timestamp: new Date().toISOString() }));
      return;
    }

    // Prometheus metrics endpoint
    if (pathname === "/metrics") {
      res.writeHead(200, { "Content-Type": "text/plain; version=0.0.4; charset=utf-8" });
      res.end(exportPrometheusMetrics(options.metrics()));
      return;
    }

    res.writeHead(404, JSON_HEADERS);
    res.end(JSON.stringify({ error: "Not Found" }));
  };
}

export class MetricsServer {
  private server: Server | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: MetricsServerOptions) {
    this.logger = (options.logger ?? getLogger()).child({ component: "http-server" });
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  start(port: number): Promise<number> {
    if (this.server) {
      this.logger.warn("Metrics server already running");
      return Promise.resolve(this.port ?? port);
    }

    const handler = createRequestHandler(this.options);
    const server = createServer((req, res) => handler(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", (err) => {
        this.server = null;
        this.logger.error("Metrics server failed to start", toError(err), { port });
        reject(err);
      });
      server.listen(port, () => {
        server.removeAllListeners("error");
        server.on("error", (err) => {
          this.logger.error("Metrics server error", toError(err));
        });
        const bound = this.port ?? port;
        this.logger.info("Metrics server started", { port: bound });
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => {
        this.server = null;
        if (err) {
          reject(err);
          return;
        }
        this.logger.info("Metrics server stopped");
        resolve();
      });
    });
  }

  get port(): number | undefined {
    const address = this.server?.address();
    return isAddressInfo(address) ? address.port : undefined;
  }

  get running(): boolean {
    return this.server !== null && this.server.listening;
  }
}

function isAddressInfo(address: string | AddressInfo | null | undefined): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
