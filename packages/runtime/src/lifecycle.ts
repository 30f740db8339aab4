/**
 * LifecycleManager - request lifecycle for one tool agent
 *
 * Submitted → RateChecked → (CacheHit | Queued) → Dispatched → Completed
 *                         ↘ RateLimited                      ↘ Cancelled
 *
 * - Admission through a sliding-window rate limiter
 * - Result cache keyed on canonical params
 * - Priority queue drained through a single execution slot
 * - Exactly one terminal notification per submitted request
 */

import type {
  InvocationContext,
  JsonObject,
  JsonValue,
  LifecycleMetrics,
  MetricsReport,
  NotificationSink,
  ParamsValidator,
  Priority,
  ResultProcessor,
  ToolError,
  ToolInvoker,
  ToolNotification,
  ToolRequest,
} from "@tool-agents/types";
import { cacheKey } from "./cache-key";
import { monotonicClock, type Clock } from "./clock";
import { resolveLifecycleConfig, type LifecycleConfig, type LifecycleConfigInput } from "./config";
import { OperationalError } from "./errors";
import { Dispatcher, ExecutionSlot, type InFlight } from "./execution-slot";
import { getLogger, toError, type Logger } from "./logger";
import { RateLimiter } from "./rate-limiter";
import { RequestQueue } from "./request-queue";
import { ResultCache } from "./result-cache";

// ============================================================================
// TYPES
// ============================================================================

export interface LifecycleManagerOptions {
  /** Tool id handed to the invoker and stamped on every notification */
  tool: string;
  invoker: ToolInvoker;
  sink: NotificationSink;
  validateParams?: ParamsValidator;
  processResult?: ResultProcessor;
  config?: LifecycleConfigInput;
  clock?: Clock;
  logger?: Logger;
}

export interface SubmitOptions {
  priority?: Priority;
  requestId?: string;
}

export type SubmitStatus = "rate_limited" | "cache_hit" | "queued" | "dispatched";

export interface SubmitReceipt {
  requestId: string;
  status: SubmitStatus;
}

export interface CancelAck {
  requestId: string;
  /** removed: was queued; flagged: in flight, runs to completion; not_found: no-op */
  status: "removed" | "flagged" | "not_found";
}

export interface LifecycleSnapshot {
  queued: string[];
  active: string[];
}

type Completion =
  | { kind: "success"; result: JsonValue; executionTimeMs: number }
  | {
      kind: "failure";
      code: "VALIDATION_ERROR" | "INVOCATION_ERROR";
      toolError: ToolError;
      executionTimeMs: number;
    };

let requestCounter = 0;

// ============================================================================
// MANAGER
// ============================================================================

export class LifecycleManager {
  readonly tool: string;
  readonly config: LifecycleConfig;

  private readonly invoker: ToolInvoker;
  private readonly sink: NotificationSink;
  private readonly validateParams?: ParamsValidator;
  private readonly processResult?: ResultProcessor;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly rateLimiter: RateLimiter;
  private readonly cache: ResultCache;
  private readonly queue = new RequestQueue();
  private readonly slot = new ExecutionSlot();
  private readonly dispatcher: Dispatcher;

  private readonly metrics: LifecycleMetrics = {
    total: 0,
    successful: 0,
    failed: 0,
    cacheHits: 0,
    averageExecutionTimeMs: 0,
    lastRequestAt: null,
  };

  private idleWaiters: Array<() => void> = [];

  constructor(options: LifecycleManagerOptions) {
    this.tool = options.tool;
    this.invoker = options.invoker;
    this.sink = options.sink;
    this.validateParams = options.validateParams;
    this.processResult = options.processResult;
    this.clock = options.clock ?? monotonicClock;
    this.logger = (options.logger ?? getLogger()).child({
      component: "lifecycle",
      tool: options.tool,
    });
    this.config = resolveLifecycleConfig(options.config);

    this.rateLimiter = new RateLimiter({
      maxRequests: this.config.rateLimitMax,
      windowMs: this.config.rateLimitWindowMs,
    });
    this.cache = new ResultCache(this.config.cacheTtlMs);
    this.dispatcher = new Dispatcher(this.slot, this.clock);
  }

  // ==========================================================================
  // OPERATIONS
  // ==========================================================================

  /**
   * Submit a unit of work. Returns as soon as the request is answered from
   * cache, rejected, queued, or handed to the invoker.
   */
  submit(params: JsonObject, options: SubmitOptions = {}): SubmitReceipt {
    const requestId = options.requestId ?? this.nextRequestId();

    if (this.queue.has(requestId) || this.slot.has(requestId)) {
      throw new OperationalError(`Request ${requestId} is already pending`, "DUPLICATE_REQUEST", {
        tool: this.tool,
        requestId,
      });
    }

    const now = this.clock.now();
    const admission = this.rateLimiter.admit(now);

    if (!admission.allowed) {
      this.logger.warn("Rate limit exceeded", { requestId, retryAfter: admission.retryAfter });
      this.notify({
        type: "rate_limited",
        requestId,
        tool: this.tool,
        code: "RATE_LIMITED",
        error: "Rate limit exceeded",
        retryAfter: admission.retryAfter,
      });
      return { requestId, status: "rate_limited" };
    }

    const key = cacheKey(params);
    const cached = this.cache.get(key, now);

    if (cached !== undefined) {
      this.metrics.cacheHits++;
      this.logger.debug("Cache hit", { requestId, cacheKey: key });
      this.notify({
        type: "result",
        requestId,
        tool: this.tool,
        result: cached,
        fromCache: true,
      });
      return { requestId, status: "cache_hit" };
    }

    const request: ToolRequest = {
      id: requestId,
      params,
      priority: options.priority ?? "normal",
      createdAt: now,
      cacheKey: key,
    };

    this.queue.enqueue(request);
    this.logger.debug("Request queued", {
      requestId,
      priority: request.priority,
      queueLength: this.queue.length,
    });

    this.dispatchNext();

    return { requestId, status: this.slot.has(requestId) ? "dispatched" : "queued" };
  }

  /**
   * Best-effort cancellation. A queued request is removed and reported as
   * cancelled; an in-flight request is only flagged and reports `cancelled`
   * when its invocation completes.
   */
  cancel(requestId: string): CancelAck {
    if (this.queue.remove(requestId)) {
      this.logger.info("Queued request cancelled", { requestId });
      this.notify({ type: "cancelled", requestId, tool: this.tool });
      return { requestId, status: "removed" };
    }

    if (this.slot.markCancelled(requestId)) {
      this.logger.info("In-flight request flagged as cancelled", { requestId });
      return { requestId, status: "flagged" };
    }

    this.logger.debug("Cancel ignored for unknown request", { requestId });
    return { requestId, status: "not_found" };
  }

  getMetrics(): MetricsReport {
    return {
      ...this.metrics,
      queueLength: this.queue.length,
      activeCount: this.slot.size,
      cacheSize: this.cache.size,
    };
  }

  clearCache(): void {
    const cleared = this.cache.size;
    this.cache.clear();
    this.logger.info("Result cache cleared", { entries: cleared });
  }

  snapshot(): LifecycleSnapshot {
    return { queued: this.queue.ids(), active: this.slot.ids() };
  }

  isIdle(): boolean {
    return this.queue.length === 0 && this.slot.size === 0;
  }

  /**
   * Resolves once the queue is empty and nothing is in flight.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  private dispatchNext(): void {
    this.dispatcher.tryDispatch(this.queue, (entry) => this.start(entry));
  }

  private start(entry: InFlight): void {
    const { request } = entry;

    this.logger.debug("Request dispatched", {
      requestId: request.id,
      waitedMs: entry.startedAt - request.createdAt,
    });
    this.notify({ type: "started", requestId: request.id, tool: this.tool });

    // Hand off after submit() has returned its receipt
    void Promise.resolve()
      .then(() => this.execute(entry))
      .then((completion) => this.complete(entry, completion))
      .catch((error: unknown) => {
        this.logger.error("Completion handling failed", toError(error), { requestId: request.id });
      });
  }

  /**
   * Validate and invoke. Never rejects: every fault becomes a failure.
   */
  private async execute(entry: InFlight): Promise<Completion> {
    const { request } = entry;
    const ctx: InvocationContext = {
      requestId: request.id,
      isCancelled: () => entry.cancelled,
      reportProgress: (detail) => {
        // Progress after completion is dropped
        if (this.slot.get(request.id) === entry) {
          this.notify({ type: "progress", requestId: request.id, tool: this.tool, detail });
        }
      },
    };

    let stage: "VALIDATION_ERROR" | "INVOCATION_ERROR" = "VALIDATION_ERROR";

    try {
      let params = request.params;

      if (this.validateParams) {
        const validation = await this.validateParams(request.params);
        if (!validation.success) {
          return {
            kind: "failure",
            code: "VALIDATION_ERROR",
            toolError: validation.error,
            executionTimeMs: this.elapsed(entry),
          };
        }
        params = validation.data;
      }

      stage = "INVOCATION_ERROR";
      const result = await this.invoker.execute(this.tool, params, ctx);

      if (!result.success) {
        return {
          kind: "failure",
          code: "INVOCATION_ERROR",
          toolError: result.error,
          executionTimeMs: this.elapsed(entry),
        };
      }

      const processed = this.processResult ? this.processResult(result.data, request) : result.data;

      return { kind: "success", result: processed, executionTimeMs: this.elapsed(entry) };
    } catch (error) {
      const err = toError(error);
      this.logger.error("Tool raised during execution", err, { requestId: request.id, stage });
      return {
        kind: "failure",
        code: stage,
        toolError: { code: "exception", message: err.message, recoverable: false },
        executionTimeMs: this.elapsed(entry),
      };
    }
  }

  private complete(entry: InFlight, completion: Completion): void {
    const { request } = entry;

    try {
      this.slot.release(request.id);
      this.recordCompletion(completion);

      if (entry.cancelled) {
        this.logger.info("Cancelled request finished; outcome discarded", {
          requestId: request.id,
          outcome: completion.kind,
        });
        this.notify({ type: "cancelled", requestId: request.id, tool: this.tool });
        return;
      }

      if (completion.kind === "success") {
        this.cache.put(request.cacheKey, completion.result, this.clock.now());
        this.logger.info("Request succeeded", {
          requestId: request.id,
          executionTimeMs: completion.executionTimeMs,
        });
        this.notify({
          type: "result",
          requestId: request.id,
          tool: this.tool,
          result: completion.result,
          fromCache: false,
          executionTimeMs: completion.executionTimeMs,
        });
        return;
      }

      const prefix = completion.code === "VALIDATION_ERROR" ? "Validation failed: " : "";
      this.logger.warn("Request failed", {
        requestId: request.id,
        code: completion.code,
        toolErrorCode: completion.toolError.code,
      });
      this.notify({
        type: "error",
        requestId: request.id,
        tool: this.tool,
        code: completion.code,
        error: `${prefix}${completion.toolError.message}`,
        toolErrorCode: completion.toolError.code,
      });
    } finally {
      this.dispatchNext();
      this.settleIdleWaiters();
    }
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private recordCompletion(completion: Completion): void {
    this.metrics.total++;
    this.metrics.lastRequestAt = new Date().toISOString();

    if (completion.kind === "failure") {
      this.metrics.failed++;
      return;
    }

    this.metrics.successful++;
    const n = this.metrics.successful;
    this.metrics.averageExecutionTimeMs =
      (this.metrics.averageExecutionTimeMs * (n - 1) + completion.executionTimeMs) / n;
  }

  private settleIdleWaiters(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private notify(notification: ToolNotification): void {
    try {
      const pending = this.sink.emit(notification);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          this.logger.error("Notification sink rejected", toError(error), {
            requestId: notification.requestId,
            notification: notification.type,
          });
        });
      }
    } catch (error) {
      this.logger.error("Notification sink failed", toError(error), {
        requestId: notification.requestId,
        notification: notification.type,
      });
    }
  }

  private elapsed(entry: InFlight): number {
    return Math.max(0, this.clock.now() - entry.startedAt);
  }

  private nextRequestId(): string {
    requestCounter++;
    return `${this.tool}_${requestCounter}`;
  }
}
