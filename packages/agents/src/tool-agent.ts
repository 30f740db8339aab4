/**
 * ToolAgent - signal-driven wrapper around one LifecycleManager
 *
 * Accepts incoming signals (tool_request, cancel_request, get_metrics,
 * clear_cache), drives the lifecycle, and publishes every lifecycle
 * notification and reply on the SignalBus.
 */

import type { ParamsValidator, ResultProcessor, ToolInvoker } from "@tool-agents/types";
import {
  LifecycleManager,
  OperationalError,
  describeIssues,
  getLogger,
  type CancelAck,
  type Clock,
  type LifecycleConfigInput,
  type Logger,
  type SubmitReceipt,
} from "@tool-agents/runtime";
import type { SignalBus } from "./bus";
import {
  LifecycleSignalSchema,
  SignalEnvelopeSchema,
  isLifecycleSignalType,
  type AgentReply,
  type LifecycleSignal,
  type SignalEnvelope,
} from "./signals";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Hook for signals outside the lifecycle set. Errors it raises propagate to
 * the caller of handleSignal.
 */
export type ToolSignalHandler = (signal: SignalEnvelope, agent: ToolAgent) => void | Promise<void>;

export interface ToolAgentOptions {
  /** Agent name, used for routing and stamped on outgoing signals */
  name: string;
  /** Tool id handed to the invoker */
  tool: string;
  description?: string;
  invoker: ToolInvoker;
  bus: SignalBus;
  validateParams?: ParamsValidator;
  processResult?: ResultProcessor;
  handleToolSignal?: ToolSignalHandler;
  config?: LifecycleConfigInput;
  clock?: Clock;
  logger?: Logger;
}

export type SignalOutcome =
  | { type: "tool_request"; receipt: SubmitReceipt }
  | { type: "cancel_request"; ack: CancelAck }
  | { type: "get_metrics"; reply: AgentReply }
  | { type: "clear_cache"; reply: AgentReply }
  | { type: "custom"; signal: string; handled: boolean };

// ============================================================================
// AGENT
// ============================================================================

export class ToolAgent {
  readonly name: string;
  readonly tool: string;
  readonly description: string;
  readonly lifecycle: LifecycleManager;

  private readonly bus: SignalBus;
  private readonly handleToolSignal?: ToolSignalHandler;
  private readonly logger: Logger;

  constructor(options: ToolAgentOptions) {
    this.name = options.name;
    this.tool = options.tool;
    this.description = options.description ?? `Tool agent for ${options.tool}`;
    this.bus = options.bus;
    this.handleToolSignal = options.handleToolSignal;

    const baseLogger = options.logger ?? getLogger();
    this.logger = baseLogger.child({ component: "tool-agent", agent: options.name });

    this.lifecycle = new LifecycleManager({
      tool: options.tool,
      invoker: options.invoker,
      validateParams: options.validateParams,
      processResult: options.processResult,
      config: options.config,
      clock: options.clock,
      logger: baseLogger.child({ agent: options.name }),
      sink: {
        emit: (notification) => {
          this.bus.publish(this.name, notification);
        },
      },
    });
  }

  /**
   * Route one incoming signal.
   * @throws OperationalError INVALID_SIGNAL when the signal is malformed
   */
  async handleSignal(raw: unknown): Promise<SignalOutcome> {
    const envelope = SignalEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new OperationalError(`Invalid signal: ${describeIssues(envelope.error)}`, "INVALID_SIGNAL", {
        agent: this.name,
      });
    }

    if (!isLifecycleSignalType(envelope.data.type)) {
      return this.handleCustom(envelope.data);
    }

    const parsed = LifecycleSignalSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OperationalError(
        `Invalid ${envelope.data.type} signal: ${describeIssues(parsed.error)}`,
        "INVALID_SIGNAL",
        { agent: this.name, signal: envelope.data.type }
      );
    }

    return this.dispatch(parsed.data);
  }

  private dispatch(signal: LifecycleSignal): SignalOutcome {
    switch (signal.type) {
      case "tool_request": {
        const receipt = this.lifecycle.submit(signal.params, {
          requestId: signal.requestId,
          priority: signal.priority,
        });
        return { type: "tool_request", receipt };
      }

      case "cancel_request":
        return { type: "cancel_request", ack: this.lifecycle.cancel(signal.requestId) };

      case "get_metrics": {
        const { queueLength, activeCount, cacheSize, ...metrics } = this.lifecycle.getMetrics();
        const reply: AgentReply = {
          type: "metrics_report",
          tool: this.tool,
          metrics,
          cacheSize,
          queueLength,
          activeRequests: activeCount,
        };
        this.bus.publish(this.name, reply);
        return { type: "get_metrics", reply };
      }

      case "clear_cache": {
        this.lifecycle.clearCache();
        const reply: AgentReply = { type: "cache_cleared", tool: this.tool };
        this.bus.publish(this.name, reply);
        return { type: "clear_cache", reply };
      }
    }
  }

  private async handleCustom(signal: SignalEnvelope): Promise<SignalOutcome> {
    if (!this.handleToolSignal) {
      this.logger.warn("Received unknown signal", { signal: signal.type });
      return { type: "custom", signal: signal.type, handled: false };
    }

    await this.handleToolSignal(signal, this);
    return { type: "custom", signal: signal.type, handled: true };
  }

  /** Resolves once nothing is queued or in flight */
  drain(): Promise<void> {
    return this.lifecycle.whenIdle();
  }
}
