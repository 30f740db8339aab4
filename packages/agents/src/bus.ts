/**
 * Signal Bus
 *
 * In-process pub/sub for outgoing agent signals. Subscribers may filter by
 * agent or signal type; a failing subscriber never affects the others.
 */

import { EventEmitter } from "events";
import { getLogger, toError, type Logger } from "@tool-agents/runtime";
import type { OutgoingPayload, OutgoingSignal } from "./signals";

// ============================================================================
// TYPES
// ============================================================================

export type SignalHandler = (signal: OutgoingSignal) => void | Promise<void>;

export interface SubscribeFilter {
  agent?: string;
  types?: ReadonlyArray<OutgoingSignal["type"]>;
}

interface Subscription {
  handler: SignalHandler;
  filter: SubscribeFilter;
}

// ============================================================================
// BUS
// ============================================================================

export class SignalBus extends EventEmitter {
  private subscriptions = new Set<Subscription>();
  private readonly logger: Logger;

  constructor(logger: Logger = getLogger()) {
    super();
    this.setMaxListeners(100);
    this.logger = logger.child({ component: "signal-bus" });
  }

  /**
   * Subscribe to outgoing signals. Returns an unsubscribe function.
   */
  subscribe(handler: SignalHandler, filter: SubscribeFilter = {}): () => void {
    const subscription: Subscription = { handler, filter };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  /**
   * Stamp a payload with its source agent and deliver it to every matching
   * subscriber. Also emitted as a `signal` event for plain EventEmitter use.
   */
  publish(agent: string, payload: OutgoingPayload): OutgoingSignal {
    const signal: OutgoingSignal = { ...payload, agent, timestamp: new Date().toISOString() };

    for (const subscription of this.subscriptions) {
      if (!matches(subscription.filter, signal)) continue;
      this.deliver(subscription.handler, signal);
    }

    if (this.listenerCount("signal") > 0) {
      try {
        this.emit("signal", signal);
      } catch (error) {
        this.logger.error("Signal listener failed", toError(error), { agent, signal: signal.type });
      }
    }

    return signal;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  private deliver(handler: SignalHandler, signal: OutgoingSignal): void {
    try {
      const pending = handler(signal);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          this.logger.error("Signal handler rejected", toError(error), {
            agent: signal.agent,
            signal: signal.type,
          });
        });
      }
    } catch (error) {
      this.logger.error("Signal handler error", toError(error), { agent: signal.agent, signal: signal.type });
    }
  }
}

function matches(filter: SubscribeFilter, signal: OutgoingSignal): boolean {
  if (filter.agent !== undefined && filter.agent !== signal.agent) return false;
  if (filter.types !== undefined && !filter.types.includes(signal.type)) return false;
  return true;
}
