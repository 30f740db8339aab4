/**
 * Shared fakes for lifecycle tests
 */

import type {
  InvocationContext,
  JsonObject,
  JsonValue,
  NotificationSink,
  ToolInvoker,
  ToolNotification,
  ToolResult,
} from "@tool-agents/types";
import { StructuredLogger, type LogEntry } from "../src/logger";

export interface PendingCall {
  toolId: string;
  params: JsonObject;
  ctx: InvocationContext;
  resolve: (result: ToolResult<JsonValue>) => void;
  reject: (error: unknown) => void;
}

/**
 * Invoker whose calls stay pending until the test settles them.
 */
export class DeferredInvoker implements ToolInvoker {
  readonly calls: PendingCall[] = [];
  inFlight = 0;
  maxInFlight = 0;

  execute(toolId: string, params: JsonObject, ctx: InvocationContext): Promise<ToolResult<JsonValue>> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    return new Promise((resolve, reject) => {
      this.calls.push({
        toolId,
        params,
        ctx,
        resolve: (result) => {
          this.inFlight--;
          resolve(result);
        },
        reject: (error) => {
          this.inFlight--;
          reject(error);
        },
      });
    });
  }

  /** Params of every call so far, in dispatch order */
  dispatched(): JsonObject[] {
    return this.calls.map((c) => c.params);
  }

  last(): PendingCall {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error("No invocation has been dispatched");
    }
    return call;
  }
}

export class CollectingSink implements NotificationSink {
  readonly notifications: ToolNotification[] = [];

  emit(notification: ToolNotification): void {
    this.notifications.push(notification);
  }

  forRequest(requestId: string): ToolNotification[] {
    return this.notifications.filter((n) => n.requestId === requestId);
  }

  types(requestId: string): string[] {
    return this.forRequest(requestId).map((n) => n.type);
  }
}

/**
 * Let pending promise callbacks run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function silentLogger(entries: LogEntry[] = []): StructuredLogger {
  const logger = new StructuredLogger();
  logger.setLevel("debug");
  logger.setOutput((entry) => {
    entries.push(entry);
  });
  return logger;
}
