import { z } from "zod";

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

// ============================================================================
// REQUESTS
// ============================================================================

export type Priority = "high" | "normal" | "low";

export const PrioritySchema = z.enum(["high", "normal", "low"]);

export interface ToolRequest {
  id: string;
  params: JsonObject;
  priority: Priority;
  /** Monotonic milliseconds at submission */
  createdAt: number;
  cacheKey: string;
}

// ============================================================================
// TOOL RESULTS
// ============================================================================

export interface ToolError {
  code: string;
  message: string;
  recoverable: boolean;
}

export type ToolResult<T> =
  | { success: true; data: T }
  | { success: false; error: ToolError };

export const ToolErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  recoverable: z.boolean(),
});

export function ok<T>(data: T): ToolResult<T> {
  return { success: true, data };
}

export function fail<T = never>(code: string, message: string, recoverable = false): ToolResult<T> {
  return { success: false, error: { code, message, recoverable } };
}

// ============================================================================
// INVOCATION BOUNDARY
// ============================================================================

export interface InvocationContext {
  requestId: string;
  /** Cooperative cancellation: true once the request was cancelled in flight */
  isCancelled: () => boolean;
  reportProgress: (detail: JsonObject) => void;
}

/**
 * Performs the actual work for a request. Implementations may throw; the
 * lifecycle manager converts thrown errors into failures.
 */
export interface ToolInvoker {
  execute(
    toolId: string,
    params: JsonObject,
    ctx: InvocationContext
  ): Promise<ToolResult<JsonValue>>;
}

export type ParamsValidator = (
  params: JsonObject
) => ToolResult<JsonObject> | Promise<ToolResult<JsonObject>>;

export type ResultProcessor = (result: JsonValue, request: ToolRequest) => JsonValue;

// ============================================================================
// TOOLS
// ============================================================================

export interface ToolContext extends InvocationContext {
  tool: string;
}

export interface Tool<TParams, TResult> {
  name: string;
  description: string;
  category: "READ_ONLY" | "ANALYSIS" | "META";
  paramsSchema: z.ZodType<TParams, z.ZodTypeDef, unknown>;
  resultSchema: z.ZodType<TResult>;
  execute(params: TParams, ctx: ToolContext): Promise<ToolResult<TResult>>;
  costHint?: "cheap" | "moderate" | "expensive";
}

// ============================================================================
// NOTIFICATIONS
// ============================================================================

export type ErrorCode = "RATE_LIMITED" | "VALIDATION_ERROR" | "INVOCATION_ERROR";

interface NotificationBase {
  requestId: string;
  tool: string;
}

export type ToolNotification =
  | (NotificationBase & { type: "started" })
  | (NotificationBase & { type: "progress"; detail: JsonObject })
  | (NotificationBase & {
      type: "result";
      result: JsonValue;
      fromCache: boolean;
      executionTimeMs?: number;
    })
  | (NotificationBase & {
      type: "error";
      code: Exclude<ErrorCode, "RATE_LIMITED">;
      error: string;
      toolErrorCode: string;
    })
  | (NotificationBase & { type: "cancelled" })
  | (NotificationBase & {
      type: "rate_limited";
      code: "RATE_LIMITED";
      error: string;
      retryAfter: number;
    });

export type NotificationType = ToolNotification["type"];

export const TERMINAL_NOTIFICATIONS: ReadonlySet<NotificationType> = new Set([
  "result",
  "error",
  "cancelled",
  "rate_limited",
]);

export function isTerminal(notification: ToolNotification): boolean {
  return TERMINAL_NOTIFICATIONS.has(notification.type);
}

/**
 * Receives lifecycle notifications. Async sinks are not awaited by the
 * manager; a rejected promise is logged.
 */
export interface NotificationSink {
  emit(notification: ToolNotification): void | Promise<void>;
}

// ============================================================================
// METRICS
// ============================================================================

export interface LifecycleMetrics {
  total: number;
  successful: number;
  failed: number;
  cacheHits: number;
  averageExecutionTimeMs: number;
  lastRequestAt: string | null;
}

export interface MetricsReport extends LifecycleMetrics {
  queueLength: number;
  activeCount: number;
  cacheSize: number;
}
