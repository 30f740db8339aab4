/**
 * Error Boundaries and Global Error Handling
 *
 * Provides:
 * - Unhandled rejection handling
 * - Uncaught exception handling
 * - Graceful shutdown that drains agents before exit
 */

import { randomUUID } from "crypto";
import { getLogger, isOperationalError, toError } from "@tool-agents/runtime";

const logger = getLogger().child({ component: "error-boundary" });

// ============================================================================
// ERROR TYPES
// ============================================================================

export interface ErrorReport {
  id: string;
  timestamp: string;
  type: "uncaught" | "unhandled_rejection" | "operational" | "programmer";
  message: string;
  stack?: string;
  context: Record<string, unknown>;
  severity: "warning" | "error" | "critical";
}

export type ShutdownHook = () => Promise<void>;

// ============================================================================
// ERROR HANDLERS
// ============================================================================

let shutdownInProgress = false;
let shutdownHook: ShutdownHook | undefined;

function handleUncaughtException(error: Error): void {
  logger.fatal("Uncaught exception", error, { type: "uncaught_exception" });
  reportError(createErrorReport(error, "uncaught"));

  // Anything that is not an expected failure leaves the process in an unknown state
  if (!isOperationalError(error)) {
    void gracefulShutdown("uncaught_exception", 1);
  }
}

function handleUnhandledRejection(reason: unknown): void {
  const error = toError(reason);
  logger.error("Unhandled promise rejection", error, { type: "unhandled_rejection" });
  reportError(createErrorReport(error, "unhandled_rejection"));
}

export function createErrorReport(error: Error, type: ErrorReport["type"]): ErrorReport {
  const severity: ErrorReport["severity"] =
    type === "uncaught"
      ? "critical"
      : type === "unhandled_rejection"
        ? "error"
        : isOperationalError(error)
          ? "warning"
          : "error";

  return {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    type,
    message: error.message,
    stack: error.stack,
    context: isOperationalError(error) ? error.context : {},
    severity,
  };
}

function reportError(report: ErrorReport): void {
  logger.warn("Error reported", {
    errorId: report.id,
    type: report.type,
    severity: report.severity,
    message: report.message,
    stack: report.stack?.slice(0, 1000),
    context: report.context,
  });
}

/**
 * Run the shutdown hook once, then exit
 */
async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shutdownInProgress) return;
  shutdownInProgress = true;

  logger.info("Initiating graceful shutdown", { reason });

  try {
    if (shutdownHook) await shutdownHook();
  } catch (error) {
    logger.error("Shutdown hook failed", toError(error), { reason });
    exitCode = 1;
  }

  process.exit(exitCode);
}

// ============================================================================
// SETUP
// ============================================================================

let initialized = false;

export function isTestEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.VITEST || env.JEST_WORKER_ID || env.NODE_ENV === "test");
}

/**
 * Install process-wide handlers. Disabled under test runners.
 * Returns whether the handlers were installed.
 */
export function setupErrorBoundary(options: { onShutdown?: ShutdownHook } = {}): boolean {
  shutdownHook = options.onShutdown ?? shutdownHook;

  if (initialized) return true;

  if (isTestEnvironment()) {
    logger.debug("Error boundary disabled in test environment");
    return false;
  }

  initialized = true;

  process.on("uncaughtException", handleUncaughtException);
  process.on("unhandledRejection", handleUnhandledRejection);

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM", 0));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT", 0));

  logger.info("Error boundary initialized");
  return true;
}

// ============================================================================
// SAFE EXECUTION WRAPPER
// ============================================================================

export type SafeExecutionResult<T> = { success: true; data: T } | { success: false; error: Error };

/**
 * Run a function, logging and reporting instead of throwing
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<SafeExecutionResult<T>> {
  try {
    return { success: true, data: await fn() };
  } catch (error) {
    const err = toError(error);
    logger.error("Safe execution failed", err, context);

    if (!isOperationalError(err)) {
      reportError(createErrorReport(err, "programmer"));
    }

    return { success: false, error: err };
  }
}
