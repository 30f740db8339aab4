/**
 * Error classification
 *
 * Operational errors are expected failures (bad configuration, unknown agent,
 * malformed signal). Anything else reaching the error boundary is a bug.
 */

export type OperationalErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_SIGNAL"
  | "UNKNOWN_AGENT"
  | "DUPLICATE_AGENT"
  | "DUPLICATE_REQUEST";

export class OperationalError extends Error {
  public readonly isOperational = true;
  public readonly code: OperationalErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: OperationalErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "OperationalError";
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isOperationalError(error: unknown): error is OperationalError {
  return error instanceof OperationalError;
}

/**
 * Render a tool failure reason for notifications
 */
export function formatReason(reason: unknown): string {
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;
  try {
    return JSON.stringify(reason) ?? String(reason);
  } catch {
    return String(reason);
  }
}
