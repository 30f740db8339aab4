import { z } from "zod";
import { OperationalError } from "./errors";

export const DEFAULT_CACHE_TTL_MS = 300_000;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;
export const DEFAULT_RATE_LIMIT_MAX = 100;

export const LifecycleConfigSchema = z.object({
  cacheTtlMs: z.number().int().nonnegative().default(DEFAULT_CACHE_TTL_MS),
  rateLimitWindowMs: z.number().int().positive().default(DEFAULT_RATE_LIMIT_WINDOW_MS),
  rateLimitMax: z.number().int().nonnegative().default(DEFAULT_RATE_LIMIT_MAX),
});

export type LifecycleConfig = z.infer<typeof LifecycleConfigSchema>;
export type LifecycleConfigInput = z.input<typeof LifecycleConfigSchema>;

/**
 * Render zod issues as `path: message; path: message`
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function resolveLifecycleConfig(input: LifecycleConfigInput = {}): LifecycleConfig {
  const parsed = LifecycleConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new OperationalError(
      `Invalid lifecycle config: ${describeIssues(parsed.error)}`,
      "INVALID_CONFIG",
      { input }
    );
  }
  return parsed.data;
}
