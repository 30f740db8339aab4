/**
 * ToolExecutor - the production ToolInvoker
 *
 * Looks tools up by name, re-parses params through the tool's schema
 * (applying defaults), bounds each call with a timeout and checks the
 * result against the tool's result schema.
 */

import {
  JsonValueSchema,
  fail,
  ok,
  type InvocationContext,
  type JsonObject,
  type JsonValue,
  type ParamsValidator,
  type Tool,
  type ToolInvoker,
  type ToolResult,
} from "@tool-agents/types";
import { describeIssues, formatReason, getLogger, monotonicClock, type Logger } from "@tool-agents/runtime";

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export type AnyTool = Tool<unknown, unknown>;

export interface ToolExecutorOptions {
  tools: AnyTool[];
  timeoutMs?: number;
  logger?: Logger;
}

export class ToolExecutor implements ToolInvoker {
  private readonly tools: Map<string, AnyTool>;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ToolExecutorOptions) {
    this.tools = new Map(options.tools.map((t) => [t.name, t]));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.logger = (options.logger ?? getLogger()).child({ component: "tool-executor" });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  async execute(toolId: string, params: JsonObject, ctx: InvocationContext): Promise<ToolResult<JsonValue>> {
    const tool = this.tools.get(toolId);
    if (!tool) {
      return fail("unknown_tool", `Unknown tool: ${toolId}`);
    }

    const parsed = tool.paramsSchema.safeParse(params);
    if (!parsed.success) {
      return fail("invalid_params", describeIssues(parsed.error));
    }

    const startedAt = monotonicClock.now();
    const result = await this.withTimeout(tool, () => tool.execute(parsed.data, { ...ctx, tool: tool.name }));
    const durationMs = Math.round(monotonicClock.now() - startedAt);

    if (!result.success) {
      this.logger.debug("Tool returned failure", {
        tool: tool.name,
        requestId: ctx.requestId,
        code: result.error.code,
        durationMs,
      });
      return result;
    }

    const checked = tool.resultSchema.safeParse(result.data);
    if (!checked.success) {
      return fail("invalid_result", `Tool ${tool.name} returned an invalid result: ${describeIssues(checked.error)}`);
    }

    const json = JsonValueSchema.safeParse(checked.data);
    if (!json.success) {
      return fail("invalid_result", `Tool ${tool.name} returned a non-JSON result`);
    }

    this.logger.debug("Tool executed", { tool: tool.name, requestId: ctx.requestId, durationMs });
    return ok(json.data);
  }

  private async withTimeout(
    tool: AnyTool,
    run: () => Promise<ToolResult<unknown>>
  ): Promise<ToolResult<unknown>> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ToolResult<unknown>>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn("Tool timed out", { tool: tool.name, timeoutMs: this.timeoutMs });
        resolve(fail("timeout", `Tool ${tool.name} timed out after ${this.timeoutMs}ms`, true));
      }, this.timeoutMs);
    });

    const work = Promise.resolve()
      .then(run)
      .catch((error: unknown) => fail<unknown>("tool_exception", formatReason(error)));

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Build a params validator from a tool's zod schema. The original params are
 * passed through unchanged; defaults are applied by the executor.
 */
export function validatorFor(tool: AnyTool): ParamsValidator {
  return (params) => {
    const parsed = tool.paramsSchema.safeParse(params);
    return parsed.success ? ok(params) : fail("invalid_params", describeIssues(parsed.error));
  };
}
